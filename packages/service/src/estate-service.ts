/**
 * EstateService — Composition root for the deedshare packages.
 *
 * The operation surface a transport calls into. The transport
 * authenticates the caller and passes its identity; this service
 * validates inputs, applies the configured policies, runs the ledger
 * operation, and reports the outcome as an OperationResult. Committed
 * mutations are logged and written to the audit log.
 */

import type { Logger } from "pino";
import type { ZodType, ZodTypeDef } from "zod";
import { AccessError, RoleBook } from "@deedshare/access";
import {
  DEFAULT_PROPOSAL_KIND,
  EstateLedger,
  LedgerError,
} from "@deedshare/ledger";
import type {
  DepositResult,
  ProposalExecutor,
  Settlement,
  SupplyReport,
} from "@deedshare/ledger";
import type {
  Identity,
  Listing,
  OwnershipRecord,
  Property,
  PropertyId,
  PropertyMetadata,
  PropertyStatus,
  Proposal,
  RentalIncomeRecord,
  Role,
} from "@deedshare/types";
import { AuditLog } from "./audit-log.js";
import type { AuditLogEntry, AuditLogQuery, AuditRecord } from "./audit-log.js";
import type { AppConfig } from "./config.js";
import {
  BootstrapAdminSchema,
  BuySharesSchema,
  ClaimIncomeSchema,
  DepositIncomeSchema,
  ExecuteProposalSchema,
  IssueSharesSchema,
  ListSharesSchema,
  RegisterPropertySchema,
  SetKycSchema,
  SetRoleSchema,
  SubmitProposalSchema,
  TransferSharesSchema,
  UpdateMetadataSchema,
  UpdateStatusSchema,
  VoteSchema,
  formatZodErrors,
} from "./dto.js";
import { createLogger, silentLogger } from "./logger.js";
import { fail, succeed } from "./result.js";
import type { OperationResult } from "./result.js";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Who may register properties.
 * - open: anyone
 * - manager: managers and admins only
 */
export type RegistrationPolicy = "open" | "manager";

export interface EstateServiceConfig {
  readonly registrationPolicy?: RegistrationPolicy | undefined;
  readonly purgeStaleListings?: boolean | undefined;
}

/** Actor recorded for operations that carry no caller identity. */
export const SYSTEM_ACTOR = "system";

// =============================================================================
// Service
// =============================================================================

export class EstateService {
  private readonly access: RoleBook;
  private readonly ledger: EstateLedger;
  private readonly audit: AuditLog;
  private readonly log: Logger;
  private readonly registrationPolicy: RegistrationPolicy;

  constructor(config: EstateServiceConfig = {}, logger?: Logger) {
    this.access = new RoleBook();
    this.ledger = new EstateLedger(this.access, {
      purgeStaleListings: config.purgeStaleListings,
    });
    this.audit = new AuditLog();
    this.log = (logger ?? silentLogger()).child({ component: "estate-service" });
    this.registrationPolicy = config.registrationPolicy ?? "open";
  }

  // ─── Access ────────────────────────────────────────────────────────

  bootstrapAdmin(identity: Identity): OperationResult<void> {
    return this.perform(
      "bootstrapAdmin",
      BootstrapAdminSchema,
      { identity },
      (input) => this.access.bootstrapAdmin(input.identity),
      (input) => ({
        action: "admin.bootstrapped",
        resourceId: input.identity,
        actor: input.identity,
      }),
    );
  }

  setRole(caller: Identity, user: Identity, role: Role): OperationResult<void> {
    return this.perform(
      "setRole",
      SetRoleSchema,
      { caller, user, role },
      (input) => this.access.setRole(input.caller, input.user, input.role),
      (input) => ({
        action: "role.assigned",
        resourceId: input.user,
        actor: input.caller,
        detail: input.role,
      }),
    );
  }

  setKycStatus(
    caller: Identity,
    user: Identity,
    verified: boolean,
  ): OperationResult<void> {
    return this.perform(
      "setKycStatus",
      SetKycSchema,
      { caller, user, verified },
      (input) => this.access.setKyc(input.caller, input.user, input.verified),
      (input) => ({
        action: "kyc.updated",
        resourceId: input.user,
        actor: input.caller,
        detail: input.verified ? "verified" : "unverified",
      }),
    );
  }

  getMyRole(caller: Identity): Role {
    return this.access.roleOf(caller);
  }

  isMyKycVerified(caller: Identity): boolean {
    return this.access.kycOf(caller);
  }

  // ─── Properties ────────────────────────────────────────────────────

  registerProperty(
    caller: Identity,
    name: string,
    totalShares: bigint,
    metadata: PropertyMetadata,
  ): OperationResult<Property> {
    return this.perform(
      "registerProperty",
      RegisterPropertySchema,
      { caller, name, totalShares, metadata },
      (input) => {
        this.assertMayRegister(input.caller);
        return this.ledger.registry.register(input.name, input.totalShares, input.metadata);
      },
      (input, property) => ({
        action: "property.registered",
        resourceId: String(property.id),
        actor: input.caller,
        detail: `${property.totalShares.toString()} shares`,
      }),
    );
  }

  updatePropertyMetadata(
    caller: Identity,
    propertyId: PropertyId,
    metadata: PropertyMetadata,
  ): OperationResult<Property> {
    return this.perform(
      "updatePropertyMetadata",
      UpdateMetadataSchema,
      { caller, propertyId, metadata },
      (input) => this.ledger.registry.updateMetadata(input.propertyId, input.metadata, input.caller),
      (input) => ({
        action: "property.metadata_updated",
        resourceId: String(input.propertyId),
        actor: input.caller,
      }),
    );
  }

  updatePropertyStatus(
    caller: Identity,
    propertyId: PropertyId,
    status: PropertyStatus,
  ): OperationResult<Property> {
    return this.perform(
      "updatePropertyStatus",
      UpdateStatusSchema,
      { caller, propertyId, status },
      (input) => this.ledger.registry.updateStatus(input.propertyId, input.status, input.caller),
      (input) => ({
        action: "property.status_updated",
        resourceId: String(input.propertyId),
        actor: input.caller,
        detail: input.status,
      }),
    );
  }

  getProperty(propertyId: PropertyId): Property | undefined {
    return this.ledger.registry.get(propertyId);
  }

  // ─── Shares ────────────────────────────────────────────────────────

  issueShares(
    propertyId: PropertyId,
    holder: Identity,
    amount: bigint,
  ): OperationResult<Property> {
    return this.perform(
      "issueShares",
      IssueSharesSchema,
      { propertyId, holder, amount },
      (input) => this.ledger.ownership.issue(input.propertyId, input.holder, input.amount),
      (input) => ({
        action: "shares.issued",
        resourceId: String(input.propertyId),
        actor: SYSTEM_ACTOR,
        detail: `${input.amount.toString()} to ${input.holder}`,
      }),
    );
  }

  transferShares(
    propertyId: PropertyId,
    from: Identity,
    to: Identity,
    amount: bigint,
  ): OperationResult<void> {
    return this.perform(
      "transferShares",
      TransferSharesSchema,
      { propertyId, from, to, amount },
      (input) => this.ledger.ownership.transfer(input.propertyId, input.from, input.to, input.amount),
      (input) => ({
        action: "shares.transferred",
        resourceId: String(input.propertyId),
        actor: input.from,
        detail: `${input.amount.toString()} to ${input.to}`,
      }),
    );
  }

  getOwnership(propertyId: PropertyId, holder: Identity): bigint {
    return this.ledger.ownership.balance(propertyId, holder);
  }

  getSupplyReport(propertyId: PropertyId): SupplyReport | undefined {
    return this.ledger.ownership.supplyReport(propertyId);
  }

  getOwnershipStatement(holder: Identity): readonly OwnershipRecord[] {
    return this.ledger.ownership.statement(holder);
  }

  // ─── Marketplace ───────────────────────────────────────────────────

  listSharesForSale(
    propertyId: PropertyId,
    seller: Identity,
    amount: bigint,
    pricePerShare: bigint,
  ): OperationResult<Listing> {
    return this.perform(
      "listSharesForSale",
      ListSharesSchema,
      { propertyId, seller, amount, pricePerShare },
      (input) =>
        this.ledger.marketplace.list(input.propertyId, input.seller, input.amount, input.pricePerShare),
      (input, listing) => ({
        action: "listing.created",
        resourceId: String(listing.id),
        actor: input.seller,
        detail: `${listing.amount.toString()} @ ${listing.pricePerShare.toString()}`,
      }),
    );
  }

  buyShares(
    propertyId: PropertyId,
    seller: Identity,
    buyer: Identity,
    amount: bigint,
  ): OperationResult<Settlement> {
    return this.perform(
      "buyShares",
      BuySharesSchema,
      { propertyId, seller, buyer, amount },
      (input) => this.ledger.marketplace.buy(input.propertyId, input.seller, input.buyer, input.amount),
      (input, settlement) => ({
        action: "listing.settled",
        resourceId: String(settlement.listingId),
        actor: input.buyer,
        detail: `${settlement.amount.toString()} from ${settlement.seller}`,
      }),
    );
  }

  getMarketplaceListings(): readonly Listing[] {
    return this.ledger.marketplace.listings();
  }

  // ─── Income ────────────────────────────────────────────────────────

  depositRentalIncome(
    propertyId: PropertyId,
    amount: bigint,
  ): OperationResult<DepositResult> {
    return this.perform(
      "depositRentalIncome",
      DepositIncomeSchema,
      { propertyId, amount },
      (input) => this.ledger.income.deposit(input.propertyId, input.amount),
      (input, result) => ({
        action: "income.deposited",
        resourceId: String(input.propertyId),
        actor: SYSTEM_ACTOR,
        detail: `${result.distributed.toString()} of ${result.amount.toString()} distributed`,
      }),
    );
  }

  claimIncome(propertyId: PropertyId, holder: Identity): OperationResult<bigint> {
    return this.perform(
      "claimIncome",
      ClaimIncomeSchema,
      { propertyId, holder },
      (input) => this.ledger.income.claim(input.propertyId, input.holder),
      (input, claimed) => ({
        action: "income.claimed",
        resourceId: String(input.propertyId),
        actor: input.holder,
        detail: claimed.toString(),
      }),
    );
  }

  getUnclaimedIncome(propertyId: PropertyId, holder: Identity): bigint {
    return this.ledger.income.unclaimed(propertyId, holder);
  }

  getTotalRentalIncome(propertyId: PropertyId): bigint {
    return this.ledger.income.totalDeposited(propertyId);
  }

  getRentalIncomeStatement(holder: Identity): readonly RentalIncomeRecord[] {
    return this.ledger.income.statement(holder);
  }

  // ─── Governance ────────────────────────────────────────────────────

  submitProposal(
    caller: Identity,
    propertyId: PropertyId,
    description: string,
    kind: string = DEFAULT_PROPOSAL_KIND,
  ): OperationResult<Proposal> {
    return this.perform(
      "submitProposal",
      SubmitProposalSchema,
      { caller, propertyId, description, kind },
      (input) =>
        this.ledger.governance.submit(input.propertyId, input.description, input.caller, input.kind),
      (input, proposal) => ({
        action: "proposal.submitted",
        resourceId: String(proposal.id),
        actor: input.caller,
        detail: proposal.kind,
      }),
    );
  }

  voteOnProposal(
    caller: Identity,
    proposalId: number,
    choice: boolean,
  ): OperationResult<Proposal> {
    return this.perform(
      "voteOnProposal",
      VoteSchema,
      { caller, proposalId, choice },
      (input) => this.ledger.governance.vote(input.proposalId, input.caller, input.choice),
      (input) => ({
        action: "proposal.voted",
        resourceId: String(input.proposalId),
        actor: input.caller,
        detail: input.choice ? "yes" : "no",
      }),
    );
  }

  /**
   * Close a proposal. Domain errors raised by an execution strategy are
   * reported like any other failure; other errors propagate.
   */
  executeProposal(proposalId: number): OperationResult<Proposal> {
    return this.perform(
      "executeProposal",
      ExecuteProposalSchema,
      { proposalId },
      (input) => this.ledger.governance.execute(input.proposalId),
      (input, proposal) => ({
        action: "proposal.closed",
        resourceId: String(input.proposalId),
        actor: SYSTEM_ACTOR,
        detail: proposal.status,
      }),
    );
  }

  registerProposalExecutor(kind: string, executor: ProposalExecutor): void {
    this.ledger.governance.registerExecutor(kind, executor);
  }

  getProposal(proposalId: number): Proposal | undefined {
    return this.ledger.governance.get(proposalId);
  }

  getProposals(propertyId: PropertyId): readonly Proposal[] {
    return this.ledger.governance.forProperty(propertyId);
  }

  // ─── Audit ─────────────────────────────────────────────────────────

  auditTrail(query?: AuditLogQuery): readonly AuditLogEntry[] {
    return this.audit.query(query);
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private assertMayRegister(caller: Identity): void {
    if (this.registrationPolicy === "open") {
      return;
    }
    const role = this.access.roleOf(caller);
    if (role !== "manager" && role !== "admin") {
      throw new LedgerError(
        "UNAUTHORIZED",
        "Only managers and admins can register properties",
      );
    }
  }

  /**
   * Validate, apply, audit.
   *
   * Domain errors become failures; anything else propagates.
   */
  private perform<I, T>(
    operation: string,
    schema: ZodType<I, ZodTypeDef, unknown>,
    raw: unknown,
    apply: (input: I) => T,
    describe: (input: I, value: T) => AuditRecord,
  ): OperationResult<T> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = formatZodErrors(parsed.error);
      this.log.warn({ operation, code: "VALIDATION_ERROR", issues }, "Operation rejected");
      return fail("VALIDATION_ERROR", `Invalid input for ${operation}`, { issues });
    }

    let value: T;
    try {
      value = apply(parsed.data);
    } catch (error) {
      if (error instanceof LedgerError || error instanceof AccessError) {
        this.log.warn({ operation, code: error.code }, error.message);
        return fail(error.code, error.message);
      }
      throw error;
    }

    const entry = this.audit.append(describe(parsed.data, value));
    this.log.info(
      {
        operation,
        action: entry.action,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
        actor: entry.actor,
        sequence: entry.sequence,
      },
      "Operation committed",
    );
    return succeed(value);
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build a service from loaded configuration, bootstrapping the
 * configured admin if there is one.
 */
export function createServiceFromConfig(
  config: AppConfig,
  logger: Logger = createLogger(config),
): EstateService {
  const service = new EstateService(
    {
      registrationPolicy: config.REGISTRATION_POLICY,
      purgeStaleListings: config.PURGE_STALE_LISTINGS,
    },
    logger,
  );

  if (config.BOOTSTRAP_ADMIN !== undefined) {
    const result = service.bootstrapAdmin(config.BOOTSTRAP_ADMIN);
    if (!result.ok) {
      throw new Error(`Admin bootstrap failed: ${result.error.message}`);
    }
    logger.info({ admin: config.BOOTSTRAP_ADMIN }, "Admin bootstrapped from config");
  }

  return service;
}
