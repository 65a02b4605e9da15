/**
 * Operation input schemas.
 *
 * Each operation's arguments are validated against a Zod schema before
 * they reach the ledger, so inputs arriving from an untyped transport
 * are held to the same rules as typed callers.
 */

import { z } from "zod";
import type { ZodError } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IdentitySchema = z.string().min(1).max(256);

export const PropertyIdSchema = z.number().int().positive();

export const ProposalIdSchema = z.number().int().positive();

/** Share counts, income units and prices */
export const QuantitySchema = z.bigint().nonnegative();

/** Share counts that must move something */
export const TradeQuantitySchema = z.bigint().positive();

export const RoleSchema = z.enum(["admin", "manager", "user"]);

export const PropertyStatusSchema = z.enum(["active", "maintenance", "sold"]);

export const PropertyMetadataSchema = z.object({
  location: z.string().max(512),
  description: z.string().max(4096),
});

// =============================================================================
// Access
// =============================================================================

export const BootstrapAdminSchema = z.object({
  identity: IdentitySchema,
});

export const SetRoleSchema = z.object({
  caller: IdentitySchema,
  user: IdentitySchema,
  role: RoleSchema,
});

export const SetKycSchema = z.object({
  caller: IdentitySchema,
  user: IdentitySchema,
  verified: z.boolean(),
});

// =============================================================================
// Properties
// =============================================================================

export const RegisterPropertySchema = z.object({
  caller: IdentitySchema,
  name: z.string().min(1).max(256),
  totalShares: QuantitySchema,
  metadata: PropertyMetadataSchema,
});

export const UpdateMetadataSchema = z.object({
  caller: IdentitySchema,
  propertyId: PropertyIdSchema,
  metadata: PropertyMetadataSchema,
});

export const UpdateStatusSchema = z.object({
  caller: IdentitySchema,
  propertyId: PropertyIdSchema,
  status: PropertyStatusSchema,
});

// =============================================================================
// Shares
// =============================================================================

export const IssueSharesSchema = z.object({
  propertyId: PropertyIdSchema,
  holder: IdentitySchema,
  amount: QuantitySchema,
});

export const TransferSharesSchema = z.object({
  propertyId: PropertyIdSchema,
  from: IdentitySchema,
  to: IdentitySchema,
  amount: QuantitySchema,
});

export const ListSharesSchema = z.object({
  propertyId: PropertyIdSchema,
  seller: IdentitySchema,
  amount: TradeQuantitySchema,
  pricePerShare: QuantitySchema,
});

export const BuySharesSchema = z.object({
  propertyId: PropertyIdSchema,
  seller: IdentitySchema,
  buyer: IdentitySchema,
  amount: TradeQuantitySchema,
});

// =============================================================================
// Income
// =============================================================================

export const DepositIncomeSchema = z.object({
  propertyId: PropertyIdSchema,
  amount: QuantitySchema,
});

export const ClaimIncomeSchema = z.object({
  propertyId: PropertyIdSchema,
  holder: IdentitySchema,
});

// =============================================================================
// Governance
// =============================================================================

export const SubmitProposalSchema = z.object({
  caller: IdentitySchema,
  propertyId: PropertyIdSchema,
  description: z.string().min(1).max(4096),
  kind: z.string().min(1).max(64),
});

export const VoteSchema = z.object({
  caller: IdentitySchema,
  proposalId: ProposalIdSchema,
  choice: z.boolean(),
});

export const ExecuteProposalSchema = z.object({
  proposalId: ProposalIdSchema,
});

// =============================================================================
// Issue formatting
// =============================================================================

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
