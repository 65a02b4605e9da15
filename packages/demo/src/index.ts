#!/usr/bin/env node
/**
 * @deedshare/demo — Interactive CLI walkthrough.
 *
 * Runs the full ownership lifecycle in your terminal:
 * bootstrap -> register -> issue -> deposit income -> claim ->
 * list -> buy -> propose -> vote -> execute -> statements
 *
 * Uses the service directly (no transport).
 */

import chalk from "chalk";
import { EstateService, silentLogger } from "@deedshare/service";
import type { OperationResult } from "@deedshare/service";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Unwrap a result, aborting the demo on failure. */
function expectOk<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     DEEDSHARE DEMO                       ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("           Fractional Property Ownership                  ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

const TOTAL_STEPS = 9;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of one property from registration to governance."));
  console.log(chalk.gray("  Every step runs against the real ledger, no mocks.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const service = new EstateService({ registrationPolicy: "manager" }, silentLogger());
  ok("Service initialized (registration policy: manager)");

  expectOk(service.bootstrapAdmin("admin"));
  expectOk(service.setRole("admin", "manager", "manager"));
  expectOk(service.setKycStatus("admin", "alice", true));
  expectOk(service.setKycStatus("admin", "bob", true));
  info("admin", service.getMyRole("admin"));
  info("manager", service.getMyRole("manager"));
  ok("Roles assigned, alice and bob KYC-verified");

  await sleep(DELAY_MS);

  // ─── Step 2: Register ───────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Register Property");

  const property = expectOk(
    service.registerProperty("manager", "Harbour Lofts", 100n, {
      location: "3 Quay Street",
      description: "Six-unit warehouse conversion",
    }),
  );
  info("id", String(property.id));
  info("name", property.name);
  info("total shares", property.totalShares.toString());
  ok(`Status: ${chalk.bold(property.status)}`);

  const denied = service.registerProperty("alice", "Side Project", 10n, {
    location: "unknown",
    description: "",
  });
  if (!denied.ok) {
    warn(`alice cannot register: ${denied.error.message}`);
  }

  await sleep(DELAY_MS);

  // ─── Step 3: Issue ──────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Issue Shares");

  expectOk(service.issueShares(property.id, "alice", 60n));
  expectOk(service.issueShares(property.id, "bob", 40n));
  info("alice", service.getOwnership(property.id, "alice").toString());
  info("bob", service.getOwnership(property.id, "bob").toString());

  const supply = service.getSupplyReport(property.id);
  if (supply !== undefined) {
    info("available", supply.sharesAvailable.toString());
    ok(`Supply balanced: ${String(supply.balanced)}`);
  }

  await sleep(DELAY_MS);

  // ─── Step 4: Deposit Income ─────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Deposit Rental Income");

  const deposit = expectOk(service.depositRentalIncome(property.id, 1000n));
  for (const allocation of deposit.allocations) {
    info(allocation.holder, `${allocation.amount.toString()} (${allocation.shares.toString()} shares)`);
  }
  ok(`Distributed ${deposit.distributed.toString()} of ${deposit.amount.toString()}`);

  await sleep(DELAY_MS);

  // ─── Step 5: Claim ──────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Claim Income");

  const claimed = expectOk(service.claimIncome(property.id, "alice"));
  info("alice claimed", claimed.toString());
  info("bob unclaimed", service.getUnclaimedIncome(property.id, "bob").toString());
  ok("Entitlement zeroed after claim");

  await sleep(DELAY_MS);

  // ─── Step 6: Marketplace ────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Marketplace");

  const listing = expectOk(service.listSharesForSale(property.id, "alice", 10n, 5n));
  info("listing", `#${String(listing.id)}: ${listing.amount.toString()} @ ${listing.pricePerShare.toString()}`);

  const settlement = expectOk(service.buyShares(property.id, "alice", "bob", 4n));
  info("bought", `${settlement.amount.toString()} shares for ${settlement.totalPrice.toString()}`);
  info("remaining", settlement.remaining.toString());
  info("alice", service.getOwnership(property.id, "alice").toString());
  info("bob", service.getOwnership(property.id, "bob").toString());
  ok("Shares moved, listing shrunk");

  await sleep(DELAY_MS);

  // ─── Step 7: Propose & Vote ─────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Propose & Vote");

  service.registerProposalExecutor("maintenance", (approved) => {
    expectOk(service.updatePropertyStatus("admin", approved.propertyId, "maintenance"));
  });

  const proposal = expectOk(
    service.submitProposal("alice", property.id, "Close for roof repairs", "maintenance"),
  );
  expectOk(service.voteOnProposal("alice", proposal.id, true));
  const tallied = expectOk(service.voteOnProposal("bob", proposal.id, false));
  info("yes", tallied.yesVotes.toString());
  info("no", tallied.noVotes.toString());
  ok("Votes weighted by shares held");

  await sleep(DELAY_MS);

  // ─── Step 8: Execute ────────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Execute Proposal");

  const executed = expectOk(service.executeProposal(proposal.id));
  ok(`Proposal status: ${chalk.bold(executed.status)}`);
  ok(`Property status: ${chalk.bold(service.getProperty(property.id)?.status ?? "unknown")}`);

  await sleep(DELAY_MS);

  // ─── Step 9: Summary ────────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Summary");

  console.log();
  for (const holder of ["alice", "bob"]) {
    const holdings = service
      .getOwnershipStatement(holder)
      .map((r) => `${r.propertyName}: ${r.shares.toString()}`)
      .join(", ");
    const income = service
      .getRentalIncomeStatement(holder)
      .map((r) => `${r.propertyName}: ${r.income.toString()}`)
      .join(", ");
    console.log(chalk.white(`    ${holder.padEnd(8)} shares   `) + chalk.cyan.bold(holdings || "none"));
    console.log(chalk.white(`    ${"".padEnd(8)} income   `) + chalk.cyan.bold(income || "none"));
  }
  console.log(chalk.white("    Audit entries:   ") + chalk.cyan.bold(String(service.auditTrail().length)));
  console.log(chalk.white("    Open listings:   ") + chalk.cyan.bold(String(service.getMarketplaceListings().length)));

  console.log();
  console.log(chalk.gray("    Shares are conserved, income follows ownership,"));
  console.log(chalk.gray("    and holders decide."));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
