#!/usr/bin/env node
/**
 * @mintgate/demo — Interactive CLI walkthrough.
 *
 * Runs one memecoin launch in your terminal:
 * submit -> sign -> withdraw -> quorum -> token + pool -> liquidity ->
 * vesting handoff -> attestations -> event log check
 *
 * Uses real domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import type { Identity, TokenSpec } from "@mintgate/types";
import { InMemoryNotary } from "@mintgate/attestation";
import { InMemoryEventStore } from "@mintgate/event-store";
import { InMemoryVestingRegistry } from "@mintgate/liquidity";
import { InMemoryTokenDeployer, Launchpad, LaunchpadError } from "@mintgate/launchpad";

// =============================================================================
// Cast
// =============================================================================

const ADMIN: Identity = "0x1000000000000000000000000000000000000001";
const FACTORY: Identity = "0x2000000000000000000000000000000000000002";
const COORDINATOR: Identity = "0x3000000000000000000000000000000000000003";
const HOOK: Identity = "0x4000000000000000000000000000000000000004";

const REQUESTER: Identity = "0x5555555555555555555555555555555555555555";
const ALICE: Identity = "0x1111111111111111111111111111111111111111";
const BOB: Identity = "0x2222222222222222222222222222222222222222";
const CAROL: Identity = "0x3333333333333333333333333333333333333333";

const NAMES = new Map<string, string>([
  [REQUESTER, "requester"],
  [ALICE, "alice"],
  [BOB, "bob"],
  [CAROL, "carol"],
]);

const DOGE2: TokenSpec = {
  name: "Doge Two",
  symbol: "DOGE2",
  totalSupply: 420_000_000n * 10n ** 18n,
  maxSupply: 0n,
  mintable: false,
  burnable: true,
  supplyCapped: false,
};

const THRESHOLD = 1_000n * 10n ** 18n;

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function who(identity: string): string {
  return NAMES.get(identity) ?? identity;
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     MINTGATE DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Multi-signer memecoin launches                  ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function hashLine(label: string, hash: string): void {
  const short = hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.yellow(short));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function units(amount: bigint): string {
  return `${(amount / 10n ** 18n).toLocaleString("en-US")} units`;
}

const TOTAL_STEPS = 10;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Walk-through of one memecoin launch."));
  console.log(chalk.gray("  Every step uses real domain packages, in memory.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const events = new InMemoryEventStore();
  const notary = new InMemoryNotary();
  const vesting = new InMemoryVestingRegistry();
  const deployer = new InMemoryTokenDeployer(FACTORY);

  const launchpad = new Launchpad({
    administrator: ADMIN,
    factoryAddress: FACTORY,
    coordinatorAddress: COORDINATOR,
    hookAddress: HOOK,
    liquidityThreshold: THRESHOLD,
    deployer,
    vesting,
    notary,
    events,
  });

  info("factory", FACTORY);
  info("coordinator", COORDINATOR);
  info("hook", HOOK);
  info("threshold", units(THRESHOLD));
  ok("Launchpad wired (factory ⇄ coordinator, liquidity bootstrap bound)");

  await sleep(DELAY_MS);

  // ─── Step 2: Submit ─────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Submit Creation Request");

  const requestId = launchpad.submitCreationRequest([ALICE, BOB, CAROL], REQUESTER, DOGE2);
  const set = launchpad.getSignatureSet(requestId);

  info("request id", String(requestId));
  info("token", `${DOGE2.name} (${DOGE2.symbol})`);
  info("supply", units(DOGE2.totalSupply));
  info("signers", set.eligibleSigners.map(who).join(", "));
  info("quorum", `${set.requiredApprovals} of ${set.eligibleSigners.length}`);
  ok(`Status: ${chalk.bold(launchpad.getRequest(requestId).status)}`);

  await sleep(DELAY_MS);

  // ─── Step 3: First Signature ────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Alice Signs");

  const first = launchpad.sign(requestId, ALICE);
  info("collected", first.collectedSignatures.map(who).join(", "));
  if (first.attestationId !== undefined) {
    hashLine("attestation", first.attestationId);
  }
  ok("Signature recorded and notarized");

  await sleep(DELAY_MS);

  // ─── Step 4: Withdraw & Re-sign ─────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Alice Withdraws, Then Re-signs");

  const withdrawn = launchpad.unsign(requestId, ALICE);
  info("collected", withdrawn.collectedSignatures.length === 0 ? "none" : withdrawn.collectedSignatures.map(who).join(", "));
  if (withdrawn.revokedAttestationId !== undefined) {
    hashLine("revoked", withdrawn.revokedAttestationId);
  }
  launchpad.sign(requestId, ALICE);
  ok("Withdrawal revoked the attestation; the new signature got a fresh one");

  await sleep(DELAY_MS);

  // ─── Step 5: Rejected Signature ─────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Outsider Tries to Sign");

  try {
    launchpad.sign(requestId, REQUESTER);
    warn("Outsider signature was accepted (unexpected)");
  } catch (err) {
    if (!(err instanceof LaunchpadError)) throw err;
    info("error", `${err.code} (${err.category})`);
    ok("Only eligible signers count toward quorum");
  }

  await sleep(DELAY_MS);

  // ─── Step 6: Quorum ─────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Bob Signs: Quorum Reached");

  const final = launchpad.sign(requestId, BOB);
  const request = final.request;
  info("executed", String(final.executed));
  info("approvals", (request.approvals ?? []).map(who).join(", "));
  info("token address", request.createdTokenAddress ?? "-");
  if (request.poolId !== undefined) {
    hashLine("pool id", request.poolId);
  }
  ok(`Status: ${chalk.bold(request.status)}`);

  await sleep(DELAY_MS);

  // ─── Step 7: Pool ───────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Inspect Pool");

  const poolId = request.poolId;
  if (poolId === undefined) {
    throw new Error("executed request carries no pool id");
  }
  const pool = launchpad.getPool(poolId);
  if (pool !== undefined) {
    info("currency0", pool.key.currency0);
    info("currency1", pool.key.currency1);
    info("fee", `${pool.key.fee / 10_000}%`);
    info("tick spacing", String(pool.key.tickSpacing));
    info("sqrtPriceX96", pool.sqrtPriceX96.toString());
    ok("Pool initialized at 1:1 against the native currency");
  }

  await sleep(DELAY_MS);

  // ─── Step 8: Liquidity ──────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Provide Liquidity");

  launchpad.addLiquidity(poolId, ALICE, 600n * 10n ** 18n);
  info("alice", `+${units(600n * 10n ** 18n)}`);
  launchpad.addLiquidity(poolId, CAROL, 150n * 10n ** 18n);
  info("carol", `+${units(150n * 10n ** 18n)}`);
  launchpad.removeLiquidity(poolId, CAROL, 50n * 10n ** 18n);
  info("carol", `-${units(50n * 10n ** 18n)}`);
  const after = launchpad.addLiquidity(poolId, BOB, 300n * 10n ** 18n);
  info("bob", `+${units(300n * 10n ** 18n)}`);
  info("total", units(after.liquidity));
  ok(after.vestingTriggered ? "Threshold reached" : "Still below threshold");

  await sleep(DELAY_MS);

  // ─── Step 9: Vesting ────────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Vesting Handoff");

  const handoff = vesting.getHandoff(poolId);
  if (handoff !== undefined) {
    for (const b of handoff.beneficiaries) {
      info(who(b.provider), units(b.liquidity));
    }
    ok(`Early providers handed to vesting (${handoff.beneficiaries.length} beneficiaries)`);
  } else {
    warn("No vesting handoff recorded");
  }

  await sleep(DELAY_MS);

  // ─── Step 10: Event Log ─────────────────────────────────────────────

  stepHeader(10, TOTAL_STEPS, "Verify Event Log");

  const allEvents = events.readAll();
  console.log();
  for (const se of allEvents) {
    const line = JSON.stringify({
      type: se.event.type,
      stream: se.streamId,
      hash: se.hash.slice(0, 12) + "...",
    });
    console.log(chalk.gray("    ") + chalk.dim(line));
  }
  const integrity = events.verifyIntegrity();
  if (integrity.valid) {
    ok(chalk.green.bold("CHAIN VALID") + ` (${allEvents.length} events, ${notary.count} attestations)`);
  } else {
    warn(`Hash chain broken at ${integrity.errors.map((e) => e.position).join(", ")}`);
  }

  console.log();
  console.log(chalk.white("    Tokens deployed:     ") + chalk.cyan.bold(String(deployer.listTokens().length)));
  console.log(chalk.white("    Pool liquidity:      ") + chalk.cyan.bold(units(after.liquidity)));
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(allEvents.length)));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
