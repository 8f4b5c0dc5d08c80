/**
 * End-to-end tests through the Launchpad composition root.
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { getContractAddress, zeroAddress } from "viem";
import type { Identity } from "@mintgate/types";
import { InMemoryVestingRegistry } from "@mintgate/liquidity";
import { LAUNCH_EVENTS } from "@mintgate/event-store";
import { Launchpad } from "../src/launchpad.js";
import { InMemoryTokenDeployer } from "../src/token-deployer.js";
import { STARTING_SQRT_PRICE_X96 } from "../src/constants.js";
import { LaunchpadError } from "../src/errors.js";
import {
  A,
  ADMIN,
  B,
  C,
  COORDINATOR,
  D,
  FACTORY,
  HOOK,
  PEPE,
  REQUESTER,
  catchLaunchpadError,
} from "./helpers.js";

function createLaunchpad(overrides: { deployer?: InMemoryTokenDeployer; vesting?: InMemoryVestingRegistry } = {}): Launchpad {
  return new Launchpad({
    administrator: ADMIN,
    factoryAddress: FACTORY,
    coordinatorAddress: COORDINATOR,
    hookAddress: HOOK,
    liquidityThreshold: 1_000n,
    ...overrides,
  });
}

describe("Launchpad", () => {
  let launchpad: Launchpad;

  beforeEach(() => {
    launchpad = createLaunchpad();
  });

  // ─── Scenarios ──────────────────────────────────────────────────────

  it("executes a three-signer request on the second signature", () => {
    const id = launchpad.submitCreationRequest([A, B, C], REQUESTER, PEPE);
    expect(id).toBe(1);

    launchpad.sign(id, A);
    expect(launchpad.getSignatureSet(id).collectedSignatures).toEqual([A]);
    expect(launchpad.getRequest(id).status).toBe("pending");

    const result = launchpad.sign(id, B);
    expect(result.executed).toBe(true);

    const request = launchpad.getRequest(id);
    const token = getContractAddress({ from: FACTORY, nonce: 1n });
    expect(request.status).toBe("executed");
    expect(request.createdTokenAddress).toBe(token);
    expect(request.approvals).toEqual([A, B]);

    const pool = request.poolId === undefined ? undefined : launchpad.getPool(request.poolId);
    expect(pool?.key).toEqual({
      currency0: zeroAddress,
      currency1: token,
      fee: 300,
      tickSpacing: 60,
      hooks: HOOK,
    });
    expect(pool?.sqrtPriceX96).toBe(79228162514264337593543950336n);

    expect(catchLaunchpadError(() => launchpad.sign(id, C)).code).toBe("TRANSACTION_ALREADY_EXECUTED");
  });

  it("rejects a non-signer without changing state", () => {
    const id = launchpad.submitCreationRequest([A, B, C], REQUESTER, PEPE);
    launchpad.sign(id, A);

    expect(catchLaunchpadError(() => launchpad.sign(id, D)).code).toBe("NOT_A_SIGNER");
    expect(launchpad.getSignatureSet(id).collectedSignatures).toEqual([A]);
    expect(launchpad.getRequest(id).status).toBe("pending");
  });

  it("rejects a repeated signature", () => {
    const id = launchpad.submitCreationRequest([A, B, C], REQUESTER, PEPE);
    launchpad.sign(id, A);
    expect(catchLaunchpadError(() => launchpad.sign(id, A)).code).toBe("ALREADY_SIGNED");
  });

  it("leaves the request pending and retryable when the pool already exists", () => {
    const deployer = new InMemoryTokenDeployer(FACTORY);
    launchpad = createLaunchpad({ deployer });
    const id = launchpad.submitCreationRequest([A, B, C], REQUESTER, PEPE);
    launchpad.liquidity.initializePool(
      zeroAddress,
      deployer.peekNextAddress(),
      300,
      60,
      STARTING_SQRT_PRICE_X96,
    );

    launchpad.sign(id, A);
    const err = catchLaunchpadError(() => launchpad.sign(id, B));
    expect(err.code).toBe("POOL_ALREADY_INITIALIZED");
    expect(err.category).toBe("integration");

    expect(launchpad.getRequest(id).status).toBe("pending");
    expect(launchpad.getSignatureSet(id).collectedSignatures).toEqual([A]);
    expect(launchpad.getSignatureSet(id).status).toBe("open");

    expect(launchpad.sign(id, B).executed).toBe(true);
    expect(launchpad.getRequest(id).approvals).toEqual([A, B]);
  });

  it("keeps later requests executable after a contested address", () => {
    const deployer = new InMemoryTokenDeployer(FACTORY);
    launchpad = createLaunchpad({ deployer });
    const first = launchpad.submitCreationRequest([A, B], REQUESTER, PEPE);
    const second = launchpad.submitCreationRequest([A, B], REQUESTER, PEPE);
    const contested = deployer.peekNextAddress();
    launchpad.liquidity.initializePool(zeroAddress, contested, 300, 60, STARTING_SQRT_PRICE_X96);

    expect(catchLaunchpadError(() => launchpad.sign(first, B)).code)
      .toBe("POOL_ALREADY_INITIALIZED");

    const executed = launchpad.executeCreation(ADMIN, second);
    expect(executed.status).toBe("executed");
    expect(executed.createdTokenAddress).not.toBe(contested);

    const retried = launchpad.sign(first, B);
    expect(retried.executed).toBe(true);
    expect(retried.request.createdTokenAddress).not.toBe(contested);
    expect(retried.request.createdTokenAddress).not.toBe(executed.createdTokenAddress);
  });

  it("lets the administrator execute directly", () => {
    const id = launchpad.submitCreationRequest([A, B, C], REQUESTER, PEPE);
    launchpad.sign(id, A);

    expect(catchLaunchpadError(() => launchpad.executeCreation(A, id)).code).toBe("UNAUTHORIZED");
    expect(launchpad.executeCreation(ADMIN, id).status).toBe("executed");
    expect(catchLaunchpadError(() => launchpad.sign(id, B)).code).toBe("TRANSACTION_ALREADY_EXECUTED");
  });

  it("closes the signature set when the administrator executes", () => {
    const id = launchpad.submitCreationRequest([A, B, C], REQUESTER, PEPE);
    launchpad.sign(id, A);
    launchpad.executeCreation(ADMIN, id);

    const set = launchpad.getSignatureSet(id);
    expect(set.status).toBe("closed");
    expect(set.collectedSignatures).toEqual([]);
    expect(catchLaunchpadError(() => launchpad.unsign(id, A)).code).toBe("TRANSACTION_ALREADY_EXECUTED");
  });

  it("revokes the attestation on unsign", () => {
    const id = launchpad.submitCreationRequest([A, B, C], REQUESTER, PEPE);
    const signed = launchpad.sign(id, A);
    const unsigned = launchpad.unsign(id, A);

    expect(unsigned.revokedAttestationId).toBe(signed.attestationId);
    const attestation = signed.attestationId === undefined
      ? undefined
      : launchpad.getAttestation(signed.attestationId);
    expect(attestation?.revoked).toBe(true);
    expect(attestation?.revocationReason).toBe("signature withdrawn");
  });

  it("hands early liquidity providers to vesting after launch", () => {
    const vesting = new InMemoryVestingRegistry();
    launchpad = createLaunchpad({ vesting });
    const id = launchpad.submitCreationRequest([A, B], REQUESTER, PEPE);
    const { request } = launchpad.sign(id, A);
    const poolId = request.poolId;
    expect(poolId).toBeDefined();
    if (poolId === undefined) return;

    launchpad.addLiquidity(poolId, C, 600n);
    launchpad.addLiquidity(poolId, D, 400n);
    launchpad.addLiquidity(poolId, C, 50n);

    expect(vesting.getHandoff(poolId)?.beneficiaries).toEqual([
      { provider: C, liquidity: 600n },
      { provider: D, liquidity: 400n },
    ]);
    expect(launchpad.removeLiquidity(poolId, C, 650n).liquidity).toBe(400n);
  });

  it("keeps a verifiable event log across the whole flow", () => {
    const id = launchpad.submitCreationRequest([A, B, C], REQUESTER, PEPE);
    launchpad.sign(id, A);
    launchpad.unsign(id, A);
    launchpad.sign(id, C);
    launchpad.sign(id, B);

    const types = launchpad.events.readAll().map((e) => e.event.type);
    expect(types).toEqual([
      LAUNCH_EVENTS.REQUEST_QUEUED,
      LAUNCH_EVENTS.SIGNATURE_ADDED,
      LAUNCH_EVENTS.SIGNATURE_REMOVED,
      LAUNCH_EVENTS.SIGNATURE_ADDED,
      LAUNCH_EVENTS.POOL_INITIALIZED,
      LAUNCH_EVENTS.MEMECOIN_CREATED,
      LAUNCH_EVENTS.SIGNATURE_ADDED,
      LAUNCH_EVENTS.QUORUM_REACHED,
    ]);
    expect(launchpad.events.verifyIntegrity().valid).toBe(true);
  });

  it("tracks independent requests separately", () => {
    const first = launchpad.submitCreationRequest([A, B, C], REQUESTER, PEPE);
    const second = launchpad.submitCreationRequest([B, C, D], REQUESTER, { ...PEPE, symbol: "PEPE2" });

    launchpad.sign(first, A);
    launchpad.sign(second, B);
    launchpad.sign(second, D);

    expect(launchpad.listRequests("executed").map((r) => r.id)).toEqual([second]);
    expect(launchpad.getSignatureSet(first).collectedSignatures).toEqual([A]);
    expect(launchpad.getRequest(second).createdTokenAddress)
      .toBe(getContractAddress({ from: FACTORY, nonce: 1n }));
  });

  // ─── Properties ─────────────────────────────────────────────────────

  describe("properties", () => {
    const SIGNERS: readonly Identity[] = [A, B, C, D];
    const arbOp = fc.record({
      kind: fc.constantFrom("sign" as const, "unsign" as const),
      signer: fc.constantFrom(...SIGNERS),
    });

    it("matches a model of the signature set under any sign/unsign sequence", () => {
      fc.assert(
        fc.property(fc.array(arbOp, { maxLength: 20 }), (ops) => {
          const pad = createLaunchpad();
          const id = pad.submitCreationRequest(SIGNERS, REQUESTER, PEPE);
          const required = pad.coordinator.requiredApprovals(id);
          let model: Identity[] = [];
          let executed = false;

          for (const { kind, signer } of ops) {
            let code: string | undefined;
            try {
              if (kind === "sign") pad.sign(id, signer);
              else pad.unsign(id, signer);
            } catch (err) {
              if (!(err instanceof LaunchpadError)) throw err;
              code = err.code;
            }

            if (executed) {
              expect(code).toBe("TRANSACTION_ALREADY_EXECUTED");
            } else if (kind === "sign") {
              if (model.includes(signer)) {
                expect(code).toBe("ALREADY_SIGNED");
              } else if (model.length + 1 >= required) {
                expect(code).toBeUndefined();
                executed = true;
                model = [];
              } else {
                expect(code).toBeUndefined();
                model = [...model, signer];
              }
            } else if (!model.includes(signer)) {
              expect(code).toBe("NOT_SIGNED");
            } else {
              expect(code).toBeUndefined();
              model = model.filter((s) => s !== signer);
            }

            const set = pad.getSignatureSet(id);
            expect(set.collectedSignatures).toEqual(model);
            expect(set.collectedSignatures.length).toBeLessThan(required);
            expect(new Set(set.collectedSignatures).size).toBe(set.collectedSignatures.length);
            expect(pad.getRequest(id).status).toBe(executed ? "executed" : "pending");
          }

          if (executed) {
            expect(pad.getRequest(id).createdTokenAddress).toBeDefined();
            expect(pad.getRequest(id).approvals).toHaveLength(required);
          }
          expect(pad.events.verifyIntegrity().valid).toBe(true);
        }),
        { numRuns: 50 },
      );
    });
  });
});
