/**
 * Token deployment.
 *
 * The factory deploys through a TokenDeployer so the launchpad can be
 * driven without a chain. The in-memory deployer derives addresses the
 * way CREATE does (sender + nonce), so they are predictable in advance.
 */

import { getContractAddress } from "viem";
import type { Identity, RequestId, TokenSpec } from "@mintgate/types";

export interface DeployedToken {
  readonly address: Identity;
  readonly requestId: RequestId;
  readonly spec: TokenSpec;
  readonly nonce: bigint;
  readonly deployedAt: string;
}

export interface TokenDeployer {
  deploy(spec: TokenSpec, requestId: RequestId): DeployedToken;

  /**
   * Undo a deployment whose surrounding execution failed. The nonce stays
   * consumed, so the next deployment lands on a fresh address.
   */
  revert(address: Identity): void;
}

export class InMemoryTokenDeployer implements TokenDeployer {
  readonly deployer: Identity;
  private readonly tokens = new Map<Identity, DeployedToken>();
  private nonce = 1n;

  constructor(deployer: Identity) {
    this.deployer = deployer;
  }

  deploy(spec: TokenSpec, requestId: RequestId): DeployedToken {
    const token: DeployedToken = {
      address: this.peekNextAddress(),
      requestId,
      spec,
      nonce: this.nonce,
      deployedAt: new Date().toISOString(),
    };
    this.tokens.set(token.address, token);
    this.nonce++;
    return token;
  }

  revert(address: Identity): void {
    this.tokens.delete(address);
  }

  /** Address the next deployment will land on. */
  peekNextAddress(): Identity {
    return getContractAddress({ from: this.deployer, nonce: this.nonce });
  }

  getToken(address: Identity): DeployedToken | undefined {
    return this.tokens.get(address);
  }

  listTokens(): readonly DeployedToken[] {
    return [...this.tokens.values()];
  }
}
