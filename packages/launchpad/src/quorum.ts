export type QuorumMode = "all-but-one" | "unanimous";

export const DEFAULT_QUORUM_MODE: QuorumMode = "all-but-one";

/**
 * Approvals needed before a request executes.
 *
 * "all-but-one" lets one signer abstain; "unanimous" needs everyone.
 */
export function requiredApprovals(mode: QuorumMode, signerCount: number): number {
  return mode === "unanimous" ? signerCount : signerCount - 1;
}
