/**
 * @mintgate/attestation — Signature attestation.
 *
 * The notifier interface the coordinator records sign actions through,
 * and an in-memory notary implementing it.
 */

export { InMemoryNotary } from "./notary.js";
export { AttestationError } from "./types.js";
export type {
  Attestation,
  AttestationId,
  AttestationNotifier,
  AttestationErrorCode,
} from "./types.js";
