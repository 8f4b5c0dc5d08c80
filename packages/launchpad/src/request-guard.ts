/**
 * Per-request exclusive guard.
 *
 * A component runs every mutation of a request inside `run`. A nested
 * attempt on the same id while the first is still in flight fails
 * instead of interleaving with it.
 */

import type { RequestId } from "@mintgate/types";
import { StateConflictError } from "./errors.js";

export class RequestGuard {
  private readonly held = new Set<RequestId>();
  private readonly owner: string;

  constructor(owner: string) {
    this.owner = owner;
  }

  run<T>(requestId: RequestId, fn: () => T): T {
    if (this.held.has(requestId)) {
      throw new StateConflictError(
        "REQUEST_LOCKED",
        `Request ${requestId} is already being processed by the ${this.owner}`,
      );
    }
    this.held.add(requestId);
    try {
      return fn();
    } finally {
      this.held.delete(requestId);
    }
  }

  isHeld(requestId: RequestId): boolean {
    return this.held.has(requestId);
  }
}
