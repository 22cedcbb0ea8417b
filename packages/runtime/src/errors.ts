/**
 * @lanekeeper/runtime — Service errors.
 */

import type { GuardViolation } from "@lanekeeper/types";

export type TransitionErrorCode = "GUARD_VIOLATION" | "ACTOR_REQUIRED";

/**
 * A requested transition was refused before anything was written.
 */
export class TransitionError extends Error {
  constructor(
    public readonly code: TransitionErrorCode,
    message: string,
    public readonly violation?: GuardViolation,
  ) {
    super(message);
    this.name = "TransitionError";
  }
}
