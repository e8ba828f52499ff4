/**
 * Authentication state machine, one per ConnectionInstance.
 *
 *   unauthenticated → challenge_requested → proof_sent → authenticated
 *                            ↓                  ↓
 *                          failed ←─────────────┘
 *
 * Each transition returns a new state object; an instance id change
 * always starts over from `unauthenticated`.
 *
 * @module session/session-state
 */

export type AuthPhase =
  | "unauthenticated"
  | "challenge_requested"
  | "proof_sent"
  | "authenticated"
  | "failed";

const VALID_TRANSITIONS: ReadonlyMap<AuthPhase, readonly AuthPhase[]> = new Map<
  AuthPhase,
  readonly AuthPhase[]
>([
  ["unauthenticated", ["challenge_requested"]],
  ["challenge_requested", ["proof_sent", "failed"]],
  ["proof_sent", ["authenticated", "failed"]],
  // The server revoked the session (AUTH_FAILED) or the user logged out.
  ["authenticated", ["unauthenticated"]],
  ["failed", ["challenge_requested"]],
]);

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: AuthPhase,
    public readonly to: AuthPhase,
  ) {
    super(
      `Invalid auth transition: ${from} → ${to}. ` +
        `Allowed from ${from}: [${(VALID_TRANSITIONS.get(from) ?? []).join(", ")}]`,
    );
    this.name = "InvalidTransitionError";
  }
}

export interface AuthState {
  readonly phase: AuthPhase;
  /** ConnectionInstance this state belongs to. */
  readonly instanceId: string | null;
  readonly enteredAt: number;
}

export function initialAuthState(instanceId: string | null, now: number): AuthState {
  return { phase: "unauthenticated", instanceId, enteredAt: now };
}

export function canTransition(from: AuthPhase, to: AuthPhase): boolean {
  return (VALID_TRANSITIONS.get(from) ?? []).includes(to);
}

/**
 * @throws InvalidTransitionError
 */
export function transitionAuth(state: AuthState, to: AuthPhase, now: number): AuthState {
  if (!canTransition(state.phase, to)) {
    throw new InvalidTransitionError(state.phase, to);
  }
  return { phase: to, instanceId: state.instanceId, enteredAt: now };
}
