/**
 * Message pipeline states and the legal transitions between them.
 *
 * ```
 * received → classifying ─┬─ small_talk_generating ────────────┬→ persisting → done
 *                         └─ retrieving → fusing → generating ─┘
 * ```
 *
 * Any state before `persisting` may also jump straight to it with the
 * fallback reply (deadline or unexpected error).
 */

export type OrchestratorState =
  | 'received'
  | 'classifying'
  | 'small_talk_generating'
  | 'retrieving'
  | 'fusing'
  | 'generating'
  | 'persisting'
  | 'done';

export const TRANSITIONS: Readonly<Record<OrchestratorState, readonly OrchestratorState[]>> = {
  received: ['classifying', 'persisting'],
  classifying: ['small_talk_generating', 'retrieving', 'persisting'],
  small_talk_generating: ['persisting'],
  retrieving: ['fusing', 'persisting'],
  fusing: ['generating', 'persisting'],
  generating: ['persisting'],
  persisting: ['done'],
  done: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: OrchestratorState,
    readonly to: OrchestratorState,
  ) {
    super(`Illegal state transition: ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function canTransition(from: OrchestratorState, to: OrchestratorState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Current state of one message plus the path it took.
 */
export class StateMachine {
  private current: OrchestratorState = 'received';
  private readonly path: OrchestratorState[] = ['received'];

  get state(): OrchestratorState {
    return this.current;
  }

  get visited(): OrchestratorState[] {
    return [...this.path];
  }

  transition(to: OrchestratorState): void {
    if (!canTransition(this.current, to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.path.push(to);
  }
}
