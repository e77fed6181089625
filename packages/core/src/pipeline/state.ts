import { PipelineStateError } from '@diffwatch/shared';
import type { PipelineState } from '@diffwatch/shared';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  MIRRORING: ['CHECKPOINT_READ', 'FAILED'],
  CHECKPOINT_READ: ['HARVESTING', 'FAILED'],
  HARVESTING: ['NO_CHANGE', 'PROMPTING', 'FAILED'],
  NO_CHANGE: ['CHECKPOINT_ADVANCE', 'FAILED'],
  PROMPTING: ['DISPATCHING', 'FAILED'],
  DISPATCHING: ['NOTIFYING', 'FAILED'],
  NOTIFYING: ['CHECKPOINT_ADVANCE', 'FAILED'],
  CHECKPOINT_ADVANCE: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

// A dry run stops before anything is dispatched, sent or recorded.
const DRY_RUN_TRANSITIONS: Partial<Record<PipelineState, readonly PipelineState[]>> = {
  NO_CHANGE: ['DONE'],
  PROMPTING: ['DONE'],
};

export const INITIAL_STATE: PipelineState = 'MIRRORING';

export function isTerminal(state: PipelineState): boolean {
  return state === 'DONE' || state === 'FAILED';
}

export function canTransition(from: PipelineState, to: PipelineState, dryRun = false): boolean {
  if (TRANSITIONS[from].includes(to)) return true;
  return dryRun && (DRY_RUN_TRANSITIONS[from]?.includes(to) ?? false);
}

/**
 * Tracks the state of one scan run and rejects illegal transitions.
 */
export class PipelineStateMachine {
  private current: PipelineState | null = null;

  constructor(private readonly dryRun = false) {}

  get state(): PipelineState | null {
    return this.current;
  }

  /**
   * Moves to `to` and returns the previous state (`null` on the first call).
   */
  transition(to: PipelineState): PipelineState | null {
    const from = this.current;
    if (from === null) {
      if (to !== INITIAL_STATE) {
        throw new PipelineStateError(`A run must start in ${INITIAL_STATE}, not ${to}`);
      }
    } else if (!canTransition(from, to, this.dryRun)) {
      throw new PipelineStateError(`Illegal transition ${from} -> ${to}`, {
        details: { from, to, dryRun: this.dryRun },
      });
    }
    this.current = to;
    return from;
  }
}
