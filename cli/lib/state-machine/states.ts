/**
 * Release run phases and the transitions between them
 */

export const ReleasePhase = {
  DISCOVER: 'discover',
  EVALUATE: 'evaluate',
  SYNCHRONIZE: 'synchronize',
  ROLL_CHANGELOGS: 'roll_changelogs',
  AGGREGATE_NOTES: 'aggregate_notes',
  HANDOFF: 'handoff',
  DONE: 'done',
  FAILED: 'failed'
} as const;

export type ReleasePhase = (typeof ReleasePhase)[keyof typeof ReleasePhase];

/**
 * Allowed next phases. EVALUATE goes straight to DONE when nothing is eligible.
 */
export const TRANSITIONS: Record<ReleasePhase, readonly ReleasePhase[]> = {
  discover: ['evaluate', 'failed'],
  evaluate: ['synchronize', 'done', 'failed'],
  synchronize: ['roll_changelogs', 'failed'],
  roll_changelogs: ['aggregate_notes', 'failed'],
  aggregate_notes: ['handoff', 'failed'],
  handoff: ['done', 'failed'],
  done: [],
  failed: []
};

export function allowedTransitions(phase: ReleasePhase): readonly ReleasePhase[] {
  return TRANSITIONS[phase];
}

export function isTerminalPhase(phase: ReleasePhase): boolean {
  return TRANSITIONS[phase].length === 0;
}

/**
 * Human-readable phase label
 */
export function phaseLabel(phase: ReleasePhase): string {
  const labels: Record<ReleasePhase, string> = {
    discover: 'Discover',
    evaluate: 'Evaluate',
    synchronize: 'Synchronize',
    roll_changelogs: 'Roll changelogs',
    aggregate_notes: 'Aggregate notes',
    handoff: 'Hand-off',
    done: 'Done',
    failed: 'Failed'
  };
  return labels[phase];
}
