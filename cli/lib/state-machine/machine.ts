/**
 * Release Run State Machine
 *
 * Tracks the phase of one release run with validation and history.
 * An illegal transition throws; nothing is retried.
 */
import { IllegalTransitionError } from '../errors.js';
import { silentLogger } from '../log.js';
import type { Logger } from '../log.js';
import { ReleasePhase, allowedTransitions, isTerminalPhase, phaseLabel } from './states.js';

export interface PhaseTransition {
  from: ReleasePhase;
  to: ReleasePhase;
  reason?: string;
  timestamp: string;
}

export class ReleaseStateMachine {
  private phase: ReleasePhase;
  private readonly history: PhaseTransition[] = [];

  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly now: () => Date = () => new Date(),
    initialPhase: ReleasePhase = ReleasePhase.DISCOVER
  ) {
    this.phase = initialPhase;
  }

  get current(): ReleasePhase {
    return this.phase;
  }

  canTransition(to: ReleasePhase): boolean {
    return allowedTransitions(this.phase).includes(to);
  }

  /**
   * @throws IllegalTransitionError when `to` is not reachable from the current phase
   */
  transition(to: ReleasePhase, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.phase, to, allowedTransitions(this.phase));
    }

    this.history.push({ from: this.phase, to, reason, timestamp: this.now().toISOString() });
    this.phase = to;
    this.logger.debug(`phase: ${phaseLabel(to)}${reason ? ` (${reason})` : ''}`);
  }

  /**
   * Move to FAILED unless already terminal
   */
  fail(reason: string): void {
    if (!this.isTerminal()) this.transition(ReleasePhase.FAILED, reason);
  }

  isTerminal(): boolean {
    return isTerminalPhase(this.phase);
  }

  getHistory(): PhaseTransition[] {
    return [...this.history];
  }

  /**
   * Visited phases in order, starting with the initial one
   */
  path(): ReleasePhase[] {
    const first = this.history[0];
    return first ? [first.from, ...this.history.map(t => t.to)] : [this.phase];
  }
}
