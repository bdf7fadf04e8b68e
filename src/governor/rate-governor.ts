/**
 * TubeBrief — Rate Governor
 *
 * Central gate in front of every metered call. Each acquire() sleeps for a
 * randomized jitter drawn from the stage's window, plus an exponential
 * backoff while the stage is being throttled. Also owns the per-run quota.
 *
 * Backoff state machine, per stage kind:
 *   normal --reportTransient--> backoff(1) --reportTransient--> backoff(2) ...
 *   backoff(n) --reportSuccess--> normal
 *
 * While in backoff(n), acquire() adds min(base * 2^n, cap) on top of jitter.
 */

import { ConfigurationError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { GovernorConfig, StageWindow } from '../lib/config';
import type { StageKind } from '../types';

// ============================================================
// TYPES
// ============================================================

export type BackoffState =
  | { kind: 'normal' }
  | { kind: 'backoff'; n: number };

export type Sleeper = (ms: number) => Promise<void>;

export interface RateGovernorOptions {
  /** Uniform random source in [0, 1) */
  random?: () => number;
  sleep?: Sleeper;
}

export interface AcquireResult {
  jitterMs: number;
  backoffMs: number;
  totalMs: number;
}

const STAGES: StageKind[] = ['transcript', 'summarize'];

export const sleep: Sleeper = ms =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

function validateWindow(stage: StageKind, window: StageWindow): void {
  if (window.minDelayMs < 0 || window.maxDelayMs < window.minDelayMs) {
    throw new ConfigurationError(
      `Invalid delay window for ${stage}: [${window.minDelayMs}, ${window.maxDelayMs}]`
    );
  }
}

// ============================================================
// GOVERNOR
// ============================================================

export class RateGovernor {
  private readonly random: () => number;
  private readonly sleeper: Sleeper;
  private readonly states = new Map<StageKind, BackoffState>();
  private remaining = 0;

  private readonly logger = logger.child({ component: 'rate-governor' });

  constructor(
    private readonly config: GovernorConfig,
    options: RateGovernorOptions = {}
  ) {
    for (const stage of STAGES) {
      validateWindow(stage, config.windows[stage]);
      this.states.set(stage, { kind: 'normal' });
    }
    if (config.backoffBaseMs < 0 || config.backoffCapMs < config.backoffBaseMs) {
      throw new ConfigurationError(
        `Invalid backoff settings: base ${config.backoffBaseMs}ms, cap ${config.backoffCapMs}ms`
      );
    }

    this.random = options.random ?? Math.random;
    this.sleeper = options.sleep ?? sleep;
  }

  // ----------------------------------------------------------
  // Pacing
  // ----------------------------------------------------------

  /**
   * Suspend the caller until the next call of this stage kind may go out.
   */
  async acquire(stage: StageKind): Promise<AcquireResult> {
    const jitterMs = this.drawJitter(stage);
    const backoffMs = this.nextBackoffMs(stage);
    const totalMs = jitterMs + backoffMs;

    if (backoffMs > 0) {
      this.logger.info('Backing off', { stage, jitterMs, backoffMs });
    } else {
      this.logger.debug('Pacing call', { stage, jitterMs });
    }

    await this.sleeper(totalMs);

    return { jitterMs, backoffMs, totalMs };
  }

  /** Record a throttling/transient signal for a stage kind. */
  reportTransient(stage: StageKind): void {
    const state = this.getState(stage);
    const n = state.kind === 'normal' ? 1 : state.n + 1;
    this.states.set(stage, { kind: 'backoff', n });
    this.logger.debug('Stage entered backoff', { stage, n, nextBackoffMs: this.nextBackoffMs(stage) });
  }

  /** Any success returns the stage to normal pacing. */
  reportSuccess(stage: StageKind): void {
    if (this.getState(stage).kind !== 'normal') {
      this.logger.debug('Stage back to normal', { stage });
    }
    this.states.set(stage, { kind: 'normal' });
  }

  getState(stage: StageKind): BackoffState {
    return this.states.get(stage) ?? { kind: 'normal' };
  }

  /** Backoff delay the next acquire() of this stage will add. */
  nextBackoffMs(stage: StageKind): number {
    const state = this.getState(stage);
    if (state.kind === 'normal') return 0;
    return Math.min(this.config.backoffBaseMs * 2 ** state.n, this.config.backoffCapMs);
  }

  private drawJitter(stage: StageKind): number {
    const { minDelayMs, maxDelayMs } = this.config.windows[stage];
    return Math.round(minDelayMs + this.random() * (maxDelayMs - minDelayMs));
  }

  // ----------------------------------------------------------
  // Quota
  // ----------------------------------------------------------

  /** Start a run with a fresh quota counter. */
  resetQuota(quota: number): void {
    if (!Number.isInteger(quota) || quota < 0) {
      throw new ConfigurationError(`Quota must be a non-negative integer, got ${quota}`);
    }
    this.remaining = quota;
  }

  /**
   * Reserve up to `count` admissions from the run quota.
   * Returns how many were granted; never drives the counter below zero.
   */
  reserve(count: number): number {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Reserve count must be a non-negative integer, got ${count}`);
    }
    const granted = Math.min(count, this.remaining);
    this.remaining -= granted;
    return granted;
  }

  get quotaRemaining(): number {
    return this.remaining;
  }
}
