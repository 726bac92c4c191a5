/**
 * Upstream circuit breakers
 *
 * One breaker per upstream (Voyage, Anthropic, Qdrant). While a breaker is
 * open, calls are not attempted: the breaker throws the upstream's own
 * transient error kind (EmbeddingUnavailable, GenerationUnavailable,
 * VectorStoreUnavailable), so callers see the same failure whether the
 * upstream was tried or not.
 *
 * Only errors that say something about upstream health count as failures:
 * by default the transient kinds. A rejected key or a refused prompt means
 * the upstream answered, which counts as a success.
 *
 *   closed --(failureThreshold consecutive failures)--> open
 *   open --(resetTimeoutMs elapsed)--> half-open (at most halfOpenRequests trial calls in flight)
 *   half-open --(halfOpenRequests successful trials)--> closed
 *   half-open --(any failure)--> open
 */

import {
  EmbeddingUnavailable,
  GenerationUnavailable,
  VectorStoreUnavailable,
  errorMessage,
  isTransient,
} from '../errors.js';
import { logError, logInfo, logWarn, type LogContext } from './logger.js';

export type Upstream = 'voyage' | 'anthropic' | 'qdrant';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  resetTimeoutMs: number;
  halfOpenRequests: number;
}

export interface CircuitBreakerOptions extends CircuitBreakerConfig {
  /** Error thrown instead of calling the upstream while the circuit is open */
  openError: (remainingMs: number) => Error;
  countsAsFailure?: (error: unknown) => boolean;
  clock?: () => number;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  consecutiveFailures: number;
  lastFailureTime: number;
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private lastFailureTime = 0;
  private openedAt = 0;
  private trialsInFlight = 0;
  private trialSuccesses = 0;
  private readonly clock: () => number;
  private readonly countsAsFailure: (error: unknown) => boolean;

  constructor(
    private readonly name: string,
    private readonly options: CircuitBreakerOptions
  ) {
    this.clock = options.clock ?? Date.now;
    this.countsAsFailure = options.countsAsFailure ?? isTransient;
  }

  async execute<T>(fn: () => Promise<T>, context?: LogContext): Promise<T> {
    const logCtx: LogContext = { ...context, service: this.name };
    const trial = this.admit(logCtx);

    try {
      const result = await fn();
      this.settle(trial, null, logCtx);
      return result;
    } catch (error) {
      this.settle(trial, this.countsAsFailure(error) ? error : null, logCtx);
      throw error;
    }
  }

  /**
   * @returns true when the call is a half-open trial
   * @throws the upstream's open error while the circuit is open or every trial slot is taken
   */
  private admit(logCtx: LogContext): boolean {
    if (this.state === 'open') {
      const elapsed = this.clock() - this.openedAt;
      if (elapsed < this.options.resetTimeoutMs) {
        throw this.options.openError(this.options.resetTimeoutMs - elapsed);
      }
      this.transition('half-open', 'reset_timeout_elapsed', logCtx);
    }

    if (this.state === 'half-open') {
      if (this.trialsInFlight >= this.options.halfOpenRequests) {
        logWarn('Circuit breaker trial slots taken, rejecting call', { ...logCtx, trials: this.trialsInFlight });
        throw this.options.openError(0);
      }
      this.trialsInFlight++;
      return true;
    }
    return false;
  }

  private settle(trial: boolean, failure: unknown, logCtx: LogContext): void {
    if (trial) this.trialsInFlight--;

    if (failure === null) {
      this.consecutiveFailures = 0;
      if (this.state === 'half-open' && ++this.trialSuccesses >= this.options.halfOpenRequests) {
        this.transition('closed', 'upstream_recovered', logCtx);
      }
      return;
    }

    this.consecutiveFailures++;
    this.lastFailureTime = this.clock();
    if (this.state === 'half-open' || this.consecutiveFailures >= this.options.failureThreshold) {
      this.transition('open', this.state === 'half-open' ? 'trial_failed' : 'failure_threshold_reached', {
        ...logCtx,
        consecutive_failures: this.consecutiveFailures,
        error: errorMessage(failure),
      });
    }
  }

  private transition(next: CircuitState, reason: string, logCtx: LogContext): void {
    const previous = this.state;
    this.state = next;
    if (next === 'open') {
      this.openedAt = this.clock();
    } else if (next === 'half-open') {
      this.trialsInFlight = 0;
      this.trialSuccesses = 0;
    }

    const log = next === 'open' ? logError : logInfo;
    log('Circuit breaker state changed', { ...logCtx, from: previous, circuit_state: next, reason });
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      lastFailureTime: this.lastFailureTime,
    };
  }
}

// =============================================================================
// PER-UPSTREAM BREAKERS
// =============================================================================

export const UPSTREAM_BREAKER_CONFIG: Record<Upstream, CircuitBreakerConfig> = {
  // Rate limits come in bursts
  voyage: { failureThreshold: 4, resetTimeoutMs: 45000, halfOpenRequests: 2 },
  // Overload (529) can last a minute
  anthropic: { failureThreshold: 5, resetTimeoutMs: 60000, halfOpenRequests: 2 },
  qdrant: { failureThreshold: 3, resetTimeoutMs: 30000, halfOpenRequests: 2 },
};

function retryHint(remainingMs: number): string {
  return `circuit open, retry in ${Math.ceil(remainingMs / 1000)}s`;
}

const OPEN_ERRORS: Record<Upstream, (remainingMs: number) => Error> = {
  voyage: remainingMs =>
    new EmbeddingUnavailable(`Voyage AI unavailable (${retryHint(remainingMs)})`, { circuit: 'open', retry_in_ms: remainingMs }),
  anthropic: remainingMs =>
    new GenerationUnavailable(`Anthropic unavailable (${retryHint(remainingMs)})`, { circuit: 'open', retry_in_ms: remainingMs }),
  qdrant: remainingMs =>
    new VectorStoreUnavailable(`Qdrant unavailable (${retryHint(remainingMs)})`, { circuit: 'open', retry_in_ms: remainingMs }),
};

const breakers = new Map<Upstream, CircuitBreaker>();

/**
 * Process-wide breaker for an upstream, shared by every client of it
 */
export function upstreamBreaker(upstream: Upstream): CircuitBreaker {
  let breaker = breakers.get(upstream);
  if (!breaker) {
    breaker = new CircuitBreaker(upstream, { ...UPSTREAM_BREAKER_CONFIG[upstream], openError: OPEN_ERRORS[upstream] });
    breakers.set(upstream, breaker);
  }
  return breaker;
}

export function getCircuitBreakerStates(): Record<Upstream, CircuitBreakerStats> {
  return {
    voyage: upstreamBreaker('voyage').getStats(),
    anthropic: upstreamBreaker('anthropic').getStats(),
    qdrant: upstreamBreaker('qdrant').getStats(),
  };
}
