import type { Dependency } from '../types';
import type { CircuitState } from './circuitBreaker';

export type PipelinePlan = 'FULL' | 'NO_AGENTS' | 'SEARCH_ONLY_FAILED';

export type DegradationReason = 'none' | 'search-circuit-open' | 'agents-disabled' | 'circuit-open';

export interface DegradationInput {
  states: Record<Dependency, CircuitState>;
  agentsEnabled: boolean;
}

export interface DegradationDecision {
  plan: PipelinePlan;
  reason: DegradationReason;
}

/**
 * Maps breaker states to the pipeline that may run for the stage about to
 * start. HALF_OPEN counts as available: the breaker itself admits the trial.
 */
export class DegradationPolicy {
  decide(input: DegradationInput, stage: Dependency): DegradationDecision {
    if (stage === 'search') {
      return input.states.search === 'OPEN'
        ? { plan: 'SEARCH_ONLY_FAILED', reason: 'search-circuit-open' }
        : { plan: 'FULL', reason: 'none' };
    }
    if (!input.agentsEnabled) {
      return { plan: 'NO_AGENTS', reason: 'agents-disabled' };
    }
    if (input.states[stage] === 'OPEN') {
      return { plan: 'NO_AGENTS', reason: 'circuit-open' };
    }
    return { plan: 'FULL', reason: 'none' };
  }
}
