import type { StopReason } from '../types';

export type ScopeState =
  | { phase: 'fetching'; page: number; attempt: number }
  | { phase: 'evaluating'; page: number; lastPage: boolean }
  | { phase: 'stopped'; page: number; reason: StopReason; detail?: string };

export type ScopeEvent =
  | { type: 'page-received'; count: number; lastPage: boolean }
  | { type: 'page-evaluated'; staleLimitExceeded: boolean }
  | { type: 'transient-failure'; detail: string }
  | { type: 'fatal-failure'; detail: string }
  | { type: 'aborted'; detail: string };

export interface ScopeLimits {
  /** 0 means unbounded. */
  maxPages: number;
  maxRetries: number;
}

export const INITIAL_SCOPE_STATE: ScopeState = { phase: 'fetching', page: 1, attempt: 0 };

function invalid(state: ScopeState, event: ScopeEvent): never {
  throw new Error(`Scope event "${event.type}" is not valid in phase "${state.phase}"`);
}

/**
 * Per-scope lifecycle. Pure: the engine feeds it what happened and acts on
 * the returned state, so every stop reason is decided here and nowhere else.
 */
export function transition(state: ScopeState, event: ScopeEvent, limits: ScopeLimits): ScopeState {
  if (state.phase === 'stopped') return state;

  if (event.type === 'aborted') {
    return { phase: 'stopped', page: state.page, reason: 'aborted', detail: event.detail };
  }

  switch (state.phase) {
    case 'fetching':
      switch (event.type) {
        case 'page-received':
          if (event.count === 0) {
            return { phase: 'stopped', page: state.page, reason: 'end-of-results' };
          }
          return { phase: 'evaluating', page: state.page, lastPage: event.lastPage };
        case 'transient-failure':
          if (state.attempt < limits.maxRetries) {
            return { phase: 'fetching', page: state.page, attempt: state.attempt + 1 };
          }
          return { phase: 'stopped', page: state.page, reason: 'error', detail: event.detail };
        case 'fatal-failure':
          return { phase: 'stopped', page: state.page, reason: 'fatal', detail: event.detail };
        default:
          return invalid(state, event);
      }

    case 'evaluating':
      if (event.type !== 'page-evaluated') return invalid(state, event);
      if (event.staleLimitExceeded) {
        return { phase: 'stopped', page: state.page, reason: 'stale-limit' };
      }
      if (state.lastPage) {
        return { phase: 'stopped', page: state.page, reason: 'end-of-results' };
      }
      if (limits.maxPages > 0 && state.page >= limits.maxPages) {
        return { phase: 'stopped', page: state.page, reason: 'page-budget' };
      }
      return { phase: 'fetching', page: state.page + 1, attempt: 0 };
  }
}
