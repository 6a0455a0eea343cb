import { NodeFailureError } from '../common/agent.errors';

export type GraphState =
  | { kind: 'PLANNING' }
  | { kind: 'EXECUTING'; plan: string }
  | { kind: 'DONE'; outcome: GraphOutcome };

export type ActiveGraphState = Exclude<GraphState, { kind: 'DONE' }>;

export type GraphOutcome =
  | { status: 'success'; plan: string; response: string; truncated: boolean }
  | { status: 'error'; plan: string | null; error: NodeFailureError }
  | { status: 'timeout'; plan: string | null };

export type GraphEvent =
  | { type: 'PLAN_READY'; plan: string }
  | { type: 'PLAN_FAILED'; error: NodeFailureError }
  | { type: 'RESPONSE_READY'; response: string; truncated: boolean }
  | { type: 'EXECUTION_FAILED'; error: NodeFailureError }
  | { type: 'DEADLINE_EXCEEDED' };

export const INITIAL_STATE: GraphState = { kind: 'PLANNING' };

/**
 * The whole routing policy of a turn. Planning always leads to executing;
 * executing always ends the turn. Any node failure or the deadline ends it
 * early.
 */
export function transition(state: GraphState, event: GraphEvent): GraphState {
  if (state.kind === 'DONE') {
    throw new Error(`No transition out of DONE (got ${event.type})`);
  }

  const plan = state.kind === 'EXECUTING' ? state.plan : null;

  switch (event.type) {
    case 'DEADLINE_EXCEEDED':
      return { kind: 'DONE', outcome: { status: 'timeout', plan } };

    case 'PLAN_READY':
      if (state.kind !== 'PLANNING') break;
      return { kind: 'EXECUTING', plan: event.plan };

    case 'PLAN_FAILED':
      if (state.kind !== 'PLANNING') break;
      return {
        kind: 'DONE',
        outcome: { status: 'error', plan: null, error: event.error }
      };

    case 'RESPONSE_READY':
      if (state.kind !== 'EXECUTING') break;
      return {
        kind: 'DONE',
        outcome: {
          status: 'success',
          plan: state.plan,
          response: event.response,
          truncated: event.truncated
        }
      };

    case 'EXECUTION_FAILED':
      if (state.kind !== 'EXECUTING') break;
      return {
        kind: 'DONE',
        outcome: { status: 'error', plan: state.plan, error: event.error }
      };
  }

  throw new Error(`No transition from ${state.kind} on ${event.type}`);
}
