import type { LifecycleViolation } from '../../types';
import { debugLog } from '../../services/debug';
import type { RouteSession } from './routeSession';

export const ACTION_IDS = ['startJob', 'completeJob', 'skipJob', 'startRoute', 'endRoute'] as const;

export type ActionId = (typeof ACTION_IDS)[number];

export interface ActionInput {
  jobId?: string;
  signature?: string;
}

export type ActionOutcome =
  | { status: 'done'; actionId: ActionId }
  | { status: 'awaitingReason'; actionId: ActionId; jobId: string }
  | { status: 'signatureRequired'; actionId: ActionId; jobId: string }
  | { status: 'missingJob'; actionId: ActionId }
  | { status: 'rejected'; actionId: ActionId; violation: LifecycleViolation }
  | { status: 'unknownAction'; actionId: string };

export type ActionHandler = (input: ActionInput) => ActionOutcome;

export const isActionId = (value: string): value is ActionId => ACTION_IDS.some(id => id === value);

/**
 * Maps the `actionId` of a screen button to a session call. `skipJob` only
 * opens the reason gate; the skip lands when a reason is committed.
 */
export const createActionHandlers = (session: RouteSession): Record<ActionId, ActionHandler> => ({
  startJob: ({ jobId }) => {
    if (!jobId) return { status: 'missingJob', actionId: 'startJob' };
    const result = session.start(jobId);
    return result.ok ? { status: 'done', actionId: 'startJob' } : { status: 'rejected', actionId: 'startJob', violation: result.violation };
  },
  completeJob: ({ jobId, signature }) => {
    if (!jobId) return { status: 'missingJob', actionId: 'completeJob' };
    if (!signature) return { status: 'signatureRequired', actionId: 'completeJob', jobId };
    const result = session.complete(jobId, signature);
    return result.ok
      ? { status: 'done', actionId: 'completeJob' }
      : { status: 'rejected', actionId: 'completeJob', violation: result.violation };
  },
  skipJob: ({ jobId }) => {
    if (!jobId) return { status: 'missingJob', actionId: 'skipJob' };
    const result = session.requestSkip(jobId);
    return result.ok
      ? { status: 'awaitingReason', actionId: 'skipJob', jobId }
      : { status: 'rejected', actionId: 'skipJob', violation: result.violation };
  },
  startRoute: () => {
    session.startRoute();
    return { status: 'done', actionId: 'startRoute' };
  },
  endRoute: () => {
    session.endRoute();
    return { status: 'done', actionId: 'endRoute' };
  }
});

export const dispatchAction = (
  handlers: Record<ActionId, ActionHandler>,
  actionId: string,
  input: ActionInput = {}
): ActionOutcome => {
  if (!isActionId(actionId)) {
    debugLog('Actions', 'action.unknown', { actionId });
    return { status: 'unknownAction', actionId };
  }
  const outcome = handlers[actionId](input);
  debugLog('Actions', 'action.dispatched', { actionId, status: outcome.status });
  return outcome;
};
