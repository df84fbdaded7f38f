import type { IntentState, LifecycleResult, PendingIntent, ReasonCode } from '../types';
import { REASON_CODES } from '../types';
import { violation } from './jobLifecycle';

/**
 * Two-phase gate for skip and move: a request parks the intent until a reason
 * is committed or the request is cancelled. Only one intent is outstanding.
 */

export const IDLE: IntentState = { phase: 'idle' };

export interface IntentRequest {
  state: IntentState;
  /** The outstanding intent the new request displaced, if any. */
  replaced?: PendingIntent;
}

export const isReasonCode = (value: unknown): value is ReasonCode =>
  REASON_CODES.some(code => code === value);

export const pendingIntentOf = (state: IntentState): PendingIntent | undefined =>
  state.phase === 'awaitingReason' ? state.intent : undefined;

/** Last request wins: an outstanding intent is discarded and reported back. */
export const requestIntent = (state: IntentState, intent: PendingIntent): IntentRequest => ({
  state: { phase: 'awaitingReason', intent },
  replaced: pendingIntentOf(state)
});

export interface CommittedIntent {
  intent: PendingIntent;
  reason: ReasonCode;
  state: IntentState;
}

export const commitIntent = (state: IntentState, reason: ReasonCode | undefined): LifecycleResult<CommittedIntent> => {
  if (state.phase !== 'awaitingReason') {
    return violation('noPendingIntent', 'commit', 'There is no skip or move waiting for a reason');
  }
  if (!isReasonCode(reason)) {
    return violation('missingReason', 'commit', 'A reason code is required to commit this change');
  }
  return { ok: true, value: { intent: state.intent, reason, state: IDLE } };
};

/** Drops the outstanding intent, if any; returns what was dropped. */
export const cancelIntent = (state: IntentState): { state: IntentState; cancelled?: PendingIntent } => ({
  state: IDLE,
  cancelled: pendingIntentOf(state)
});
