import type { Job, LangCode, LocalizedString } from '../types';
import type { InputValueStore } from './state/inputStore';

/**
 * What resolution reads from: the job in scope (if any) plus the locally held
 * input values.
 */
export interface BindingContext {
  entity?: Job;
  store: InputValueStore;
  language?: LangCode;
  /** Offset applied before formatting job dates; 0 formats in UTC. */
  utcOffsetMinutes?: number;
}

export type { LangCode, LocalizedString };
