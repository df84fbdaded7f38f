import type { ComponentDescriptor, Job } from '../../types';
import type { BindingContext } from '../types';
import { tSystem } from '../systemStrings';
import { resolveTemplate, TextLookup } from './template';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const shift = (date: Date, offsetMinutes: number): Date => new Date(date.getTime() + offsetMinutes * 60000);

/** `8:00 AM` */
export const formatShortTime = (date: Date, offsetMinutes = 0): string => {
  const d = shift(date, offsetMinutes);
  const hours = d.getUTCHours();
  const minutes = d.getUTCMinutes().toString().padStart(2, '0');
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${hour12}:${minutes} ${hours < 12 ? 'AM' : 'PM'}`;
};

/** `Sep 25, 2025` */
export const formatMediumDate = (date: Date, offsetMinutes = 0): string => {
  const d = shift(date, offsetMinutes);
  return `${MONTHS[d.getUTCMonth()]} ${d.getUTCDate()}, ${d.getUTCFullYear()}`;
};

const flag = (value: boolean): string => (value ? 'true' : 'false');

/**
 * Display string for a job field, or undefined when the key names no field
 * (or an optional field that is unset).
 */
export const valueForKey = (key: string, job: Job, context: Pick<BindingContext, 'language' | 'utcOffsetMinutes'> = {}): string | undefined => {
  const offset = context.utcOffsetMinutes || 0;
  switch (key) {
    case 'id':
      return job.id;
    case 'customerName':
      return job.customerName;
    case 'address':
      return job.address;
    case 'scheduledTime':
      return formatShortTime(job.scheduledDate, offset);
    case 'scheduledDate':
      return formatMediumDate(job.scheduledDate, offset);
    case 'scheduledDateTime':
      return `${formatMediumDate(job.scheduledDate, offset)} at ${formatShortTime(job.scheduledDate, offset)}`;
    case 'status':
      return tSystem(`status.${job.status}`, context.language || 'EN', job.status);
    case 'statusColor':
      return job.status.toLowerCase();
    case 'pinnedNotes':
      return job.pinnedNotes;
    case 'notes':
      return job.notes;
    case 'isActive':
      return flag(job.status === 'inProgress');
    case 'isCompleted':
      return flag(job.status === 'completed');
    case 'isPending':
      return flag(job.status === 'pending');
    case 'isSkipped':
      return flag(job.status === 'skipped');
    default:
      return undefined;
  }
};

const textLookup = (context: BindingContext): TextLookup => key =>
  context.store.has('text', key) ? context.store.getText(key) : undefined;

export const resolveText = (node: ComponentDescriptor, context: BindingContext): string => {
  if (node.bindingKey && context.entity) {
    return valueForKey(node.bindingKey, context.entity, context) ?? '';
  }
  if (node.text !== undefined) return resolveTemplate(node.text, textLookup(context));
  return '';
};

export const resolveLabel = (node: ComponentDescriptor, context: BindingContext): string => {
  if (node.bindingKey && context.entity) {
    const bound = valueForKey(node.bindingKey, context.entity, context);
    if (bound !== undefined) return bound;
  }
  if (node.label !== undefined) return resolveTemplate(node.label, textLookup(context));
  return '';
};

/** A conditional renders only when its key names a non-empty field of the job in scope. */
export const isConditionMet = (node: ComponentDescriptor, context: BindingContext): boolean => {
  if (!node.conditionKey || !context.entity) return false;
  const value = valueForKey(node.conditionKey, context.entity, context);
  return !!value;
};
