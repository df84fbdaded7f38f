import {
  formatMediumDate,
  formatShortTime,
  isConditionMet,
  resolveLabel,
  resolveText,
  valueForKey
} from '../../../src/web/rules/bindings';
import type { BindingContext } from '../../../src/web/types';
import { makeJob, onlineStore } from '../../helpers/jobs';

describe('date formatting', () => {
  test('short time', () => {
    expect(formatShortTime(new Date('2025-09-25T08:00:00Z'))).toBe('8:00 AM');
    expect(formatShortTime(new Date('2025-09-25T12:30:00Z'))).toBe('12:30 PM');
    expect(formatShortTime(new Date('2025-09-25T00:05:00Z'))).toBe('12:05 AM');
    expect(formatShortTime(new Date('2025-09-25T23:59:00Z'))).toBe('11:59 PM');
  });

  test('medium date', () => {
    expect(formatMediumDate(new Date('2025-09-25T08:00:00Z'))).toBe('Sep 25, 2025');
    expect(formatMediumDate(new Date('2025-01-01T03:00:00Z'), -360)).toBe('Dec 31, 2024');
  });
});

describe('valueForKey', () => {
  const job = makeJob('A', { customerName: 'Smith Residence', status: 'inProgress', pinnedNotes: 'Dog in yard' });

  test.each([
    ['id', 'A'],
    ['customerName', 'Smith Residence'],
    ['address', 'A Test Street'],
    ['scheduledTime', '8:00 AM'],
    ['scheduledDate', 'Sep 25, 2025'],
    ['scheduledDateTime', 'Sep 25, 2025 at 8:00 AM'],
    ['status', 'In Progress'],
    ['statusColor', 'inprogress'],
    ['pinnedNotes', 'Dog in yard'],
    ['isActive', 'true'],
    ['isCompleted', 'false'],
    ['isPending', 'false'],
    ['isSkipped', 'false']
  ])('%s', (key, expected) => {
    expect(valueForKey(key, job)).toBe(expected);
  });

  test('unknown keys and unset fields are undefined', () => {
    expect(valueForKey('favouriteColour', job)).toBeUndefined();
    expect(valueForKey('notes', job)).toBeUndefined();
  });

  test('status and times follow the context', () => {
    expect(valueForKey('status', job, { language: 'ES' })).toBe('En curso');
    expect(valueForKey('scheduledTime', job, { utcOffsetMinutes: -360 })).toBe('2:00 AM');
  });
});

describe('resolveText / resolveLabel', () => {
  const job = makeJob('A', { customerName: 'Smith Residence' });
  const store = onlineStore();
  store.setText('arrival_global', '9:00 AM');
  const withJob: BindingContext = { entity: job, store };
  const noJob: BindingContext = { store };

  test('a binding key reads the job in scope', () => {
    expect(resolveText({ id: 't', kind: 'text', bindingKey: 'customerName', text: 'ignored' }, withJob)).toBe('Smith Residence');
  });

  test('an unset bound field is empty text', () => {
    expect(resolveText({ id: 't', kind: 'text', bindingKey: 'pinnedNotes' }, withJob)).toBe('');
  });

  test('without a job the static text is templated', () => {
    expect(resolveText({ id: 't', kind: 'text', bindingKey: 'customerName', text: 'Arrive by {{arrival}}' }, noJob)).toBe(
      'Arrive by 9:00 AM'
    );
    expect(resolveText({ id: 't', kind: 'spacer' }, noJob)).toBe('');
  });

  test('labels fall back to the static label', () => {
    expect(resolveLabel({ id: 'b', kind: 'button', bindingKey: 'pinnedNotes', label: 'No notes' }, withJob)).toBe('No notes');
    expect(resolveLabel({ id: 'b', kind: 'button', bindingKey: 'customerName', label: 'x' }, withJob)).toBe('Smith Residence');
    expect(resolveLabel({ id: 'b', kind: 'button', label: 'Start by {{arrival}}' }, noJob)).toBe('Start by 9:00 AM');
    expect(resolveLabel({ id: 'b', kind: 'button' }, noJob)).toBe('');
  });
});

describe('isConditionMet', () => {
  const store = onlineStore();
  const node = { id: 'c', kind: 'conditional' as const, conditionKey: 'pinnedNotes' };

  test('requires a non-empty field on the job in scope', () => {
    expect(isConditionMet(node, { store, entity: makeJob('A', { pinnedNotes: 'Beware of dog' }) })).toBe(true);
    expect(isConditionMet(node, { store, entity: makeJob('A', { pinnedNotes: '' }) })).toBe(false);
    expect(isConditionMet(node, { store, entity: makeJob('A') })).toBe(false);
    expect(isConditionMet(node, { store })).toBe(false);
  });
});
