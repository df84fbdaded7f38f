import { OfflineActionQueue } from '../../../src/web/data/offlineQueue';
import { InputValueStore } from '../../../src/web/state/inputStore';

const NOW = new Date('2025-09-25T10:00:00.000Z');

const setup = (online: boolean) => {
  const state = { online };
  const queue = new OfflineActionQueue();
  const store = new InputValueStore({ queue, connectivity: { isOnline: () => state.online }, now: () => NOW });
  return { state, queue, store };
};

describe('InputValueStore', () => {
  test('online writes are stored and not queued', () => {
    const { store, queue } = setup(true);
    store.setText('notes_A', 'Gate code 1234');
    expect(store.getText('notes_A')).toBe('Gate code 1234');
    expect(queue.size).toBe(0);
  });

  test('absent values read as defaults', () => {
    const { store } = setup(true);
    expect(store.getText('x')).toBe('');
    expect(store.getToggle('x')).toBe(false);
    expect(store.getSlider('x')).toBe(0);
    expect(store.getPicker('x')).toBe('');
    expect(store.getStepper('x')).toBe(0);
    expect(store.getSegmented('x')).toBe(0);
    expect(store.getMultiSelect('x')).toEqual([]);
    expect(store.getPresentation('x')).toBe(false);
    expect(store.getDate('x')).toEqual(NOW);
    expect(store.get('slider', 'x', 12)).toBe(12);
  });

  test('each map is independent', () => {
    const { store } = setup(true);
    store.setText('k', 'text');
    store.setToggle('k', true);
    store.setStepper('k', 3);
    expect(store.getText('k')).toBe('text');
    expect(store.getToggle('k')).toBe(true);
    expect(store.getStepper('k')).toBe(3);
    expect(store.has('slider', 'k')).toBe(false);
  });

  test('offline writes queue one serialized action each', () => {
    const { store, queue } = setup(false);
    store.setText('notes_A', 'Ant issue');
    store.setToggle('petsSecured_A', true);
    store.setSlider('pressure_global', 2.5);
    store.setPicker('product_A', 'bifen');
    store.setDate('followUp_A', new Date('2025-10-02T15:30:00.000Z'));
    store.setStepper('bags_A', 4);
    store.setSegmented('severity_A', 2);
    store.setMultiSelect('pests_A', ['ants', 'spiders']);

    expect(queue.peek()).toEqual([
      { kind: 'textInput', key: 'notes_A', value: 'Ant issue', timestamp: NOW },
      { kind: 'toggleInput', key: 'petsSecured_A', value: 'true', timestamp: NOW },
      { kind: 'sliderInput', key: 'pressure_global', value: '2.5', timestamp: NOW },
      { kind: 'pickerInput', key: 'product_A', value: 'bifen', timestamp: NOW },
      { kind: 'datePickerInput', key: 'followUp_A', value: '2025-10-02T15:30:00.000Z', timestamp: NOW },
      { kind: 'stepperInput', key: 'bags_A', value: '4', timestamp: NOW },
      { kind: 'segmentedInput', key: 'severity_A', value: '2', timestamp: NOW },
      { kind: 'multiSelectInput', key: 'pests_A', value: 'ants,spiders', timestamp: NOW }
    ]);
  });

  test('presentation flags are never queued', () => {
    const { store, queue } = setup(false);
    store.setPresentation('confirmSkip_global', true);
    expect(store.getPresentation('confirmSkip_global')).toBe(true);
    expect(queue.size).toBe(0);
  });

  test('repeated writes are all queued', () => {
    const { store, queue } = setup(false);
    store.setToggle('t', false);
    store.setToggle('t', false);
    expect(queue.peek().map(a => a.value)).toEqual(['false', 'false']);
  });

  test('stored arrays and dates are copies', () => {
    const { store } = setup(true);
    const pests = ['ants'];
    const date = new Date('2025-10-02T00:00:00.000Z');
    store.setMultiSelect('pests', pests);
    store.setDate('d', date);
    pests.push('wasps');
    date.setUTCFullYear(2030);
    expect(store.getMultiSelect('pests')).toEqual(['ants']);
    expect(store.getDate('d').toISOString()).toBe('2025-10-02T00:00:00.000Z');
  });

  test('subscribers see each write with an increasing version', () => {
    const { store } = setup(true);
    const changes: Array<[string, string, number]> = [];
    const unsubscribe = store.subscribe(change => changes.push([change.kind, change.key, change.version]));
    store.setText('a', '1');
    store.set('toggle', 'b', true);
    unsubscribe();
    store.setText('c', '2');
    expect(changes).toEqual([
      ['text', 'a', 1],
      ['toggle', 'b', 2]
    ]);
    expect(store.version).toBe(3);
  });

  test('textValues snapshots the text map', () => {
    const { store } = setup(true);
    store.setText('arrival_global', '9:00 AM');
    store.setPicker('arrival_global', 'ignored');
    expect(store.textValues()).toEqual({ arrival_global: '9:00 AM' });
  });
});
