import type { InputValueKind, InputValueTypes, PendingActionKind } from '../../types';
import type { ActionSink } from '../data/offlineQueue';
import type { Connectivity } from '../data/connectivity';

export interface InputChange {
  kind: InputValueKind;
  key: string;
  version: number;
}

type Listener = (change: InputChange) => void;

type ValueMaps = { [K in InputValueKind]: Map<string, InputValueTypes[K]> };
type Serializers = { [K in InputValueKind]: (value: InputValueTypes[K]) => string };
type Defaults = { [K in InputValueKind]: () => InputValueTypes[K] };

/** Queue kind per map; presentation flags are UI-only and never replayed. */
const ACTION_KINDS: { [K in InputValueKind]: PendingActionKind | null } = {
  text: 'textInput',
  toggle: 'toggleInput',
  slider: 'sliderInput',
  picker: 'pickerInput',
  date: 'datePickerInput',
  stepper: 'stepperInput',
  segmented: 'segmentedInput',
  multiSelect: 'multiSelectInput',
  presentation: null
};

const SERIALIZERS: Serializers = {
  text: value => value,
  toggle: value => (value ? 'true' : 'false'),
  slider: value => String(value),
  picker: value => value,
  date: value => value.toISOString(),
  stepper: value => String(value),
  segmented: value => String(value),
  multiSelect: value => value.join(','),
  presentation: value => (value ? 'true' : 'false')
};

export interface InputValueStoreOptions {
  queue: ActionSink;
  connectivity: Connectivity;
  now?: () => Date;
}

/**
 * Local values of every input widget, keyed by composite key
 * (`valueKey_entityId` or `valueKey_global`). Writes always land locally; while
 * offline each write (except presentation flags) also appends one action to
 * the queue.
 */
export class InputValueStore {
  private readonly maps: ValueMaps = {
    text: new Map(),
    toggle: new Map(),
    slider: new Map(),
    picker: new Map(),
    date: new Map(),
    stepper: new Map(),
    segmented: new Map(),
    multiSelect: new Map(),
    presentation: new Map()
  };
  private readonly defaults: Defaults;
  private readonly listeners: Set<Listener> = new Set();
  private readonly queue: ActionSink;
  private readonly connectivity: Connectivity;
  private readonly now: () => Date;
  private revision = 0;

  constructor(options: InputValueStoreOptions) {
    this.queue = options.queue;
    this.connectivity = options.connectivity;
    this.now = options.now || (() => new Date());
    this.defaults = {
      text: () => '',
      toggle: () => false,
      slider: () => 0,
      picker: () => '',
      date: () => this.now(),
      stepper: () => 0,
      segmented: () => 0,
      multiSelect: () => [],
      presentation: () => false
    };
  }

  /** Increases on every write; lets snapshot readers detect change cheaply. */
  get version(): number {
    return this.revision;
  }

  set<K extends InputValueKind>(kind: K, key: string, value: InputValueTypes[K]): void {
    const map: Map<string, InputValueTypes[K]> = this.maps[kind];
    map.set(key, value);
    this.revision += 1;

    const actionKind = ACTION_KINDS[kind];
    if (actionKind && !this.connectivity.isOnline()) {
      const serialize: (v: InputValueTypes[K]) => string = SERIALIZERS[kind];
      this.queue.enqueue({ kind: actionKind, key, value: serialize(value), timestamp: this.now() });
    }

    const change: InputChange = { kind, key, version: this.revision };
    this.listeners.forEach(l => l(change));
  }

  get<K extends InputValueKind>(kind: K, key: string, fallback?: InputValueTypes[K]): InputValueTypes[K] {
    const map: Map<string, InputValueTypes[K]> = this.maps[kind];
    const stored = map.get(key);
    if (stored !== undefined) return stored;
    if (fallback !== undefined) return fallback;
    const makeDefault: () => InputValueTypes[K] = this.defaults[kind];
    return makeDefault();
  }

  has(kind: InputValueKind, key: string): boolean {
    return this.maps[kind].has(key);
  }

  setText(key: string, value: string): void {
    this.set('text', key, value);
  }

  setToggle(key: string, value: boolean): void {
    this.set('toggle', key, value);
  }

  setSlider(key: string, value: number): void {
    this.set('slider', key, value);
  }

  setPicker(key: string, value: string): void {
    this.set('picker', key, value);
  }

  setDate(key: string, value: Date): void {
    this.set('date', key, new Date(value.getTime()));
  }

  setStepper(key: string, value: number): void {
    this.set('stepper', key, value);
  }

  setSegmented(key: string, index: number): void {
    this.set('segmented', key, index);
  }

  setMultiSelect(key: string, values: string[]): void {
    this.set('multiSelect', key, [...values]);
  }

  setPresentation(key: string, presented: boolean): void {
    this.set('presentation', key, presented);
  }

  getText(key: string): string {
    return this.get('text', key);
  }

  getToggle(key: string): boolean {
    return this.get('toggle', key);
  }

  getSlider(key: string): number {
    return this.get('slider', key);
  }

  getPicker(key: string): string {
    return this.get('picker', key);
  }

  getDate(key: string): Date {
    return this.get('date', key);
  }

  getStepper(key: string): number {
    return this.get('stepper', key);
  }

  getSegmented(key: string): number {
    return this.get('segmented', key);
  }

  getMultiSelect(key: string): string[] {
    return [...this.get('multiSelect', key)];
  }

  getPresentation(key: string): boolean {
    return this.get('presentation', key);
  }

  textValues(): Record<string, string> {
    const out: Record<string, string> = {};
    this.maps.text.forEach((value, key) => {
      out[key] = value;
    });
    return out;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
