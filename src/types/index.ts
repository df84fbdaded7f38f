export type LangCode = 'EN' | 'ES' | string;

export interface LocalizedString {
  en?: string;
  es?: string;
  [key: string]: string | undefined;
}

// ---------------------------------------------------------------------------
// Component descriptors
// ---------------------------------------------------------------------------

export const CONTAINER_KINDS = ['vstack', 'hstack', 'scroll', 'grid', 'section', 'tabView'] as const;
export const COLLECTION_KINDS = ['list', 'forEach'] as const;
export const CONTENT_KINDS = [
  'text',
  'button',
  'spacer',
  'image',
  'divider',
  'progressView',
  'gauge',
  'chart',
  'mapView',
  'webView'
] as const;
export const INPUT_KINDS = [
  'textField',
  'toggle',
  'slider',
  'picker',
  'datePicker',
  'stepper',
  'segmentedControl'
] as const;
export const PRESENTATION_KINDS = ['navigationLink', 'alert', 'actionSheet'] as const;
export const LOGIC_KINDS = ['conditional'] as const;
/** Widgets owned by the equipment, weather and chemical managers. */
export const DELEGATED_KINDS = [
  'equipmentInspector',
  'equipmentSelector',
  'qrScanner',
  'digitalChecklist',
  'maintenanceScheduler',
  'calibrationTracker',
  'weatherDashboard',
  'weatherAlert',
  'weatherForecast',
  'weatherMetrics',
  'safetyIndicator',
  'treatmentConditions',
  'chemicalSelector',
  'dosageCalculator',
  'chemicalInventory',
  'treatmentLogger',
  'epaCompliance',
  'mixingInstructions',
  'applicationTracker',
  'chemicalSearch'
] as const;

export type ContainerKind = (typeof CONTAINER_KINDS)[number];
export type CollectionKind = (typeof COLLECTION_KINDS)[number];
export type ContentKind = (typeof CONTENT_KINDS)[number];
export type InputKind = (typeof INPUT_KINDS)[number];
export type PresentationKind = (typeof PRESENTATION_KINDS)[number];
export type LogicKind = (typeof LOGIC_KINDS)[number];
export type DelegatedKind = (typeof DELEGATED_KINDS)[number];

export type ComponentKind =
  | ContainerKind
  | CollectionKind
  | ContentKind
  | InputKind
  | PresentationKind
  | LogicKind
  | DelegatedKind;

export type KindCategory = 'container' | 'collection' | 'content' | 'input' | 'presentation' | 'logic' | 'delegated';

export interface PickerOption {
  id: string;
  text: string;
  value: string;
}

export interface ShadowOffset {
  x: number;
  y: number;
}

export interface AnimationSpec {
  type?: string;
  duration?: number;
}

export interface TransitionSpec {
  type?: string;
}

/**
 * One node of a server-driven screen. Children are owned by value, so a tree
 * built from JSON can never contain itself.
 */
export interface ComponentDescriptor {
  id: string;
  kind: ComponentKind;
  // content
  text?: string;
  label?: string;
  placeholder?: string;
  title?: string;
  message?: string;
  actionId?: string;
  // styling tokens (opaque here)
  font?: string;
  color?: string;
  fontWeight?: string;
  foregroundColor?: string;
  backgroundColor?: string;
  borderColor?: string;
  shadowColor?: string;
  padding?: number;
  spacing?: number;
  cornerRadius?: number;
  borderWidth?: number;
  shadowRadius?: number;
  opacity?: number;
  rotation?: number;
  scale?: number;
  shadowOffset?: ShadowOffset;
  animation?: AnimationSpec;
  transition?: TransitionSpec;
  // structure
  children?: ComponentDescriptor[];
  itemTemplate?: ComponentDescriptor;
  // bindings
  bindingKey?: string;
  conditionKey?: string;
  valueKey?: string;
  // inputs
  options?: PickerOption[];
  selectionMode?: string;
  allowMultipleSelection?: boolean;
  minValue?: number;
  maxValue?: number;
  step?: number;
  showValue?: boolean;
  validationRules?: string[];
  // grid
  columns?: number;
  gridItemSize?: string;
  gridItemMinSize?: number;
  // navigation / presentation
  destination?: string;
  isPresented?: string;
  // progress / gauge / chart
  progress?: number;
  gaugeMin?: number;
  gaugeMax?: number;
  chartType?: string;
  dataKey?: string;
  // media / map / web
  imageName?: string;
  url?: string;
  webURL?: string;
  centerLatitude?: number;
  centerLongitude?: number;
  span?: number;
}

export interface Screen {
  version: number;
  component: ComponentDescriptor;
}

/** Wire shape of a descriptor node: plain JSON with a `type` discriminant. */
export type WireComponent = Record<string, unknown>;

export interface WireScreen {
  version: number;
  component: WireComponent;
}

export interface DecodeError {
  type: 'decode';
  message: string;
  path: string;
}

export interface VersionError {
  type: 'version';
  message: string;
  version: unknown;
  supported: number[];
}

export interface DecodeIssue {
  path: string;
  message: string;
  id?: string;
}

export type DecodeResult<T = ComponentDescriptor> =
  | { ok: true; value: T; issues: DecodeIssue[] }
  | { ok: false; error: DecodeError | VersionError };

export type ValidationRuleCode =
  | 'missingId'
  | 'missingValueKey'
  | 'missingOptions'
  | 'invalidRange'
  | 'emptyContainer'
  | 'missingItemTemplate'
  | 'missingDestination'
  | 'missingPresentationKey'
  | 'missingImageSource'
  | 'progressOutOfRange';

export interface ValidationIssue {
  id: string;
  kind: ComponentKind;
  rule: ValidationRuleCode;
  message: string;
  path: string;
}

// ---------------------------------------------------------------------------
// Jobs
// ---------------------------------------------------------------------------

export type JobStatus = 'pending' | 'inProgress' | 'completed' | 'skipped';

export interface Job {
  id: string;
  customerName: string;
  address: string;
  scheduledDate: Date;
  status: JobStatus;
  startTime?: Date;
  completionTime?: Date;
  /** Opaque signature payload captured on completion. */
  signature?: string;
  notes?: string;
  pinnedNotes?: string;
  latitude?: number;
  longitude?: number;
}

export const REASON_CODES = [
  'customerNotHome',
  'weatherDelay',
  'rescheduledAtCustomerRequest',
  'routeEfficiency',
  'unsafeWeatherConditions',
  'equipmentMalfunction',
  'chemicalAvailability',
  'other'
] as const;

export type ReasonCode = (typeof REASON_CODES)[number];

export type PendingIntent =
  | { kind: 'skip'; jobId: string }
  | { kind: 'move'; jobId: string; fromIndex: number; toIndex: number };

export type IntentState = { phase: 'idle' } | { phase: 'awaitingReason'; intent: PendingIntent };

export type LifecycleViolationCode =
  | 'illegalTransition'
  | 'missingSignature'
  | 'unknownJob'
  | 'indexOutOfRange'
  | 'noPendingIntent'
  | 'missingReason'
  | 'sessionDisposed';

export type LifecycleOperation = 'start' | 'complete' | 'skip' | 'move' | 'commit' | 'cancel';

export interface LifecycleViolation {
  type: 'lifecycle';
  code: LifecycleViolationCode;
  operation: LifecycleOperation;
  message: string;
  jobId?: string;
  status?: JobStatus;
}

export type LifecycleResult<T> = { ok: true; value: T } | { ok: false; violation: LifecycleViolation };

// ---------------------------------------------------------------------------
// Input values and offline actions
// ---------------------------------------------------------------------------

export interface InputValueTypes {
  text: string;
  toggle: boolean;
  slider: number;
  picker: string;
  date: Date;
  stepper: number;
  segmented: number;
  multiSelect: string[];
  presentation: boolean;
}

export type InputValueKind = keyof InputValueTypes;

export type PendingActionKind =
  | 'start'
  | 'complete'
  | 'skip'
  | 'move'
  | 'textInput'
  | 'toggleInput'
  | 'sliderInput'
  | 'pickerInput'
  | 'datePickerInput'
  | 'stepperInput'
  | 'segmentedInput'
  | 'multiSelectInput'
  | 'routeStart'
  | 'routeEnd';

export interface PendingAction {
  kind: PendingActionKind;
  entityId?: string;
  key?: string;
  value?: string;
  reason?: ReasonCode;
  timestamp: Date;
}

export interface SyncFailure {
  type: 'sync';
  message: string;
  action: PendingAction;
  attempts: number;
}

export type SyncResult =
  | { status: 'synced'; delivered: number }
  | { status: 'failed'; delivered: number; remaining: number; failure: SyncFailure }
  | { status: 'interrupted'; delivered: number; remaining: number }
  | { status: 'skipped'; reason: 'offline' | 'inProgress' | 'empty' };

export interface RouteStats {
  total: number;
  completed: number;
  remaining: number;
  skipped: number;
  completionPercentage: number;
}
