import { randomUUID } from 'crypto';
import {
  AnimationSpec,
  ComponentDescriptor,
  DecodeError,
  DecodeIssue,
  DecodeResult,
  PickerOption,
  Screen,
  ShadowOffset,
  TransitionSpec,
  WireComponent,
  WireScreen
} from '../../types';
import { debugLog } from '../debug';
import { isComponentKind } from './descriptor';
import { buildVersionError, isVersionSupported } from './versions';

/**
 * Wire <-> model codec for server-driven screens.
 *
 * Responsibility:
 * - Reject unsupported payload versions before touching the tree
 * - Decode each node independently: a malformed child is dropped and reported, its siblings survive
 * - Assign ids to nodes (and picker options) that arrive without one, and always encode them back
 */

type Descriptor = ComponentDescriptor;

type FieldsOfType<V> = {
  [K in keyof Descriptor]-?: Descriptor[K] extends V | undefined ? K : never;
}[keyof Descriptor];

type StringField = Exclude<FieldsOfType<string>, 'id' | 'kind' | 'bindingKey'>;
type NumberField = FieldsOfType<number>;
type BooleanField = FieldsOfType<boolean>;
type StringListField = FieldsOfType<string[]>;

const STRING_FIELDS: StringField[] = [
  'text',
  'label',
  'placeholder',
  'title',
  'message',
  'actionId',
  'font',
  'color',
  'fontWeight',
  'foregroundColor',
  'backgroundColor',
  'borderColor',
  'shadowColor',
  'conditionKey',
  'valueKey',
  'selectionMode',
  'gridItemSize',
  'destination',
  'isPresented',
  'chartType',
  'dataKey',
  'imageName',
  'url',
  'webURL'
];

const NUMBER_FIELDS: NumberField[] = [
  'padding',
  'spacing',
  'cornerRadius',
  'borderWidth',
  'shadowRadius',
  'opacity',
  'rotation',
  'scale',
  'minValue',
  'maxValue',
  'step',
  'columns',
  'gridItemMinSize',
  'progress',
  'gaugeMin',
  'gaugeMax',
  'centerLatitude',
  'centerLongitude',
  'span'
];

const BOOLEAN_FIELDS: BooleanField[] = ['showValue', 'allowMultipleSelection'];

const STRING_LIST_FIELDS: StringListField[] = ['validationRules'];

const WIRE_BINDING_KEY = 'key';
const WIRE_ITEM_TEMPLATE = 'itemView';

export interface DecodeOptions {
  /** Id source for nodes that arrive without one. */
  freshId?: () => string;
}

interface DecodeContext {
  issues: DecodeIssue[];
  freshId: () => string;
}

type NodeResult<T> = { ok: true; value: T } | { ok: false; error: DecodeError };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

const isAbsent = (value: unknown): value is null | undefined => value === undefined || value === null;

const fail = (path: string, message: string): { ok: false; error: DecodeError } => ({
  ok: false,
  error: { type: 'decode', path, message }
});

const describeType = (value: unknown): string => (Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value);

const decodeOptions = (raw: unknown, path: string, ctx: DecodeContext): NodeResult<PickerOption[]> => {
  if (!Array.isArray(raw)) return fail(path, `Expected 'options' to be an array, got ${describeType(raw)}`);
  const out: PickerOption[] = [];
  for (let idx = 0; idx < raw.length; idx += 1) {
    const entry = raw[idx];
    const entryPath = `${path}[${idx}]`;
    if (!isRecord(entry)) return fail(entryPath, 'Picker option must be an object');
    const { id, text, value } = entry;
    if (typeof text !== 'string') return fail(entryPath, "Picker option missing string 'text'");
    if (typeof value !== 'string') return fail(entryPath, "Picker option missing string 'value'");
    if (!isAbsent(id) && typeof id !== 'string') return fail(entryPath, "Picker option 'id' must be a string");
    out.push({ id: typeof id === 'string' ? id : ctx.freshId(), text, value });
  }
  return { ok: true, value: out };
};

const decodeShadowOffset = (raw: unknown, path: string): NodeResult<ShadowOffset> => {
  if (!isRecord(raw)) return fail(path, "Expected 'shadowOffset' to be an object");
  const x = isAbsent(raw.x) ? 0 : raw.x;
  const y = isAbsent(raw.y) ? 2 : raw.y;
  if (typeof x !== 'number' || typeof y !== 'number') return fail(path, "'shadowOffset' x/y must be numbers");
  return { ok: true, value: { x, y } };
};

const decodeAnimation = (raw: unknown, path: string): NodeResult<AnimationSpec> => {
  if (!isRecord(raw)) return fail(path, "Expected 'animation' to be an object");
  const out: AnimationSpec = {};
  if (!isAbsent(raw.type)) {
    if (typeof raw.type !== 'string') return fail(path, "'animation.type' must be a string");
    out.type = raw.type;
  }
  if (!isAbsent(raw.duration)) {
    if (typeof raw.duration !== 'number') return fail(path, "'animation.duration' must be a number");
    out.duration = raw.duration;
  }
  return { ok: true, value: out };
};

const decodeTransition = (raw: unknown, path: string): NodeResult<TransitionSpec> => {
  if (!isRecord(raw)) return fail(path, "Expected 'transition' to be an object");
  if (isAbsent(raw.type)) return { ok: true, value: {} };
  if (typeof raw.type !== 'string') return fail(path, "'transition.type' must be a string");
  return { ok: true, value: { type: raw.type } };
};

const recordDroppedNode = (raw: unknown, error: DecodeError, ctx: DecodeContext): void => {
  const id = isRecord(raw) && typeof raw.id === 'string' ? raw.id : undefined;
  ctx.issues.push({ path: error.path, message: error.message, ...(id !== undefined ? { id } : {}) });
  debugLog('ScreenDecoder', 'decode.nodeDropped', { path: error.path, message: error.message, id: id || null });
};

const decodeNode = (raw: unknown, path: string, ctx: DecodeContext): NodeResult<Descriptor> => {
  if (!isRecord(raw)) return fail(path, `Component must be an object, got ${describeType(raw)}`);

  const type = raw.type;
  if (isAbsent(type)) return fail(path, "Component missing required 'type'");
  if (!isComponentKind(type)) return fail(path, `Unknown component type ${JSON.stringify(type)}`);

  let id: string;
  if (isAbsent(raw.id)) {
    id = ctx.freshId();
  } else if (typeof raw.id === 'string') {
    id = raw.id;
  } else {
    return fail(`${path}.id`, "'id' must be a string");
  }

  const node: Descriptor = { id, kind: type };

  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (isAbsent(value)) continue;
    if (typeof value !== 'string') return fail(`${path}.${field}`, `'${field}' must be a string`);
    node[field] = value;
  }
  for (const field of NUMBER_FIELDS) {
    const value = raw[field];
    if (isAbsent(value)) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) return fail(`${path}.${field}`, `'${field}' must be a number`);
    node[field] = value;
  }
  for (const field of BOOLEAN_FIELDS) {
    const value = raw[field];
    if (isAbsent(value)) continue;
    if (typeof value !== 'boolean') return fail(`${path}.${field}`, `'${field}' must be a boolean`);
    node[field] = value;
  }
  for (const field of STRING_LIST_FIELDS) {
    const value = raw[field];
    if (isAbsent(value)) continue;
    if (!Array.isArray(value)) return fail(`${path}.${field}`, `'${field}' must be an array of strings`);
    const strings: string[] = [];
    for (const entry of value) {
      if (typeof entry !== 'string') return fail(`${path}.${field}`, `'${field}' must be an array of strings`);
      strings.push(entry);
    }
    node[field] = strings;
  }

  const bindingKey = raw[WIRE_BINDING_KEY];
  if (!isAbsent(bindingKey)) {
    if (typeof bindingKey !== 'string') return fail(`${path}.${WIRE_BINDING_KEY}`, `'${WIRE_BINDING_KEY}' must be a string`);
    node.bindingKey = bindingKey;
  }

  if (!isAbsent(raw.options)) {
    const options = decodeOptions(raw.options, `${path}.options`, ctx);
    if (!options.ok) return options;
    node.options = options.value;
  }
  if (!isAbsent(raw.shadowOffset)) {
    const offset = decodeShadowOffset(raw.shadowOffset, `${path}.shadowOffset`);
    if (!offset.ok) return offset;
    node.shadowOffset = offset.value;
  }
  if (!isAbsent(raw.animation)) {
    const animation = decodeAnimation(raw.animation, `${path}.animation`);
    if (!animation.ok) return animation;
    node.animation = animation.value;
  }
  if (!isAbsent(raw.transition)) {
    const transition = decodeTransition(raw.transition, `${path}.transition`);
    if (!transition.ok) return transition;
    node.transition = transition.value;
  }

  if (!isAbsent(raw.children)) {
    if (!Array.isArray(raw.children)) return fail(`${path}.children`, "'children' must be an array");
    const children: Descriptor[] = [];
    raw.children.forEach((child, idx) => {
      const decoded = decodeNode(child, `${path}.children[${idx}]`, ctx);
      if (decoded.ok) children.push(decoded.value);
      else recordDroppedNode(child, decoded.error, ctx);
    });
    node.children = children;
  }

  const itemView = raw[WIRE_ITEM_TEMPLATE];
  if (!isAbsent(itemView)) {
    const decoded = decodeNode(itemView, `${path}.${WIRE_ITEM_TEMPLATE}`, ctx);
    if (decoded.ok) node.itemTemplate = decoded.value;
    else recordDroppedNode(itemView, decoded.error, ctx);
  }

  return { ok: true, value: node };
};

const buildContext = (options?: DecodeOptions): DecodeContext => ({
  issues: [],
  freshId: options?.freshId || (() => randomUUID())
});

export const decodeComponent = (raw: unknown, screenVersion: unknown, options?: DecodeOptions): DecodeResult => {
  if (!isVersionSupported(screenVersion)) {
    debugLog('ScreenDecoder', 'decode.versionRejected', { version: screenVersion === undefined ? null : screenVersion });
    return { ok: false, error: buildVersionError(screenVersion) };
  }
  const ctx = buildContext(options);
  const decoded = decodeNode(raw, 'root', ctx);
  if (!decoded.ok) return decoded;
  return { ok: true, value: decoded.value, issues: ctx.issues };
};

export const decodeScreen = (payload: unknown, options?: DecodeOptions): DecodeResult<Screen> => {
  if (!isRecord(payload)) {
    return fail('screen', `Screen payload must be an object, got ${describeType(payload)}`);
  }
  const version = payload.version;
  if (!isVersionSupported(version)) {
    debugLog('ScreenDecoder', 'decode.versionRejected', { version: version === undefined ? null : version });
    return { ok: false, error: buildVersionError(version) };
  }
  const component = decodeComponent(payload.component, version, options);
  if (!component.ok) return component;
  return { ok: true, value: { version, component: component.value }, issues: component.issues };
};

export const parseScreen = (json: string, options?: DecodeOptions): DecodeResult<Screen> => {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return fail('screen', `Invalid JSON: ${message}`);
  }
  return decodeScreen(payload, options);
};

const encodeOptions = (options: PickerOption[]): WireComponent[] =>
  options.map(option => ({ id: option.id, text: option.text, value: option.value }));

export const encodeComponent = (node: ComponentDescriptor): WireComponent => {
  const out: WireComponent = { id: node.id, type: node.kind };
  STRING_FIELDS.forEach(field => {
    const value = node[field];
    if (value !== undefined) out[field] = value;
  });
  NUMBER_FIELDS.forEach(field => {
    const value = node[field];
    if (value !== undefined) out[field] = value;
  });
  BOOLEAN_FIELDS.forEach(field => {
    const value = node[field];
    if (value !== undefined) out[field] = value;
  });
  STRING_LIST_FIELDS.forEach(field => {
    const value = node[field];
    if (value !== undefined) out[field] = [...value];
  });
  if (node.bindingKey !== undefined) out[WIRE_BINDING_KEY] = node.bindingKey;
  if (node.options) out.options = encodeOptions(node.options);
  if (node.shadowOffset) out.shadowOffset = { x: node.shadowOffset.x, y: node.shadowOffset.y };
  if (node.animation) out.animation = { ...node.animation };
  if (node.transition) out.transition = { ...node.transition };
  if (node.children) out.children = node.children.map(encodeComponent);
  if (node.itemTemplate) out[WIRE_ITEM_TEMPLATE] = encodeComponent(node.itemTemplate);
  return out;
};

export const encodeScreen = (screen: Screen): WireScreen => ({
  version: screen.version,
  component: encodeComponent(screen.component)
});
