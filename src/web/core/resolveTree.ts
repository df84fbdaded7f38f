import type { ComponentDescriptor, InputValueKind, Job, ValidationIssue } from '../../types';
import { ComponentValidator } from '../../config/ComponentValidator';
import { isInputKind } from '../../services/screen/descriptor';
import { tSystem } from '../systemStrings';
import type { BindingContext } from '../types';
import { isConditionMet, resolveLabel, resolveText } from '../rules/bindings';
import { makeContextKey } from '../rules/template';

export type ResolvedValue = string | number | boolean | Date | string[];

export interface ResolvedInput {
  storeKind: InputValueKind;
  contextKey: string;
  value: ResolvedValue;
}

export interface ResolvedNode {
  id: string;
  kind: ComponentDescriptor['kind'];
  path: string;
  descriptor: ComponentDescriptor;
  text: string;
  label: string;
  entityId?: string;
  input?: ResolvedInput;
  /** Presentation flag for alerts and action sheets. */
  presented?: boolean;
  error?: ValidationIssue;
  children: ResolvedNode[];
}

export interface ResolveTreeOptions {
  jobs: readonly Job[];
}

export const storeKindFor = (node: ComponentDescriptor): InputValueKind | null => {
  switch (node.kind) {
    case 'textField':
      return 'text';
    case 'toggle':
      return 'toggle';
    case 'slider':
      return 'slider';
    case 'picker':
      return node.allowMultipleSelection ? 'multiSelect' : 'picker';
    case 'datePicker':
      return 'date';
    case 'stepper':
      return 'stepper';
    case 'segmentedControl':
      return 'segmented';
    default:
      return null;
  }
};

const readInput = (node: ComponentDescriptor, context: BindingContext): ResolvedInput | undefined => {
  const storeKind = storeKindFor(node);
  if (!storeKind || !node.valueKey) return undefined;
  const contextKey = makeContextKey(node.valueKey, context.entity?.id);
  const { store } = context;
  switch (storeKind) {
    case 'slider':
    case 'stepper':
      return { storeKind, contextKey, value: store.get(storeKind, contextKey, node.minValue ?? 0) };
    case 'picker': {
      const first = node.options && node.options.length ? node.options[0].value : '';
      return { storeKind, contextKey, value: store.get('picker', contextKey, first) };
    }
    default:
      return { storeKind, contextKey, value: store.get(storeKind, contextKey) };
  }
};

const placeholder = (node: ComponentDescriptor, path: string, issue: ValidationIssue, context: BindingContext): ResolvedNode => ({
  id: node.id,
  kind: node.kind,
  path,
  descriptor: node,
  text: tSystem('placeholders.renderError', context.language || 'EN', 'Rendering Error'),
  label: issue.message,
  entityId: context.entity?.id,
  error: issue,
  children: []
});

const resolveNode = (
  node: ComponentDescriptor,
  path: string,
  context: BindingContext,
  options: ResolveTreeOptions
): ResolvedNode => {
  const issue = ComponentValidator.validate(node, path, context.language);
  if (issue) return placeholder(node, path, issue, context);

  const resolved: ResolvedNode = {
    id: node.id,
    kind: node.kind,
    path,
    descriptor: node,
    text: resolveText(node, context),
    label: resolveLabel(node, context),
    entityId: context.entity?.id,
    children: []
  };

  if (isInputKind(node.kind)) {
    resolved.input = readInput(node, context);
  }
  if ((node.kind === 'alert' || node.kind === 'actionSheet') && node.isPresented) {
    resolved.presented = context.store.getPresentation(makeContextKey(node.isPresented, context.entity?.id));
  }

  const children = node.children || [];
  if (node.kind === 'list' || node.kind === 'forEach') {
    const template = node.itemTemplate;
    options.jobs.forEach((job, row) => {
      const rowContext: BindingContext = { ...context, entity: job };
      if (template) {
        resolved.children.push(resolveNode(template, `${path}.itemTemplate[${row}]`, rowContext, options));
      } else {
        children.forEach((child, i) => {
          resolved.children.push(resolveNode(child, `${path}[${row}].children[${i}]`, rowContext, options));
        });
      }
    });
    return resolved;
  }

  if (node.kind === 'conditional' && !isConditionMet(node, context)) return resolved;

  resolved.children = children.map((child, i) => resolveNode(child, `${path}.children[${i}]`, context, options));
  return resolved;
};

/**
 * Binds a descriptor tree to jobs and stored input values, producing what a
 * renderer draws. A node that fails validation becomes an error placeholder;
 * its siblings are unaffected.
 */
export const resolveTree = (root: ComponentDescriptor, context: BindingContext, options: ResolveTreeOptions): ResolvedNode =>
  resolveNode(root, 'root', context, options);
