import {
  ComponentDescriptor,
  ComponentKind,
  INPUT_KINDS,
  LangCode,
  ValidationIssue,
  ValidationRuleCode
} from '../types';
import { walkDescriptor } from '../services/screen/descriptor';
import { tSystem } from '../web/systemStrings';

interface ComponentRule {
  code: ValidationRuleCode;
  /** Kinds the rule constrains; omitted means every kind. */
  kinds?: readonly ComponentKind[];
  isSatisfied: (node: ComponentDescriptor) => boolean;
  fallback: string;
}

const hasText = (value: string | undefined): boolean => value !== undefined;

// Evaluation order matters: a node reports only the first rule it breaks.
const RULES: ComponentRule[] = [
  {
    code: 'missingId',
    isSatisfied: node => !!node.id,
    fallback: "Component missing required 'id'"
  },
  {
    code: 'missingValueKey',
    kinds: INPUT_KINDS,
    isSatisfied: node => hasText(node.valueKey),
    fallback: "Input component missing required 'valueKey'"
  },
  {
    code: 'missingOptions',
    kinds: ['picker', 'segmentedControl'],
    isSatisfied: node => !!node.options && node.options.length > 0,
    fallback: "Picker component missing 'options'"
  },
  {
    code: 'invalidRange',
    kinds: ['slider', 'stepper'],
    isSatisfied: node => node.minValue === undefined || node.maxValue === undefined || node.minValue < node.maxValue,
    fallback: '{kind} minValue must be less than maxValue'
  },
  {
    code: 'emptyContainer',
    kinds: ['vstack', 'hstack', 'scroll', 'grid', 'section'],
    isSatisfied: node => !!node.children && node.children.length > 0,
    fallback: "Container component missing 'children'"
  },
  {
    code: 'missingItemTemplate',
    kinds: ['list'],
    isSatisfied: node => !!node.itemTemplate,
    fallback: "List component missing 'itemView'"
  },
  {
    code: 'missingDestination',
    kinds: ['navigationLink'],
    isSatisfied: node => hasText(node.destination),
    fallback: "NavigationLink missing 'destination'"
  },
  {
    code: 'missingPresentationKey',
    kinds: ['alert', 'actionSheet'],
    isSatisfied: node => hasText(node.isPresented),
    fallback: "{kind} missing 'isPresented' key"
  },
  {
    code: 'missingImageSource',
    kinds: ['image'],
    isSatisfied: node => hasText(node.imageName) || hasText(node.url),
    fallback: "Image component missing 'imageName' or 'url'"
  },
  {
    code: 'progressOutOfRange',
    kinds: ['progressView'],
    isSatisfied: node => node.progress === undefined || (node.progress >= 0 && node.progress <= 1),
    fallback: 'ProgressView progress must be between 0 and 1'
  }
];

const appliesTo = (rule: ComponentRule, kind: ComponentKind): boolean =>
  !rule.kinds || rule.kinds.some(k => k === kind);

export class ComponentValidator {
  /**
   * Checks a single node (not its descendants).
   * @returns the first broken rule, or null when the node is renderable
   */
  static validate(node: ComponentDescriptor, path = 'root', language: LangCode = 'EN'): ValidationIssue | null {
    const broken = RULES.find(rule => appliesTo(rule, node.kind) && !rule.isSatisfied(node));
    if (!broken) return null;
    return {
      id: node.id,
      kind: node.kind,
      rule: broken.code,
      message: tSystem(`validation.${broken.code}`, language, broken.fallback, { kind: node.kind }),
      path
    };
  }

  /**
   * Validates every node of a tree independently, so a bad node never hides
   * problems (or successes) elsewhere in the same screen.
   */
  static validateTree(root: ComponentDescriptor, language: LangCode = 'EN'): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    walkDescriptor(root, (node, path) => {
      const issue = this.validate(node, path, language);
      if (issue) issues.push(issue);
    });
    return issues;
  }

  static issuesById(issues: ValidationIssue[]): Map<string, ValidationIssue> {
    const map = new Map<string, ValidationIssue>();
    issues.forEach(issue => {
      if (!map.has(issue.id)) map.set(issue.id, issue);
    });
    return map;
  }
}
