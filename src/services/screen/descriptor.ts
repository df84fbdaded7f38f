import {
  COLLECTION_KINDS,
  CONTAINER_KINDS,
  CONTENT_KINDS,
  ComponentDescriptor,
  ComponentKind,
  ContainerKind,
  DELEGATED_KINDS,
  DelegatedKind,
  INPUT_KINDS,
  InputKind,
  KindCategory,
  LOGIC_KINDS,
  PRESENTATION_KINDS
} from '../../types';

const inList = <T extends string>(list: readonly T[], value: string): value is T => list.some(k => k === value);

export const ALL_KINDS: ComponentKind[] = [
  ...CONTAINER_KINDS,
  ...COLLECTION_KINDS,
  ...CONTENT_KINDS,
  ...INPUT_KINDS,
  ...PRESENTATION_KINDS,
  ...LOGIC_KINDS,
  ...DELEGATED_KINDS
];

export const isComponentKind = (value: unknown): value is ComponentKind =>
  typeof value === 'string' && inList(ALL_KINDS, value);

export const kindCategory = (kind: ComponentKind): KindCategory => {
  if (inList(CONTAINER_KINDS, kind)) return 'container';
  if (inList(COLLECTION_KINDS, kind)) return 'collection';
  if (inList(CONTENT_KINDS, kind)) return 'content';
  if (inList(INPUT_KINDS, kind)) return 'input';
  if (inList(PRESENTATION_KINDS, kind)) return 'presentation';
  if (inList(LOGIC_KINDS, kind)) return 'logic';
  if (inList(DELEGATED_KINDS, kind)) return 'delegated';
  const unreachable: never = kind;
  return unreachable;
};

export const isContainerKind = (kind: ComponentKind): kind is ContainerKind => inList(CONTAINER_KINDS, kind);

export const isInputKind = (kind: ComponentKind): kind is InputKind => inList(INPUT_KINDS, kind);

export const isDelegatedKind = (kind: ComponentKind): kind is DelegatedKind => inList(DELEGATED_KINDS, kind);

export type DescriptorVisitor = (node: ComponentDescriptor, path: string, depth: number) => void;

/**
 * Depth-first, pre-order. Paths look like `root.children[1].itemTemplate`.
 */
export const walkDescriptor = (root: ComponentDescriptor, visit: DescriptorVisitor, rootPath = 'root'): void => {
  const step = (node: ComponentDescriptor, path: string, depth: number) => {
    visit(node, path, depth);
    (node.children || []).forEach((child, idx) => step(child, `${path}.children[${idx}]`, depth + 1));
    if (node.itemTemplate) step(node.itemTemplate, `${path}.itemTemplate`, depth + 1);
  };
  step(root, rootPath, 0);
};

export const findDescriptor = (root: ComponentDescriptor, id: string): ComponentDescriptor | undefined => {
  let found: ComponentDescriptor | undefined;
  walkDescriptor(root, node => {
    if (!found && node.id === id) found = node;
  });
  return found;
};

export const countDescriptors = (root: ComponentDescriptor): number => {
  let count = 0;
  walkDescriptor(root, () => {
    count += 1;
  });
  return count;
};
