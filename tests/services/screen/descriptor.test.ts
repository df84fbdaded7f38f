import {
  ALL_KINDS,
  countDescriptors,
  findDescriptor,
  isComponentKind,
  isContainerKind,
  isDelegatedKind,
  isInputKind,
  kindCategory,
  walkDescriptor
} from '../../../src/services/screen/descriptor';
import type { ComponentDescriptor } from '../../../src/types';

const tree: ComponentDescriptor = {
  id: 'root',
  kind: 'vstack',
  children: [
    { id: 'header', kind: 'hstack', children: [{ id: 'title', kind: 'text', text: 'Route' }] },
    { id: 'jobs', kind: 'list', itemTemplate: { id: 'row', kind: 'text', bindingKey: 'customerName' } }
  ]
};

describe('component kinds', () => {
  test('the kind set is closed', () => {
    expect(ALL_KINDS).toHaveLength(49);
    expect(new Set(ALL_KINDS).size).toBe(49);
    expect(isComponentKind('gauge')).toBe(true);
    expect(isComponentKind('hologram')).toBe(false);
    expect(isComponentKind(3)).toBe(false);
  });

  test('every kind has a category', () => {
    expect(kindCategory('grid')).toBe('container');
    expect(kindCategory('forEach')).toBe('collection');
    expect(kindCategory('webView')).toBe('content');
    expect(kindCategory('datePicker')).toBe('input');
    expect(kindCategory('actionSheet')).toBe('presentation');
    expect(kindCategory('conditional')).toBe('logic');
    expect(kindCategory('dosageCalculator')).toBe('delegated');
  });

  test('guards', () => {
    expect(isContainerKind('tabView')).toBe(true);
    expect(isContainerKind('list')).toBe(false);
    expect(isInputKind('segmentedControl')).toBe(true);
    expect(isInputKind('button')).toBe(false);
    expect(isDelegatedKind('qrScanner')).toBe(true);
  });
});

describe('walkDescriptor', () => {
  test('visits children before the item template, depth first', () => {
    const seen: Array<[string, string, number]> = [];
    walkDescriptor(tree, (node, path, depth) => seen.push([node.id, path, depth]));
    expect(seen).toEqual([
      ['root', 'root', 0],
      ['header', 'root.children[0]', 1],
      ['title', 'root.children[0].children[0]', 2],
      ['jobs', 'root.children[1]', 1],
      ['row', 'root.children[1].itemTemplate', 2]
    ]);
  });

  test('find and count', () => {
    expect(findDescriptor(tree, 'row')?.bindingKey).toBe('customerName');
    expect(findDescriptor(tree, 'missing')).toBeUndefined();
    expect(countDescriptors(tree)).toBe(5);
  });
});
