import {
  decodeComponent,
  decodeScreen,
  encodeComponent,
  encodeScreen,
  parseScreen
} from '../../../src/services/screen/decoder';
import type { ComponentDescriptor } from '../../../src/types';
import { readFixture } from '../../helpers/jobs';

const sequentialIds = () => {
  let n = 0;
  return () => {
    n += 1;
    return `gen-${n}`;
  };
};

describe('decodeScreen', () => {
  test('decodes a screen and drops only the malformed child', () => {
    const result = parseScreen(readFixture('technician_screen_v5.json'));
    if (!result.ok) throw new Error(result.error.message);

    const root = result.value.component;
    expect(result.value.version).toBe(5);
    expect(root.kind).toBe('vstack');
    expect(root.spacing).toBe(8);
    expect((root.children || []).map(c => c.id)).toEqual(['title', 'jobs', 'badSlider', 'startRoute']);
    expect(result.issues).toEqual([
      { path: 'root.children[2]', message: 'Unknown component type "hologram"', id: 'mystery' }
    ]);

    const list = (root.children || [])[1];
    expect(list.itemTemplate?.id).toBe('row');
    expect((list.itemTemplate?.children || [])[0].bindingKey).toBe('customerName');
  });

  test('rejects unsupported versions before decoding', () => {
    const result = parseScreen(readFixture('technician_screen_v9.json'));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({
      type: 'version',
      message: 'Unsupported screen version: 9. Supported: 1, 2, 3, 4, 5.',
      version: 9,
      supported: [1, 2, 3, 4, 5]
    });
  });

  test('a numeric string is not a version', () => {
    const result = decodeScreen({ version: '5', component: { type: 'text' } });
    expect(result.ok ? null : result.error.type).toBe('version');
  });

  test('invalid JSON is a decode error', () => {
    const result = parseScreen('{"version": 5,');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.type).toBe('decode');
    expect(result.error.message.startsWith('Invalid JSON: ')).toBe(true);
  });

  test('a root without a type fails the whole screen', () => {
    const result = decodeScreen({ version: 2, component: { id: 'root' } });
    expect(result).toEqual({
      ok: false,
      error: { type: 'decode', path: 'root', message: "Component missing required 'type'" }
    });
  });
});

describe('decodeComponent', () => {
  test('assigns ids to nodes and options that arrive without one', () => {
    const result = decodeComponent(
      { type: 'picker', valueKey: 'product', options: [{ text: 'Bifen', value: 'bifen' }] },
      5,
      { freshId: sequentialIds() }
    );
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.id).toBe('gen-1');
    expect(result.value.options).toEqual([{ id: 'gen-2', text: 'Bifen', value: 'bifen' }]);
  });

  test('a field of the wrong type drops that node', () => {
    const result = decodeComponent(
      { id: 'root', type: 'vstack', children: [{ id: 'a', type: 'text', padding: '8' }, { id: 'b', type: 'divider' }] },
      5
    );
    if (!result.ok) throw new Error(result.error.message);
    expect((result.value.children || []).map(c => c.id)).toEqual(['b']);
    expect(result.issues).toEqual([{ path: 'root.children[0].padding', message: "'padding' must be a number", id: 'a' }]);
  });

  test('a dropped item template leaves the list without one', () => {
    const result = decodeComponent({ id: 'jobs', type: 'list', itemView: { id: 'row' } }, 5);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.itemTemplate).toBeUndefined();
    expect(result.issues[0].path).toBe('root.itemView');
  });

  test('shadow offset defaults', () => {
    const result = decodeComponent({ id: 'card', type: 'section', shadowOffset: {} }, 4);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.shadowOffset).toEqual({ x: 0, y: 2 });
  });

  test('unsupported version', () => {
    const result = decodeComponent({ id: 'x', type: 'text' }, 6);
    expect(result.ok ? null : result.error.type).toBe('version');
  });
});

describe('encodeComponent', () => {
  test('writes wire names and keeps ids', () => {
    const node: ComponentDescriptor = {
      id: 'jobs',
      kind: 'list',
      itemTemplate: { id: 'row', kind: 'text', bindingKey: 'address' }
    };
    expect(encodeComponent(node)).toEqual({
      id: 'jobs',
      type: 'list',
      itemView: { id: 'row', type: 'text', key: 'address' }
    });
  });

  test('decoding what was encoded yields the same ids without generating new ones', () => {
    const first = decodeScreen(JSON.parse(readFixture('technician_screen_v5.json')));
    if (!first.ok) throw new Error(first.error.message);

    const freshId = jest.fn(() => 'unexpected');
    const second = decodeScreen(encodeScreen(first.value), { freshId });
    if (!second.ok) throw new Error(second.error.message);

    expect(freshId).not.toHaveBeenCalled();
    expect(second.value).toEqual(first.value);
    expect(second.issues).toEqual([]);
  });
});
