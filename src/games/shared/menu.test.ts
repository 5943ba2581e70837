import { describe, it, expect, afterEach } from 'vitest';
import { renderMenuHint, renderSimpleMenu, type SimpleMenuItem } from './menu';
import { setTheme } from '../utils';

const items: SimpleMenuItem[] = [
  { label: 'SOLO', shortcut: '1' },
  { label: 'DUO', shortcut: '2' },
];

afterEach(() => {
  setTheme('cyan');
});

describe('renderSimpleMenu', () => {
  it('stacks items and highlights the selection', () => {
    const output = renderSimpleMenu(items, 0, { centerX: 20, startY: 5 });

    expect(output).toBe(
      '\x1b[5;14H\x1b[1;93m► SOLO [1] ◄\x1b[0m' +
      '\x1b[6;15H\x1b[2m\x1b[96m  DUO [2]  \x1b[0m'
    );
  });

  it('can hide shortcuts', () => {
    const output = renderSimpleMenu(items, 1, { centerX: 20, startY: 5, showShortcuts: false });
    expect(output).toContain('► DUO ◄');
    expect(output).toContain('  SOLO  ');
  });

  it('lays items out in a row', () => {
    const output = renderSimpleMenu(items, 1, { centerX: 20, startY: 3, layout: 'row', gap: 2 });

    // "  SOLO [1]  " is 12 wide, "► DUO [2] ◄" is 11, plus the gap: 25 total
    expect(output).toBe(
      '\x1b[3;8H\x1b[2m\x1b[96m  SOLO [1]  \x1b[0m' +
      '\x1b[3;22H\x1b[1;93m► DUO [2] ◄\x1b[0m'
    );
  });

  it('uses the current theme for unselected items', () => {
    setTheme('amber');
    const output = renderSimpleMenu(items, 0, { centerX: 20, startY: 5 });
    expect(output).toContain('\x1b[2m\x1b[93m  DUO [2]  ');
  });

  it('never places an item left of column 1', () => {
    const output = renderSimpleMenu(items, 0, { centerX: 2, startY: 1 });
    expect(output.startsWith('\x1b[1;1H')).toBe(true);
  });
});

describe('renderMenuHint', () => {
  it('centres a dim hint', () => {
    expect(renderMenuHint('ENTER GO', 10, 8)).toBe('\x1b[8;6H\x1b[2m\x1b[96mENTER GO\x1b[0m');
  });
});
