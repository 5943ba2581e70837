/**
 * Shared menu rendering
 *
 * Index-based menus: the caller owns the selection, this only draws it.
 */

import { getCurrentThemeColor } from '../utils';

export interface SimpleMenuItem {
  label: string;
  shortcut?: string;
}

export interface RenderMenuOptions {
  centerX: number;
  startY: number;
  showShortcuts?: boolean;
  /** Stack items (default) or lay them out side by side for left/right menus */
  layout?: 'column' | 'row';
  gap?: number;
}

const SELECTED_STYLE = '\x1b[1;93m';

function itemText(item: SimpleMenuItem, selected: boolean, showShortcuts: boolean): string {
  let displayText = item.label;
  if (showShortcuts && item.shortcut) {
    displayText += ` [${item.shortcut}]`;
  }
  return selected ? `► ${displayText} ◄` : `  ${displayText}  `;
}

/**
 * Render a simple menu with the selected item highlighted
 * Returns ANSI escape sequence string
 */
export function renderSimpleMenu(
  items: readonly SimpleMenuItem[],
  selection: number,
  options: RenderMenuOptions
): string {
  const themeColor = getCurrentThemeColor();
  const { centerX, startY, showShortcuts = true, layout = 'column', gap = 2 } = options;
  const texts = items.map((item, i) => itemText(item, i === selection, showShortcuts));
  const styleFor = (i: number) => (i === selection ? SELECTED_STYLE : `\x1b[2m${themeColor}`);

  let output = '';

  if (layout === 'row') {
    const totalWidth = texts.reduce((sum, text) => sum + text.length, 0) + gap * (texts.length - 1);
    let x = Math.max(1, centerX - Math.floor(totalWidth / 2));
    texts.forEach((text, i) => {
      output += `\x1b[${startY};${x}H${styleFor(i)}${text}\x1b[0m`;
      x += text.length + gap;
    });
    return output;
  }

  texts.forEach((text, i) => {
    const itemX = Math.max(1, centerX - Math.floor(text.length / 2));
    output += `\x1b[${startY + i};${itemX}H${styleFor(i)}${text}\x1b[0m`;
  });

  return output;
}

/**
 * Dim one-line hint centred under a menu
 */
export function renderMenuHint(hint: string, centerX: number, y: number): string {
  const hintX = Math.max(1, centerX - Math.floor(hint.length / 2));
  return `\x1b[${y};${hintX}H\x1b[2m${getCurrentThemeColor()}${hint}\x1b[0m`;
}
