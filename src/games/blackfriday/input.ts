/**
 * Logical button snapshots
 *
 * Every input device reduces to the same ten held/not-held buttons.
 * Sources are merged by OR so keyboard and controller can be used together.
 */

export const BUTTONS = [
  'systemOnePlayer',
  'systemTwoPlayer',
  'player1Left',
  'player1Right',
  'player1Up',
  'player1Down',
  'player1Confirm',
  'player2Left',
  'player2Right',
  'player2Confirm',
] as const;

export type Button = (typeof BUTTONS)[number];

export type InputSnapshot = Readonly<Record<Button, boolean>>;

/**
 * Anything that can report which buttons are currently held
 */
export interface InputSource {
  snapshot(): InputSnapshot;
}

export function createSnapshot(pressed: Partial<Record<Button, boolean>> = {}): InputSnapshot {
  const buttons: Record<Button, boolean> = {
    systemOnePlayer: false,
    systemTwoPlayer: false,
    player1Left: false,
    player1Right: false,
    player1Up: false,
    player1Down: false,
    player1Confirm: false,
    player2Left: false,
    player2Right: false,
    player2Confirm: false,
  };
  for (const button of BUTTONS) {
    buttons[button] = pressed[button] ?? false;
  }
  return Object.freeze(buttons);
}

export const EMPTY_SNAPSHOT: InputSnapshot = createSnapshot();

/**
 * OR a keyboard snapshot with an optional controller snapshot.
 * A missing controller contributes nothing.
 */
export function mergeInputs(keyboard: InputSnapshot, controller: InputSnapshot | null): InputSnapshot {
  if (!controller) return keyboard;

  const merged: Record<Button, boolean> = { ...keyboard };
  for (const button of BUTTONS) {
    merged[button] = keyboard[button] || controller[button];
  }
  return Object.freeze(merged);
}

/**
 * Merge any number of sources, skipping ones that are not attached yet
 */
export function readSources(sources: readonly (InputSource | null)[]): InputSnapshot {
  let snapshot = EMPTY_SNAPSHOT;
  for (const source of sources) {
    if (source) snapshot = mergeInputs(snapshot, source.snapshot());
  }
  return snapshot;
}
