/**
 * Edge detection
 *
 * Turns two consecutive held-button snapshots into "just pressed" actions.
 * detectEdges is a pure diff; EdgeTracker holds the previous snapshot for
 * one consuming context (menus, name entry), so each context sees its own
 * edges across phase changes.
 */

import { EMPTY_SNAPSHOT, type InputSnapshot } from './input';

export interface EdgeSet {
  systemOnePlayer: boolean;
  systemTwoPlayer: boolean;
  confirm: boolean;
  up: boolean;
  down: boolean;
  left: boolean;
  right: boolean;
}

export type Action = keyof EdgeSet;

/**
 * Whether a logical action is held in a snapshot.
 * Confirm and left/right accept either player; up/down are player 1 only.
 */
export function isHeld(snapshot: InputSnapshot, action: Action): boolean {
  switch (action) {
    case 'systemOnePlayer': return snapshot.systemOnePlayer;
    case 'systemTwoPlayer': return snapshot.systemTwoPlayer;
    case 'confirm': return snapshot.player1Confirm || snapshot.player2Confirm;
    case 'up': return snapshot.player1Up;
    case 'down': return snapshot.player1Down;
    case 'left': return snapshot.player1Left || snapshot.player2Left;
    case 'right': return snapshot.player1Right || snapshot.player2Right;
  }
}

export function detectEdges(previous: InputSnapshot, current: InputSnapshot): EdgeSet {
  const edge = (action: Action) => isHeld(current, action) && !isHeld(previous, action);
  return {
    systemOnePlayer: edge('systemOnePlayer'),
    systemTwoPlayer: edge('systemTwoPlayer'),
    confirm: edge('confirm'),
    up: edge('up'),
    down: edge('down'),
    left: edge('left'),
    right: edge('right'),
  };
}

export interface EdgeTracker {
  /** Diff against the stored snapshot, then store `current` */
  update(current: InputSnapshot): EdgeSet;
  /** Replace the stored snapshot without producing edges */
  reset(snapshot?: InputSnapshot): void;
  previous(): InputSnapshot;
}

export function createEdgeTracker(initial: InputSnapshot = EMPTY_SNAPSHOT): EdgeTracker {
  let last = initial;

  return {
    update(current) {
      const edges = detectEdges(last, current);
      last = current;
      return edges;
    },
    reset(snapshot = EMPTY_SNAPSHOT) {
      last = snapshot;
    },
    previous() {
      return last;
    },
  };
}
