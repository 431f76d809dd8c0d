import type { RawInputFrame } from './InputSampler';

export type KeyState = { [key: string]: boolean };

/** Fixed bindings; remapping is left to the host. */
export const KEY_BINDINGS = {
  left: ['arrowleft', 'a'],
  right: ['arrowright', 'd'],
  up: ['arrowup', 'w'],
  down: ['arrowdown', 's'],
  jump: [' ', 'z'],
  attack: ['x', 'j'],
  dash: ['shift', 'c'],
} as const;

type Action = keyof typeof KEY_BINDINGS;

export function createKeyState(): KeyState {
  return {};
}

function held(state: KeyState, action: Action): boolean {
  return KEY_BINDINGS[action].some(k => state[k] === true);
}

/** Collapse the key table into one raw input frame (axes in -1..1). */
export function fromKeyState(state: KeyState): RawInputFrame {
  const x = (held(state, 'right') ? 1 : 0) - (held(state, 'left') ? 1 : 0);
  const y = (held(state, 'up') ? 1 : 0) - (held(state, 'down') ? 1 : 0);
  return {
    moveX: x,
    moveY: y,
    jump: held(state, 'jump'),
    attack: held(state, 'attack'),
    dash: held(state, 'dash'),
  };
}

/** Minimal shape of a DOM-like keyboard event source. */
export interface KeyEventSource {
  addEventListener(type: 'keydown' | 'keyup', fn: (e: { key: string }) => void): void;
  removeEventListener(type: 'keydown' | 'keyup', fn: (e: { key: string }) => void): void;
}

/** Mirror key presses from `source` into `state`. Returns an unbind function. */
export function bindKeyboard(source: KeyEventSource, state: KeyState): () => void {
  const down = (e: { key: string }) => { state[e.key.toLowerCase()] = true; };
  const up = (e: { key: string }) => { state[e.key.toLowerCase()] = false; };
  source.addEventListener('keydown', down);
  source.addEventListener('keyup', up);
  return () => {
    source.removeEventListener('keydown', down);
    source.removeEventListener('keyup', up);
  };
}
