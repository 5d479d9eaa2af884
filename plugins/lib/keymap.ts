import type { Action } from "./actions.ts";

/** Commands the finder handles itself instead of running an action */
export type FinderCommand =
  | "toggle-mark"
  | "mark-all"
  | "unmark-all"
  | "persistent-action"
  | "select-action";

/** An action exits the prompt and runs on the selection */
export type KeyBinding<T> = Action<T> | FinderCommand;

export interface Keymap<T> {
  readonly bindings: ReadonlyArray<readonly [key: string, binding: KeyBinding<T>]>;
  readonly parent?: Keymap<T>;
}

export function makeKeymap<T>(
  bindings: ReadonlyArray<readonly [string, KeyBinding<T>]>,
  parent?: Keymap<T>
): Keymap<T> {
  return parent ? { bindings, parent } : { bindings };
}

/**
 * Find what a key runs, searching own bindings before the parent chain
 */
export function lookupKey<T>(keymap: Keymap<T>, key: string): KeyBinding<T> | null {
  let current: Keymap<T> | undefined = keymap;
  while (current) {
    for (const [bound, binding] of current.bindings) {
      if (bound === key) {
        return binding;
      }
    }
    current = current.parent;
  }
  return null;
}

/** Every bound key once, own bindings first */
export function keymapKeys<T>(keymap: Keymap<T>): string[] {
  const keys: string[] = [];
  const seen = new Set<string>();
  let current: Keymap<T> | undefined = keymap;
  while (current) {
    for (const [key] of current.bindings) {
      if (!seen.has(key)) {
        seen.add(key);
        keys.push(key);
      }
    }
    current = current.parent;
  }
  return keys;
}

/** Finder-wide bindings every source keymap inherits */
export function baseFinderKeymap<T>(): Keymap<T> {
  return makeKeymap<T>([
    ["Tab", "select-action"],
    ["C-j", "persistent-action"],
    ["C-Space", "toggle-mark"],
    ["M-a", "mark-all"],
    ["M-u", "unmark-all"],
  ]);
}
