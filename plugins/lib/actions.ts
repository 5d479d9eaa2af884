/**
 * Action lists
 *
 * A source's actions are an ordered list of `[description, action]` pairs;
 * the first one is the default action run on confirm. Plugins build their
 * lists by splicing a generic list with `hackActions`.
 *
 * @example
 * ```typescript
 * const projectFileActions = hackActions(
 *   genericFileActions,
 *   // delete
 *   browseProject,
 *   // substitute
 *   [switchToShellHere, projectSwitchToShell],
 *   // rename
 *   [grepFiles, "Grep in projects `C-s'"],
 *   // require
 *   ["Open Dired in project's directory `C-c d'", diredFilesNew],
 * );
 * ```
 */

export interface ActionContext<T> {
  /** Marked candidates of the selection's source, or just the selection */
  marked: T[];
  /** Prompt input when the action ran */
  input: string;
  /** Name of the source the candidate came from */
  source: string;
}

export type Action<T> = (candidate: T, context: ActionContext<T>) => void | Promise<void>;

export type ActionEntry<T> = readonly [description: string, action: Action<T>];

export type ActionList<T> = ReadonlyArray<ActionEntry<T>>;

/**
 * One instruction of an action-list prescription
 *
 * - `action`: delete every entry running `action`
 * - `[from, to]`: run `to` where `from` ran
 * - `[action, description]`: rename the entry running `action`
 * - `[description, action]`: append the entry unless `action` is present
 */
export type ActionInstruction<T> =
  | Action<T>
  | readonly [from: Action<T>, to: Action<T>]
  | readonly [action: Action<T>, description: string]
  | readonly [description: string, action: Action<T>];

interface Edit<T> {
  from: Action<T>;
  to: Action<T> | string;
}

/**
 * Apply a prescription to an action list and return the new list
 *
 * Substitutions and renames are matched against each entry's original
 * action, in prescription order, so one entry can be both substituted and
 * renamed. Required entries are appended in prescription order after the
 * surviving entries. `actions` is left untouched.
 */
export function hackActions<T>(
  actions: ActionList<T>,
  ...prescription: ActionInstruction<T>[]
): ActionList<T> {
  const toDelete = new Set<Action<T>>();
  const edits: Edit<T>[] = [];
  const required: ActionEntry<T>[] = [];

  for (const instruction of prescription) {
    if (typeof instruction === "function") {
      toDelete.add(instruction);
      continue;
    }
    const [first, second] = instruction;
    if (typeof first === "string") {
      if (typeof second === "function") {
        required.push([first, second]);
      }
    } else {
      edits.push({ from: first, to: second });
    }
  }

  const hacked: ActionEntry<T>[] = [];
  for (const [description, action] of actions) {
    if (toDelete.has(action)) continue;

    let newDescription = description;
    let newAction = action;
    for (const edit of edits) {
      if (edit.from !== action) continue;
      if (typeof edit.to === "string") {
        newDescription = edit.to;
      } else {
        newAction = edit.to;
      }
    }
    hacked.push([newDescription, newAction]);
  }

  for (const entry of required) {
    if (!hacked.some(([, action]) => action === entry[1])) {
      hacked.push(entry);
    }
  }

  return hacked;
}

export function defaultAction<T>(actions: ActionList<T>): Action<T> | null {
  return actions.length > 0 ? actions[0][1] : null;
}

export function findAction<T>(actions: ActionList<T>, description: string): Action<T> | null {
  const entry = actions.find(([d]) => d === description);
  return entry ? entry[1] : null;
}
