/**
 * Project Finder Plugin Library
 *
 * Shared building blocks for finder plugins: host API types, the
 * multi-source Finder, action lists, keymaps and search command helpers.
 *
 * @example
 * ```typescript
 * import { Finder, defineSource, hackActions } from "./lib/index.ts";
 * import type { EditorAPI, ActionList } from "./lib/index.ts";
 * ```
 */

// Host API
export type {
  BufferId,
  BufferInfo,
  CommandArgs,
  DirConfig,
  DirtyProject,
  EditorAPI,
  EditorEventName,
  EditorEvents,
  ProcessHandle,
  ProjectAPI,
  PromptSuggestion,
  ShellKind,
  SpawnResult,
  VcsKind,
} from "./host.ts";

// Finder
export {
  Finder,
  abbreviateHome,
  defineSource,
  fuzzyFilter,
  fuzzyScore,
  getRelativePath,
  multiMatchFilter,
  parseGrepLine,
  parseGrepOutput,
} from "./finder.ts";
export type {
  DisplayEntry,
  FilterSource,
  FinderConfig,
  GrepMatch,
  Location,
  PromptOptions,
  SearchSource,
  Source,
  SourceDefinition,
} from "./finder.ts";

// Actions and keymaps
export { defaultAction, findAction, hackActions } from "./actions.ts";
export type { Action, ActionContext, ActionEntry, ActionInstruction, ActionList } from "./actions.ts";
export { baseFinderKeymap, keymapKeys, lookupKey, makeKeymap } from "./keymap.ts";
export type { FinderCommand, KeyBinding, Keymap } from "./keymap.ts";

// Search commands
export { ignoredDirectories, ignoredFiles, relativeIgnored, union } from "./ignore.ts";
export {
  GIT_GREP_TEMPLATE,
  ackArgs,
  agArgs,
  expandTemplate,
  formatCommand,
  grepArgs,
  grepExcludeArgs,
  grepTemplate,
  isCaseInsensitive,
  rgArgs,
} from "./grep_command.ts";

// Settings and errors
export { SettingsSchema, defaultSettings, loadSettings, parseSettings } from "./settings.ts";
export type { Settings, SourceKind } from "./settings.ts";
export { FinderError, NotInProjectError, errorMessage } from "./errors.ts";
