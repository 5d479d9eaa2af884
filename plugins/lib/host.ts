/**
 * Host API for project-finder plugins
 *
 * Plugins never talk to the editor or the project layer directly; they
 * receive two collaborators when they are installed:
 *
 * - `EditorAPI`: the host editor (prompt, status line, buffers, key modes,
 *   process spawning, navigation primitives)
 * - `ProjectAPI`: the host project-management layer (project roots, known
 *   projects, project files and directories, ignore lists, VCS)
 *
 * ## Core Concepts
 *
 * ### Prompts
 * A prompt is the editor's single-line input with a suggestion list below
 * it. Each prompt has a `prompt_type`; the editor reports input changes,
 * selection changes, confirmation and cancellation as events carrying that
 * type, so one handler can serve many prompts.
 *
 * ### Handlers
 * Events, key bindings and commands take plain callbacks. The host awaits
 * whatever a callback returns before it delivers the next event.
 *
 * ### Modes
 * Keybinding contexts. A prompt mode maps key strings such as `"C-d"` or
 * `"M-D"` to callbacks while the prompt with that type is active.
 *
 * ### Paths
 * Project files and directories are root-relative; directories end in `/`.
 * Ignored files and directories come back absolute, the way the project
 * layer stores them.
 */

/** Buffer identifier (unique numeric ID) */
export type BufferId = number;

/** Result from spawnProcess */
export interface SpawnResult {
  /** Complete stdout as string. Newlines preserved; trailing newline included. */
  stdout: string;
  /** Complete stderr as string. */
  stderr: string;
  /** Process exit code. 0 usually means success; -1 if process was killed. */
  exit_code: number;
}

/** Handle for a cancellable process spawned with spawnProcess */
export interface ProcessHandle extends PromiseLike<SpawnResult> {
  /** Kill the process. Returns true if killed, false if already completed */
  kill(): Promise<boolean>;
}

/** Buffer information */
export interface BufferInfo {
  id: BufferId;
  /** File path (empty string if no path) */
  path: string;
  /** Display name, e.g. "main.ts" or "*shell*" */
  name: string;
  modified: boolean;
}

/** Suggestion for prompt autocomplete */
export interface PromptSuggestion {
  text: string;
  description?: string | null;
  /** Value reported back instead of text */
  value?: string | null;
  /** Disabled rows cannot be selected (used for source headers) */
  disabled?: boolean | null;
  /** Optional keybinding hint */
  keybinding?: string | null;
}

export interface ActionPopupAction {
  id: string;
  label: string;
}

export interface ActionPopupOptions {
  id: string;
  title: string;
  message: string;
  actions: ActionPopupAction[];
}

export type ShellKind = "shell" | "eshell" | "term";

export type VcsKind = "git" | "hg" | "svn" | "bzr" | "darcs" | "fossil" | "none";

// === Event payloads ===

export interface PromptChangedEvent {
  prompt_type: string;
  input: string;
}

export interface PromptSelectionChangedEvent {
  prompt_type: string;
  selected_index: number;
}

export interface PromptConfirmedEvent {
  prompt_type: string;
  selected_index: number | null;
  input: string;
}

export interface PromptCancelledEvent {
  prompt_type: string;
}

export interface ActionPopupResultEvent {
  popup_id: string;
  action_id: string;
}

/** Arguments the host passes to a command handler */
export interface CommandArgs {
  /** True when the command was invoked with a prefix argument */
  prefix?: boolean;
}

/** Events a plugin can subscribe to, with their payloads */
export interface EditorEvents {
  prompt_changed: PromptChangedEvent;
  prompt_selection_changed: PromptSelectionChangedEvent;
  prompt_confirmed: PromptConfirmedEvent;
  prompt_cancelled: PromptCancelledEvent;
  action_popup_result: ActionPopupResultEvent;
}

export type EditorEventName = keyof EditorEvents;

export type EventHandler<E extends EditorEventName> = (args: EditorEvents[E]) => unknown;

export type CommandHandler = (args: CommandArgs) => unknown;

/** Callback bound to a key in a mode */
export type KeyHandler = () => unknown;

/**
 * Main editor API interface
 */
export interface EditorAPI {
  // === Status and Logging ===
  /**
   * Display a transient message in the editor's status bar
   * @param message - Text to display; keep short
   */
  setStatus(message: string): void;
  /** Log a debug message from a plugin */
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;

  // === Configuration ===
  /**
   * Get this plugin's configuration section
   *
   * Returns whatever the user wrote; plugins validate it themselves.
   */
  getConfig(): unknown;

  // === Queries ===
  getCwd(): string;
  getActiveBufferId(): BufferId;
  /** File path of a buffer, or empty string for buffers without a file */
  getBufferPath(buffer_id: BufferId): string;
  listBuffers(): BufferInfo[];
  /** Word or path under the primary cursor; empty string when none */
  getTextAtCursor(): string;
  /** Text of the active region, or null when no region is active */
  getRegionText(): string | null;
  /** Recently visited files, most recent first, absolute paths */
  getRecentFiles(): string[];

  // === Prompt ===
  /**
   * Start an interactive prompt
   * @param label - Label to display (e.g., "Find file: ")
   * @param prompt_type - Type identifier reported back with prompt events
   */
  startPrompt(label: string, prompt_type: string): boolean;
  /** Start a prompt with pre-filled initial value */
  startPromptWithInitial(label: string, prompt_type: string, initial_value: string): boolean;
  setPromptSuggestions(suggestions: PromptSuggestion[]): boolean;
  /** Close the active prompt without firing `prompt_cancelled` */
  cancelPrompt(): boolean;
  /**
   * Show an action popup with buttons for user interaction
   *
   * When the user selects an action, the `action_popup_result` event fires.
   */
  showActionPopup(options: ActionPopupOptions): boolean;

  // === Commands, modes and events ===
  /** Register a command that can be triggered by keybindings or the command palette */
  registerCommand(name: string, description: string, handler: CommandHandler, contexts: string): boolean;
  unregisterCommand(name: string): boolean;
  /**
   * Define a mode with keybindings
   *
   * Prompts whose `prompt_type` equals the mode name use its bindings.
   * @param bindings - Array of [key_string, handler] pairs
   * @example
   * editor.defineMode("project-files", "prompt", [
   *   ["C-d", () => openDired()],
   * ], false);
   */
  defineMode(name: string, parent: string | null, bindings: [string, KeyHandler][], read_only: boolean): boolean;
  /** Subscribe to an editor event */
  on<E extends EditorEventName>(event_name: E, handler: EventHandler<E>): boolean;
  off<E extends EditorEventName>(event_name: E, handler: EventHandler<E>): boolean;
  /**
   * Remap a command so that every key bound to `from` runs `to` instead
   *
   * Passing null removes the remapping.
   */
  remapCommand(from: string, to: string | null): boolean;

  // === Navigation ===
  /**
   * Open a file in the editor, optionally at a specific location
   * @param line - Line number to jump to (0 for no jump)
   * @param column - Column number to jump to (0 for no jump)
   */
  openFile(path: string, line: number, column: number): boolean;
  openFileInOtherWindow(path: string, line: number, column: number): boolean;
  /**
   * Open a directory listing
   * @param files - Restrict the listing to these paths (relative to `path`)
   * @returns the listing's buffer ID
   */
  openDirectory(path: string, files?: string[]): BufferId;
  switchToBuffer(buffer_id: BufferId): boolean;
  switchToBufferInOtherWindow(buffer_id: BufferId): boolean;
  closeBuffer(buffer_id: BufferId): boolean;
  openShell(kind: ShellKind, cwd: string): boolean;
  /** Open the VCS status view (vc-dir, magit and friends) for a root */
  openVcStatus(root: string, vcs: VcsKind): boolean;
  /** Run a compilation-style command in a dedicated buffer */
  runCompilation(command: string, cwd: string): boolean;

  setClipboard(text: string): void;

  // === Files and paths ===
  fileExists(path: string): boolean;
  deleteFile(path: string): Promise<void>;
  pathJoin(parts: string[]): string;
  pathDirname(path: string): string;
  pathBasename(path: string): string;
  pathExtname(path: string): string;
  getEnv(name: string): string;

  // === Processes ===
  /**
   * Spawn an external process and return a cancellable handle
   *
   * The handle is a PromiseLike, so `await spawnProcess(...)` works directly.
   * Rejects when the executable cannot be found.
   * @param cwd - Working directory; null uses editor's cwd
   */
  spawnProcess(command: string, args?: string[], cwd?: string | null): ProcessHandle;
  /** Delay execution for a number of milliseconds */
  delay(ms: number): Promise<void>;
}

/** Project patterns from a project's dirconfig file */
export interface DirConfig {
  keep: string[];
  ignore: string[];
}

export interface DirtyProject {
  root: string;
  /** Short VCS status, e.g. "M 3 files" */
  status: string;
}

/**
 * Project-management API
 *
 * Roots are absolute and end in `/`.
 */
export interface ProjectAPI {
  /** Root of the project containing `dir`, or null outside any project */
  projectRoot(dir: string): string | null;
  projectName(root: string): string;
  knownProjects(): string[];
  /** Known projects without the current one */
  relevantKnownProjects(): string[];
  /** Root-relative file paths */
  projectFiles(root: string): Promise<string[]>;
  /** Root-relative directory paths, each ending in `/` */
  projectDirs(root: string): Promise<string[]>;
  projectBuffers(root: string): BufferInfo[];
  projectVcs(root: string): VcsKind;
  /** Absolute paths of ignored files */
  ignoredFiles(root: string): string[];
  /** Absolute paths of ignored directories, each ending in `/` */
  ignoredDirectories(root: string): string[];
  /** Suffixes such as ".o" ignored in every project */
  globallyIgnoredFileSuffixes(): string[];
  dirconfig(root: string): DirConfig;
  /** Root-relative alternates of `file` (e.g. header for source) among `files` */
  otherFiles(file: string, files: string[]): string[];
  removeKnownProject(root: string): void;
  invalidateCache(root: string): void;
  /** Switch to a project and run the configured switch action */
  switchProject(root: string): Promise<void>;
  /** Command name run after switching projects */
  switchProjectAction: string;
  /** Completion system used by the project layer's own commands */
  completionSystem: string;
  compileCommand(root: string): string;
  testCommand(root: string): string;
  runCommand(root: string): string;
  dirtyProjects(): Promise<DirtyProject[]>;
}
