import { posix } from "node:path";
import type {
  ActionPopupOptions,
  BufferId,
  BufferInfo,
  CommandArgs,
  CommandHandler,
  DirConfig,
  DirtyProject,
  EditorAPI,
  EditorEventName,
  EditorEvents,
  EventHandler,
  KeyHandler,
  ProcessHandle,
  ProjectAPI,
  PromptSuggestion,
  ShellKind,
  SpawnResult,
  VcsKind,
} from "../plugins/lib/host.ts";

type Listeners = { [E in EditorEventName]: EventHandler<E>[] };

export interface OpenedFile {
  path: string;
  line: number;
  column: number;
  otherWindow: boolean;
}

export interface SpawnCall {
  command: string;
  args: string[];
  cwd: string | null;
}

export function fakeProcess(result: SpawnResult | Error): ProcessHandle {
  return {
    then(onFulfilled, onRejected) {
      const promise = result instanceof Error ? Promise.reject(result) : Promise.resolve(result);
      return promise.then(onFulfilled, onRejected);
    },
    kill: async () => false,
  };
}

export function ok(stdout: string): SpawnResult {
  return { stdout, stderr: "", exit_code: 0 };
}

/**
 * In-process editor that records what plugins ask of it
 */
export class FakeEditor implements EditorAPI {
  statuses: string[] = [];
  debugs: string[] = [];
  warnings: string[] = [];
  config: unknown = undefined;

  cwd = "/";
  env: Record<string, string> = {};
  buffers: BufferInfo[] = [];
  activeBufferId: BufferId = 0;
  textAtCursor = "";
  region: string | null = null;
  recentFiles: string[] = [];

  prompt: { label: string; type: string; initial: string } | null = null;
  suggestions: PromptSuggestion[] = [];
  popups: ActionPopupOptions[] = [];
  cancelledPrompts = 0;

  commands = new Map<string, CommandHandler>();
  modes = new Map<string, [string, KeyHandler][]>();
  remaps = new Map<string, string>();

  opened: OpenedFile[] = [];
  directories: Array<{ path: string; files?: string[] }> = [];
  switchedBuffers: BufferId[] = [];
  otherWindowBuffers: BufferId[] = [];
  closedBuffers: BufferId[] = [];
  shells: Array<{ kind: ShellKind; cwd: string }> = [];
  vcStatus: Array<{ root: string; vcs: VcsKind }> = [];
  compilations: Array<{ command: string; cwd: string }> = [];
  clipboard = "";
  deleted: string[] = [];

  spawns: SpawnCall[] = [];
  spawnResult: (command: string, args: string[]) => SpawnResult | Error = () => ({
    stdout: "",
    stderr: "",
    exit_code: 1,
  });

  private listeners: Listeners = {
    prompt_changed: [],
    prompt_selection_changed: [],
    prompt_confirmed: [],
    prompt_cancelled: [],
    action_popup_result: [],
  };

  get status(): string | undefined {
    return this.statuses[this.statuses.length - 1];
  }

  /** Suggestion texts without the disabled source headers */
  get rows(): string[] {
    return this.suggestions.filter((s) => !s.disabled).map((s) => s.text);
  }

  get headers(): string[] {
    return this.suggestions.filter((s) => s.disabled).map((s) => s.text);
  }

  setStatus(message: string): void {
    this.statuses.push(message);
  }
  debug(message: string): void {
    this.debugs.push(message);
  }
  info(message: string): void {
    this.debugs.push(message);
  }
  warn(message: string): void {
    this.warnings.push(message);
  }
  error(message: string): void {
    this.warnings.push(message);
  }

  getConfig(): unknown {
    return this.config;
  }

  getCwd(): string {
    return this.cwd;
  }
  getActiveBufferId(): BufferId {
    return this.activeBufferId;
  }
  getBufferPath(buffer_id: BufferId): string {
    return this.buffers.find((b) => b.id === buffer_id)?.path ?? "";
  }
  listBuffers(): BufferInfo[] {
    return [...this.buffers];
  }
  getTextAtCursor(): string {
    return this.textAtCursor;
  }
  getRegionText(): string | null {
    return this.region;
  }
  getRecentFiles(): string[] {
    return [...this.recentFiles];
  }

  startPrompt(label: string, prompt_type: string): boolean {
    this.prompt = { label, type: prompt_type, initial: "" };
    return true;
  }
  startPromptWithInitial(label: string, prompt_type: string, initial_value: string): boolean {
    this.prompt = { label, type: prompt_type, initial: initial_value };
    return true;
  }
  setPromptSuggestions(suggestions: PromptSuggestion[]): boolean {
    this.suggestions = suggestions;
    return true;
  }
  cancelPrompt(): boolean {
    this.prompt = null;
    this.cancelledPrompts++;
    return true;
  }
  showActionPopup(options: ActionPopupOptions): boolean {
    this.popups.push(options);
    return true;
  }

  registerCommand(name: string, _description: string, handler: CommandHandler, _contexts: string): boolean {
    this.commands.set(name, handler);
    return true;
  }
  unregisterCommand(name: string): boolean {
    return this.commands.delete(name);
  }
  defineMode(name: string, _parent: string | null, bindings: [string, KeyHandler][], _read_only: boolean): boolean {
    this.modes.set(name, bindings);
    return true;
  }
  on<E extends EditorEventName>(event_name: E, handler: EventHandler<E>): boolean {
    this.listeners[event_name].push(handler);
    return true;
  }
  off<E extends EditorEventName>(event_name: E, handler: EventHandler<E>): boolean {
    const list = this.listeners[event_name];
    const index = list.indexOf(handler);
    if (index < 0) return false;
    list.splice(index, 1);
    return true;
  }
  remapCommand(from: string, to: string | null): boolean {
    if (to === null) {
      this.remaps.delete(from);
    } else {
      this.remaps.set(from, to);
    }
    return true;
  }

  openFile(path: string, line: number, column: number): boolean {
    this.opened.push({ path, line, column, otherWindow: false });
    return true;
  }
  openFileInOtherWindow(path: string, line: number, column: number): boolean {
    this.opened.push({ path, line, column, otherWindow: true });
    return true;
  }
  openDirectory(path: string, files?: string[]): BufferId {
    this.directories.push(files ? { path, files } : { path });
    return 100 + this.directories.length;
  }
  switchToBuffer(buffer_id: BufferId): boolean {
    this.switchedBuffers.push(buffer_id);
    return true;
  }
  switchToBufferInOtherWindow(buffer_id: BufferId): boolean {
    this.otherWindowBuffers.push(buffer_id);
    return true;
  }
  closeBuffer(buffer_id: BufferId): boolean {
    this.closedBuffers.push(buffer_id);
    return true;
  }
  openShell(kind: ShellKind, cwd: string): boolean {
    this.shells.push({ kind, cwd });
    return true;
  }
  openVcStatus(root: string, vcs: VcsKind): boolean {
    this.vcStatus.push({ root, vcs });
    return true;
  }
  runCompilation(command: string, cwd: string): boolean {
    this.compilations.push({ command, cwd });
    return true;
  }
  setClipboard(text: string): void {
    this.clipboard = text;
  }

  fileExists(path: string): boolean {
    return !this.deleted.includes(path);
  }
  async deleteFile(path: string): Promise<void> {
    this.deleted.push(path);
  }
  pathJoin(parts: string[]): string {
    return posix.join(...parts);
  }
  pathDirname(path: string): string {
    return posix.dirname(path);
  }
  pathBasename(path: string): string {
    return posix.basename(path);
  }
  pathExtname(path: string): string {
    return posix.extname(path);
  }
  getEnv(name: string): string {
    return this.env[name] ?? "";
  }

  spawnProcess(command: string, args: string[] = [], cwd: string | null = null): ProcessHandle {
    this.spawns.push({ command, args, cwd });
    return fakeProcess(this.spawnResult(command, args));
  }
  async delay(_ms: number): Promise<void> {}

  // === Test helpers ===

  /** Make `path` the active buffer's file */
  visit(path: string): void {
    const id = this.buffers.length + 1;
    this.buffers.push({ id, path, name: posix.basename(path), modified: false });
    this.activeBufferId = id;
  }

  listenerCount(event: EditorEventName): number {
    return this.listeners[event].length;
  }

  async emit<E extends EditorEventName>(event: E, args: EditorEvents[E]): Promise<void> {
    for (const handler of [...this.listeners[event]]) {
      await handler(args);
    }
  }

  async runCommand(name: string, args: CommandArgs = {}): Promise<void> {
    const handler = this.commands.get(name);
    if (!handler) {
      throw new Error(`No command ${name}`);
    }
    await handler(args);
  }

  async type(input: string): Promise<void> {
    await this.emit("prompt_changed", { prompt_type: this.promptType(), input });
  }

  async select(index: number): Promise<void> {
    await this.emit("prompt_selection_changed", { prompt_type: this.promptType(), selected_index: index });
  }

  async confirm(index: number | null = null, input = ""): Promise<void> {
    const prompt_type = this.promptType();
    this.prompt = null;
    await this.emit("prompt_confirmed", { prompt_type, selected_index: index, input });
  }

  async cancel(): Promise<void> {
    const prompt_type = this.promptType();
    this.prompt = null;
    await this.emit("prompt_cancelled", { prompt_type });
  }

  async pressKey(key: string): Promise<void> {
    const binding = this.modes.get(this.promptType())?.find(([k]) => k === key);
    if (!binding) {
      throw new Error(`Key ${key} is not bound`);
    }
    await binding[1]();
  }

  async choosePopupAction(actionId: string): Promise<void> {
    const popup = this.popups[this.popups.length - 1];
    if (!popup) {
      throw new Error("No action popup");
    }
    await this.emit("action_popup_result", { popup_id: popup.id, action_id: actionId });
  }

  private promptType(): string {
    if (!this.prompt) {
      throw new Error("No prompt is open");
    }
    return this.prompt.type;
  }
}

export interface FakeProject {
  files?: string[];
  dirs?: string[];
  vcs?: VcsKind;
  ignoredFiles?: string[];
  ignoredDirectories?: string[];
  dirconfig?: DirConfig;
  compile?: string;
  test?: string;
  run?: string;
}

/**
 * In-process project layer over a fixed set of projects
 */
export class FakeProjects implements ProjectAPI {
  known: string[];
  /** Root treated as the current project by `relevantKnownProjects` */
  current: string | null = null;
  buffers: BufferInfo[] = [];
  suffixes: string[] = [];
  dirty: DirtyProject[] = [];

  invalidated: string[] = [];
  removed: string[] = [];
  switched: string[] = [];
  switchProjectAction = "projectile-find-file";
  completionSystem = "default";

  constructor(private projects: Record<string, FakeProject>) {
    this.known = Object.keys(projects);
  }

  private project(root: string): FakeProject {
    return this.projects[root] ?? {};
  }

  projectRoot(dir: string): string | null {
    const withSlash = dir.endsWith("/") ? dir : `${dir}/`;
    const roots = Object.keys(this.projects).filter((root) => withSlash.startsWith(root));
    roots.sort((a, b) => b.length - a.length);
    return roots[0] ?? null;
  }
  projectName(root: string): string {
    return posix.basename(root);
  }
  knownProjects(): string[] {
    return [...this.known];
  }
  relevantKnownProjects(): string[] {
    return this.known.filter((root) => root !== this.current);
  }
  async projectFiles(root: string): Promise<string[]> {
    return [...(this.project(root).files ?? [])];
  }
  async projectDirs(root: string): Promise<string[]> {
    return [...(this.project(root).dirs ?? [])];
  }
  projectBuffers(root: string): BufferInfo[] {
    return this.buffers.filter((b) => b.path.startsWith(root));
  }
  projectVcs(root: string): VcsKind {
    return this.project(root).vcs ?? "git";
  }
  ignoredFiles(root: string): string[] {
    return this.project(root).ignoredFiles ?? [];
  }
  ignoredDirectories(root: string): string[] {
    return this.project(root).ignoredDirectories ?? [];
  }
  globallyIgnoredFileSuffixes(): string[] {
    return this.suffixes;
  }
  dirconfig(root: string): DirConfig {
    return this.project(root).dirconfig ?? { keep: [], ignore: [] };
  }
  otherFiles(file: string, files: string[]): string[] {
    const stem = (path: string): string => path.slice(0, path.length - posix.extname(path).length);
    return files.filter((f) => f !== file && stem(f) === stem(file));
  }
  removeKnownProject(root: string): void {
    this.removed.push(root);
    this.known = this.known.filter((r) => r !== root);
  }
  invalidateCache(root: string): void {
    this.invalidated.push(root);
  }
  async switchProject(root: string): Promise<void> {
    this.switched.push(root);
  }
  compileCommand(root: string): string {
    return this.project(root).compile ?? "";
  }
  testCommand(root: string): string {
    return this.project(root).test ?? "";
  }
  runCommand(root: string): string {
    return this.project(root).run ?? "";
  }
  async dirtyProjects(): Promise<DirtyProject[]> {
    return [...this.dirty];
  }
}
