/**
 * Multi-source Finder for project-finder plugins
 *
 * Provides a single API for "pick something, then act on it" workflows.
 * A prompt session shows one or more sources together; each source has its
 * own candidates, display format, action list and keymap.
 *
 * Key features:
 * - Filter sources: load once per session, filter on every keystroke
 * - Search sources: run an external process per query, with debouncing and
 *   cancellation of superseded processes
 * - Fuzzy or multi-token matching
 * - Marking several candidates, action menu, persistent action
 * - Per-source keymaps resolved against the current selection
 *
 * @example
 * ```typescript
 * const finder = new Finder(editor, { id: "project-files" });
 *
 * finder.prompt({
 *   title: "Find file: ",
 *   sources: [
 *     defineSource<string>({
 *       name: "Projectile files",
 *       mode: "filter",
 *       load: () => projects.projectFiles(root),
 *       format: (file) => ({ label: file }),
 *       actions: [["Find file", (file) => editor.openFile(file, 0, 0)]],
 *     }),
 *   ],
 * });
 * ```
 */

import type { ActionContext, ActionList } from "./actions.ts";
import { errorMessage } from "./errors.ts";
import type {
  ActionPopupResultEvent,
  EditorAPI,
  ProcessHandle,
  PromptCancelledEvent,
  PromptChangedEvent,
  PromptConfirmedEvent,
  PromptSelectionChangedEvent,
  PromptSuggestion,
} from "./host.ts";
import {
  baseFinderKeymap,
  keymapKeys,
  lookupKey,
  type FinderCommand,
  type Keymap,
} from "./keymap.ts";

// ============================================================================
// Core Types
// ============================================================================

export interface Location {
  file: string;
  line: number;
  column?: number;
}

/**
 * How a candidate should be displayed
 */
export interface DisplayEntry {
  /** Primary text, also what the input is matched against */
  label: string;
  /** Secondary text */
  description?: string;
  /** Location for navigation */
  location?: Location;
}

interface SourceBase<T> {
  /** Header shown above the source's candidates */
  name: string;
  format: (item: T, index: number) => DisplayEntry;
  /** First entry is the default action */
  actions: ActionList<T>;
  /** Defaults to the finder-wide keymap */
  keymap?: Keymap<T>;
  /** Runs on the selection without closing the prompt */
  persistentAction?: (item: T, context: ActionContext<T>) => void | Promise<void>;
  /** Maximum candidates shown (default: the finder's maxResults) */
  candidateLimit?: number;
}

/**
 * Source whose candidates load once and are filtered client-side
 */
export interface FilterSource<T> extends SourceBase<T> {
  mode: "filter";
  load: () => T[] | Promise<T[]>;
  /** Custom filter (default: fuzzy or multi-token match on the label) */
  filter?: (items: T[], query: string) => T[];
  /** Override the finder's fuzzy setting for this source */
  fuzzy?: boolean;
}

/**
 * Source whose candidates come from an external command per query
 */
export interface SearchSource<T> extends SourceBase<T> {
  mode: "search";
  search: (query: string) => ProcessHandle | Promise<T[]>;
  /** Turn a process's stdout into candidates */
  parse: (stdout: string, limit: number) => T[];
  /** Executable name, for "not installed" messages */
  tool?: string;
  /** Debounce delay in ms (default: the finder's debounceMs) */
  debounceMs?: number;
  /** Minimum query length to trigger search (default: the finder's minQueryLength) */
  minQueryLength?: number;
}

export type Source<T> = FilterSource<T> | SearchSource<T>;

/**
 * Main Finder configuration
 */
export interface FinderConfig {
  /** Unique identifier (used for prompt_type and the prompt mode) */
  id: string;
  /** Maximum candidates per source (default: 100) */
  maxResults?: number;
  /** Fuzzy matching for filter sources (default: true) */
  fuzzy?: boolean;
  /** Debounce delay for search sources (default: 150) */
  debounceMs?: number;
  /** Minimum query length for search sources (default: 2) */
  minQueryLength?: number;
}

/**
 * Options for a prompt session
 */
export interface PromptOptions {
  title: string;
  sources: SourceDefinition[];
  /** Initial query value */
  initialQuery?: string;
}

export interface SessionOptions {
  editor: EditorAPI;
  maxResults: number;
  fuzzy: boolean;
  debounceMs: number;
  minQueryLength: number;
}

export type KeyResolution =
  | { kind: "command"; command: FinderCommand }
  | { kind: "action"; run: (index: number, input: string) => Promise<void> };

/**
 * A source opened for one prompt session; its candidate type stays inside
 */
export interface SourceSession {
  readonly name: string;
  readonly mode: "filter" | "search";
  readonly entries: readonly DisplayEntry[];
  readonly markedCount: number;
  readonly actionDescriptions: readonly string[];
  /** Load filter candidates; returns how many there are */
  load(): Promise<number>;
  /** Recompute candidates for a query; false when superseded by a newer query */
  update(query: string): Promise<boolean>;
  isMarked(index: number): boolean;
  toggleMark(index: number): void;
  markAll(): void;
  unmarkAll(): void;
  /** Run the action at `actionIndex`; false when there is no such action or candidate */
  runAction(index: number, actionIndex: number, input: string): Promise<boolean>;
  runPersistent(index: number, input: string): Promise<boolean>;
  resolveKey(key: string): KeyResolution | null;
  keys(): string[];
  /** Kill a running search */
  cancel(): Promise<void>;
}

export interface SourceDefinition {
  readonly name: string;
  open(options: SessionOptions): SourceSession;
}

/**
 * Wrap a typed source so sources with different candidate types can share
 * one prompt
 */
export function defineSource<T>(source: Source<T>): SourceDefinition {
  return {
    name: source.name,
    open: (options) => new SourceState(source, options),
  };
}

// ============================================================================
// Matching
// ============================================================================

/**
 * Score a fuzzy match (higher is better, null means no match)
 */
export function fuzzyScore(str: string, pattern: string): number | null {
  if (pattern === "") return 0;

  str = str.toLowerCase();
  pattern = pattern.toLowerCase();

  let score = 0;
  let strIdx = 0;
  let patIdx = 0;
  let consecutiveMatches = 0;
  let lastMatchIdx = -1;
  const lastSlash = str.lastIndexOf("/");

  while (strIdx < str.length && patIdx < pattern.length) {
    if (str[strIdx] === pattern[patIdx]) {
      // Bonus for consecutive matches
      if (lastMatchIdx === strIdx - 1) {
        consecutiveMatches++;
        score += consecutiveMatches * 10;
      } else {
        consecutiveMatches = 1;
        score += 1;
      }

      // Bonus for matching at start of path segments
      if (
        strIdx === 0 ||
        str[strIdx - 1] === "/" ||
        str[strIdx - 1] === "_" ||
        str[strIdx - 1] === "-" ||
        str[strIdx - 1] === "."
      ) {
        score += 15;
      }

      // Bonus for matching the basename
      if (strIdx > lastSlash) {
        score += 5;
      }

      lastMatchIdx = strIdx;
      patIdx++;
    }
    strIdx++;
  }

  if (patIdx < pattern.length) {
    return null;
  }

  // Penalty for longer paths
  return score - str.length * 0.1;
}

/**
 * Fuzzy filter: keep subsequence matches, best score first
 */
export function fuzzyFilter<T>(
  items: T[],
  query: string,
  format: (item: T, index: number) => DisplayEntry,
  maxResults: number = 100
): T[] {
  const pattern = query.replace(/\s+/g, "");
  if (pattern === "") {
    return items.slice(0, maxResults);
  }

  const scored: Array<{ item: T; score: number; index: number }> = [];

  for (let i = 0; i < items.length; i++) {
    const score = fuzzyScore(format(items[i], i).label, pattern);
    if (score !== null) {
      scored.push({ item: items[i], score, index: i });
    }
  }

  // Sort by score descending, original order on ties
  scored.sort((a, b) => b.score - a.score || a.index - b.index);

  return scored.slice(0, maxResults).map((s) => s.item);
}

/**
 * Multi-token filter: every space-separated token must occur in the label
 * (case-insensitive); a token starting with "!" must not occur
 */
export function multiMatchFilter<T>(
  items: T[],
  query: string,
  format: (item: T, index: number) => DisplayEntry,
  maxResults: number = 100
): T[] {
  const tokens = query
    .toLowerCase()
    .split(/\s+/)
    .filter((t) => t !== "" && t !== "!");
  if (tokens.length === 0) {
    return items.slice(0, maxResults);
  }

  const results: T[] = [];
  for (let i = 0; i < items.length && results.length < maxResults; i++) {
    const label = format(items[i], i).label.toLowerCase();
    const matches = tokens.every((token) =>
      token.startsWith("!") ? !label.includes(token.slice(1)) : label.includes(token)
    );
    if (matches) {
      results.push(items[i]);
    }
  }
  return results;
}

// ============================================================================
// Parse Utilities
// ============================================================================

export interface GrepMatch {
  file: string;
  line: number;
  /** 1-based; 0 when the tool does not report columns */
  column: number;
  content: string;
}

/**
 * Parse a grep-style output line (file:line:column:content or file:line:content)
 */
export function parseGrepLine(line: string): GrepMatch | null {
  const withColumn = line.match(/^([^:]+):(\d+):(\d+):(.*)$/);
  if (withColumn) {
    return {
      file: withColumn[1],
      line: parseInt(withColumn[2], 10),
      column: parseInt(withColumn[3], 10),
      content: withColumn[4],
    };
  }
  const match = line.match(/^([^:]+):(\d+):(.*)$/);
  if (match) {
    return {
      file: match[1],
      line: parseInt(match[2], 10),
      column: 0,
      content: match[3],
    };
  }
  return null;
}

/**
 * Parse grep/ack/ag/rg output into results array
 */
export function parseGrepOutput(stdout: string, maxResults: number = 100): GrepMatch[] {
  const results: GrepMatch[] = [];

  for (const line of stdout.split("\n")) {
    if (!line.trim()) continue;
    const match = parseGrepLine(line);
    if (match) {
      results.push(match);
      if (results.length >= maxResults) {
        break;
      }
    }
  }

  return results;
}

function isProcessHandle<T>(value: ProcessHandle | Promise<T[]>): value is ProcessHandle {
  return "kill" in value;
}

// ============================================================================
// Source State
// ============================================================================

class SourceState<T> implements SourceSession {
  readonly name: string;
  readonly mode: "filter" | "search";

  private allItems: T[] = [];
  private items: T[] = [];
  private entryList: DisplayEntry[] = [];
  private marks = new Set<T>();
  private keymap: Keymap<T>;

  // Search mode state
  private lastQuery = "";
  private searchVersion = 0;
  private currentSearch: ProcessHandle | null = null;
  private pendingKill: Promise<boolean> | null = null;

  constructor(
    private source: Source<T>,
    private options: SessionOptions
  ) {
    this.name = source.name;
    this.mode = source.mode;
    this.keymap = source.keymap ?? baseFinderKeymap<T>();
  }

  get entries(): readonly DisplayEntry[] {
    return this.entryList;
  }

  get markedCount(): number {
    return this.marks.size;
  }

  get actionDescriptions(): readonly string[] {
    return this.source.actions.map(([description]) => description);
  }

  private get limit(): number {
    return this.source.candidateLimit ?? this.options.maxResults;
  }

  async load(): Promise<number> {
    if (this.source.mode !== "filter") {
      return 0;
    }
    this.allItems = await this.source.load();
    this.setItems(this.filterItems("", this.source));
    return this.allItems.length;
  }

  async update(query: string): Promise<boolean> {
    if (this.source.mode === "filter") {
      this.setItems(this.filterItems(query, this.source));
      return true;
    }
    return this.runSearch(query, this.source);
  }

  private filterItems(query: string, source: FilterSource<T>): T[] {
    if (source.filter) {
      return source.filter(this.allItems, query);
    }
    const fuzzy = source.fuzzy ?? this.options.fuzzy;
    const filter = fuzzy ? fuzzyFilter : multiMatchFilter;
    return filter(this.allItems, query, source.format, this.limit);
  }

  private async runSearch(query: string, source: SearchSource<T>): Promise<boolean> {
    const editor = this.options.editor;
    const debounceMs = source.debounceMs ?? this.options.debounceMs;
    const minQueryLength = source.minQueryLength ?? this.options.minQueryLength;
    const thisVersion = ++this.searchVersion;

    // Kill any existing search
    if (this.currentSearch) {
      this.pendingKill = this.currentSearch.kill();
      this.currentSearch = null;
    }

    // Check minimum query length
    if (!query || query.trim().length < minQueryLength) {
      await this.awaitPendingKill();
      this.lastQuery = "";
      this.setItems([]);
      return true;
    }

    // Debounce
    await editor.delay(debounceMs);
    await this.awaitPendingKill();

    // Check if superseded
    if (this.searchVersion !== thisVersion) {
      return false;
    }

    // Results for this query are already shown
    if (query === this.lastQuery) {
      return false;
    }
    this.lastQuery = "";

    try {
      const searchResult = source.search(query);

      if (isProcessHandle(searchResult)) {
        this.currentSearch = searchResult;
        const result = await searchResult;

        // Check if cancelled
        if (this.searchVersion !== thisVersion) {
          return false;
        }
        this.currentSearch = null;

        if (result.exit_code === 0) {
          this.setItems(source.parse(result.stdout, this.limit));
          this.lastQuery = query;
        } else if (result.exit_code === 1) {
          // No matches
          this.setItems([]);
          this.lastQuery = query;
        } else if (result.exit_code === -1) {
          return false;
        } else {
          this.setItems([]);
          editor.setStatus(`Search error: ${result.stderr.trim()}`);
        }
      } else {
        const results = await searchResult;
        if (this.searchVersion !== thisVersion) {
          return false;
        }
        this.setItems(results.slice(0, this.limit));
        this.lastQuery = query;
      }
    } catch (e) {
      this.currentSearch = null;
      const message = errorMessage(e);
      if (message.includes("killed")) {
        return false;
      }
      this.setItems([]);
      if (message.includes("not found") && source.tool) {
        editor.setStatus(`${source.tool} is not installed`);
      } else {
        editor.setStatus(`Search error: ${message}`);
      }
      editor.debug(`[Finder] ${this.name} search failed: ${message}`);
    }
    return true;
  }

  private async awaitPendingKill(): Promise<void> {
    if (this.pendingKill) {
      await this.pendingKill;
      this.pendingKill = null;
    }
  }

  private setItems(items: T[]): void {
    this.items = items;
    this.entryList = items.map((item, i) => this.source.format(item, i));
  }

  isMarked(index: number): boolean {
    return index < this.items.length && this.marks.has(this.items[index]);
  }

  toggleMark(index: number): void {
    if (index >= this.items.length) return;
    const item = this.items[index];
    if (this.marks.has(item)) {
      this.marks.delete(item);
    } else {
      this.marks.add(item);
    }
  }

  markAll(): void {
    for (const item of this.items) {
      this.marks.add(item);
    }
  }

  unmarkAll(): void {
    this.marks.clear();
  }

  private context(index: number, input: string): ActionContext<T> {
    return {
      marked: this.marks.size > 0 ? [...this.marks] : [this.items[index]],
      input,
      source: this.name,
    };
  }

  async runAction(index: number, actionIndex: number, input: string): Promise<boolean> {
    const entry = this.source.actions[actionIndex];
    if (!entry || index >= this.items.length) {
      return false;
    }
    await entry[1](this.items[index], this.context(index, input));
    return true;
  }

  async runPersistent(index: number, input: string): Promise<boolean> {
    const persistent = this.source.persistentAction;
    if (!persistent || index >= this.items.length) {
      return false;
    }
    await persistent(this.items[index], this.context(index, input));
    return true;
  }

  resolveKey(key: string): KeyResolution | null {
    const binding = lookupKey(this.keymap, key);
    if (binding === null) {
      return null;
    }
    if (typeof binding === "string") {
      return { kind: "command", command: binding };
    }
    return {
      kind: "action",
      run: async (index, input) => {
        if (index < this.items.length) {
          await binding(this.items[index], this.context(index, input));
        }
      },
    };
  }

  keys(): string[] {
    return keymapKeys(this.keymap);
  }

  async cancel(): Promise<void> {
    this.searchVersion++;
    if (this.currentSearch) {
      const search = this.currentSearch;
      this.currentSearch = null;
      await search.kill();
    }
  }
}

// ============================================================================
// Finder Class
// ============================================================================

interface Row {
  source: number;
  /** Candidate index within the source; null for the source header */
  index: number | null;
}

interface Selection {
  session: SourceSession;
  index: number;
}

/**
 * Prompt-driven selection over one or more sources
 */
export class Finder {
  private editor: EditorAPI;
  private config: Required<FinderConfig>;

  private sessions: SourceSession[] = [];
  private rows: Row[] = [];
  private selectedRow: number | null = null;
  private input = "";
  private updateVersion = 0;
  private isPromptMode = false;
  private lastOptions: PromptOptions | null = null;
  private pendingPopup: Selection | null = null;

  private readonly onChanged = (args: PromptChangedEvent) =>
    args.prompt_type === this.config.id ? this.onPromptChanged(args.input) : undefined;
  private readonly onSelection = (args: PromptSelectionChangedEvent) =>
    args.prompt_type === this.config.id ? this.onPromptSelectionChanged(args.selected_index) : undefined;
  private readonly onConfirmed = (args: PromptConfirmedEvent) =>
    args.prompt_type === this.config.id
      ? this.onPromptConfirmed(args.selected_index, args.input)
      : undefined;
  private readonly onCancelled = (args: PromptCancelledEvent) =>
    args.prompt_type === this.config.id ? this.onPromptCancelled() : undefined;
  private readonly onPopup = (args: ActionPopupResultEvent) =>
    args.popup_id === this.popupId ? this.onPopupResult(args.action_id) : undefined;

  constructor(editor: EditorAPI, config: FinderConfig) {
    this.editor = editor;
    this.config = {
      maxResults: 100,
      fuzzy: true,
      debounceMs: 150,
      minQueryLength: 2,
      ...config,
    };

    this.editor.on("prompt_changed", this.onChanged);
    this.editor.on("prompt_selection_changed", this.onSelection);
    this.editor.on("prompt_confirmed", this.onConfirmed);
    this.editor.on("prompt_cancelled", this.onCancelled);
    this.editor.on("action_popup_result", this.onPopup);
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  get id(): string {
    return this.config.id;
  }

  get isOpen(): boolean {
    return this.isPromptMode;
  }

  private get popupId(): string {
    return `${this.config.id}-actions`;
  }

  /**
   * Start an interactive prompt session
   */
  async prompt(options: PromptOptions): Promise<void> {
    if (this.isPromptMode) {
      await this.endSession();
    }

    this.isPromptMode = true;
    this.lastOptions = options;
    this.input = options.initialQuery ?? "";
    this.rows = [];
    this.selectedRow = null;
    this.pendingPopup = null;
    this.sessions = options.sources.map((source) =>
      source.open({
        editor: this.editor,
        maxResults: this.config.maxResults,
        fuzzy: this.config.fuzzy,
        debounceMs: this.config.debounceMs,
        minQueryLength: this.config.minQueryLength,
      })
    );

    this.defineKeys();

    if (options.initialQuery) {
      this.editor.startPromptWithInitial(options.title, this.config.id, options.initialQuery);
    } else {
      this.editor.startPrompt(options.title, this.config.id);
    }
    this.editor.setStatus("Type to search...");

    const sessions = this.sessions;
    let total = 0;
    for (const session of sessions) {
      try {
        total += await session.load();
      } catch (e) {
        this.editor.debug(`[Finder] Failed to load ${session.name}: ${errorMessage(e)}`);
        this.editor.setStatus(`Failed to load items: ${errorMessage(e)}`);
      }
    }

    // Cancelled or replaced while loading
    if (!this.isPromptMode || this.sessions !== sessions) {
      return;
    }

    if (this.input === "" && sessions.every((s) => s.mode === "filter")) {
      this.updatePromptResults();
      this.editor.setStatus(`${total} items available`);
    } else {
      await this.onPromptChanged(this.input);
    }
  }

  /**
   * Reopen the last session with its last input
   */
  async resume(): Promise<boolean> {
    if (!this.lastOptions) {
      this.editor.setStatus("No finder session to resume");
      return false;
    }
    await this.prompt({ ...this.lastOptions, initialQuery: this.input });
    return true;
  }

  /**
   * Close the session, if any
   */
  async close(): Promise<void> {
    if (this.isPromptMode) {
      await this.endSession();
    }
  }

  /**
   * Stop listening to editor events
   */
  dispose(): void {
    this.editor.off("prompt_changed", this.onChanged);
    this.editor.off("prompt_selection_changed", this.onSelection);
    this.editor.off("prompt_confirmed", this.onConfirmed);
    this.editor.off("prompt_cancelled", this.onCancelled);
    this.editor.off("action_popup_result", this.onPopup);
  }

  // ==========================================================================
  // Prompt Implementation
  // ==========================================================================

  private defineKeys(): void {
    const keys: string[] = [];
    for (const key of [...baseFinderKeymap().bindings.map(([k]) => k), ...this.sessions.flatMap((s) => s.keys())]) {
      if (!keys.includes(key)) {
        keys.push(key);
      }
    }
    this.editor.defineMode(
      this.config.id,
      "prompt",
      keys.map((key) => [key, () => this.onKey(key)]),
      false
    );
  }

  private async onPromptChanged(input: string): Promise<void> {
    if (!this.isPromptMode) return;

    this.input = input;
    const thisVersion = ++this.updateVersion;

    try {
      await Promise.all(this.sessions.map((session) => session.update(input)));
    } catch (e) {
      this.editor.debug(`[Finder] Update failed: ${errorMessage(e)}`);
      this.editor.setStatus(`Filter error: ${errorMessage(e)}`);
    }

    // Superseded by a newer input, or closed meanwhile
    if (thisVersion !== this.updateVersion || !this.isPromptMode) {
      return;
    }

    const count = this.updatePromptResults();
    if (count > 0) {
      this.editor.setStatus(`Found ${count} matches`);
    } else {
      this.editor.setStatus("No matches");
    }
  }

  /**
   * Rebuild suggestions from every session; returns the candidate count
   */
  private updatePromptResults(): number {
    const previous = this.selectedRow !== null ? this.rows[this.selectedRow] : undefined;
    const rows: Row[] = [];
    const suggestions: PromptSuggestion[] = [];
    let count = 0;

    this.sessions.forEach((session, s) => {
      if (session.entries.length === 0) return;

      rows.push({ source: s, index: null });
      suggestions.push({ text: session.name, description: `${session.entries.length}`, disabled: true });

      session.entries.forEach((entry, i) => {
        rows.push({ source: s, index: i });
        suggestions.push({
          text: `${session.isMarked(i) ? "* " : ""}${entry.label}`,
          description: entry.description ?? null,
          value: `${s}:${i}`,
          disabled: false,
        });
        count++;
      });
    });

    this.rows = rows;
    const kept =
      previous === undefined
        ? -1
        : rows.findIndex((r) => r.source === previous.source && r.index === previous.index && r.index !== null);
    this.selectedRow = kept >= 0 ? kept : this.firstItemRow(0);

    this.editor.setPromptSuggestions(suggestions);
    return count;
  }

  private firstItemRow(from: number): number | null {
    for (let i = from; i < this.rows.length; i++) {
      if (this.rows[i].index !== null) {
        return i;
      }
    }
    return null;
  }

  private selection(row: number | null = this.selectedRow): Selection | null {
    if (row === null) return null;
    const r = this.rows[row];
    if (!r || r.index === null) return null;
    return { session: this.sessions[r.source], index: r.index };
  }

  private onPromptSelectionChanged(selectedIndex: number): void {
    // Header rows select the source's first candidate
    this.selectedRow = this.firstItemRow(selectedIndex);
  }

  private async onPromptConfirmed(selectedIndex: number | null, input: string): Promise<void> {
    if (!this.isPromptMode) return;

    // Header rows confirm the source's first candidate
    const row = selectedIndex === null ? this.selectedRow : this.firstItemRow(selectedIndex);
    const selection = this.selection(row);
    await this.endSession();

    if (!selection) {
      this.editor.setStatus("No selection");
      return;
    }

    await this.runSafely(() => selection.session.runAction(selection.index, 0, input), selection);
  }

  private async onPromptCancelled(): Promise<void> {
    if (!this.isPromptMode) return;
    await this.endSession();
    this.editor.setStatus("Cancelled");
  }

  private async onKey(key: string): Promise<void> {
    if (!this.isPromptMode) return;

    const selection = this.selection();
    if (!selection) {
      this.editor.setStatus("No selection");
      return;
    }

    const resolution = selection.session.resolveKey(key);
    if (!resolution) {
      return;
    }

    if (resolution.kind === "action") {
      const input = this.input;
      await this.exitPrompt();
      await this.runSafely(async () => {
        await resolution.run(selection.index, input);
        return true;
      }, selection);
      return;
    }

    await this.runCommand(resolution.command, selection);
  }

  private async runCommand(command: FinderCommand, selection: Selection): Promise<void> {
    const { session, index } = selection;
    switch (command) {
      case "toggle-mark":
        session.toggleMark(index);
        this.updatePromptResults();
        this.editor.setStatus(`${session.markedCount} marked`);
        break;
      case "mark-all":
        session.markAll();
        this.updatePromptResults();
        this.editor.setStatus(`${session.markedCount} marked`);
        break;
      case "unmark-all":
        for (const s of this.sessions) {
          s.unmarkAll();
        }
        this.updatePromptResults();
        this.editor.setStatus("0 marked");
        break;
      case "persistent-action":
        await this.runSafely(() => session.runPersistent(index, this.input), selection, "No persistent action");
        break;
      case "select-action":
        this.pendingPopup = selection;
        this.editor.showActionPopup({
          id: this.popupId,
          title: session.name,
          message: "Select action",
          actions: session.actionDescriptions.map((label, i) => ({ id: `${i}`, label })),
        });
        break;
    }
  }

  private async onPopupResult(actionId: string): Promise<void> {
    const selection = this.pendingPopup;
    this.pendingPopup = null;
    if (!selection || !this.isPromptMode) return;

    const actionIndex = parseInt(actionId, 10);
    if (Number.isNaN(actionIndex)) {
      // Dismissed
      return;
    }

    const input = this.input;
    await this.exitPrompt();
    await this.runSafely(() => selection.session.runAction(selection.index, actionIndex, input), selection);
  }

  private async runSafely(
    run: () => Promise<boolean>,
    selection: Selection,
    missing: string = "No action"
  ): Promise<void> {
    try {
      if (!(await run())) {
        this.editor.setStatus(missing);
      }
    } catch (e) {
      this.editor.debug(`[Finder] Action failed in ${selection.session.name}: ${errorMessage(e)}`);
      this.editor.setStatus(`Action failed: ${errorMessage(e)}`);
    }
  }

  /** Leave the prompt before running an action bound to a key or chosen from the menu */
  private async exitPrompt(): Promise<void> {
    await this.endSession();
    this.editor.cancelPrompt();
  }

  private async endSession(): Promise<void> {
    this.isPromptMode = false;
    this.updateVersion++;
    this.pendingPopup = null;
    await Promise.all(this.sessions.map((session) => session.cancel()));
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Get relative path for display
 */
export function getRelativePath(root: string, filePath: string): string {
  const prefix = root.endsWith("/") ? root : `${root}/`;
  if (filePath.startsWith(prefix)) {
    return filePath.slice(prefix.length);
  }
  return filePath;
}

/**
 * Abbreviate the home directory as "~"
 */
export function abbreviateHome(path: string, home: string): string {
  if (home === "") return path;
  const prefix = home.endsWith("/") ? home : `${home}/`;
  if (path.startsWith(prefix)) {
    return `~/${path.slice(prefix.length)}`;
  }
  return path;
}
