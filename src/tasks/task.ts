import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ScanData } from '../types';
import type { FileDialog } from '../dialogs/file-dialog';
import { createLogger } from '../utils/logger';
import { settingsFromXml, settingsToXml, type TaskSettings } from './settings';

const log = createLogger('Task');

/** Kind of data a task consumes or produces. */
export enum TaskItem {
  None = 0,
  ScanLines = 1,
  Mesh = 2,
}

/** Palette group of a task; declaration order is the sort order. */
export enum TaskCategory {
  Input,
  Filter,
  Transform,
  Smooth,
  MeshBuild,
  Color,
  Unknown,
  IO,
}

export enum TaskStatus {
  None,
  Working,
  Finished,
  Error,
}

export interface ProgressEvent {
  task: ProcessingTask;
  percent: number;
  data: ScanData | null;
}

export type ProgressListener = (event: ProgressEvent) => void;

/** Handed to the task by a background host; the task sets `cancel` when it honours a cancellation. */
export interface WorkArgs {
  cancel: boolean;
}

export interface RunOptions {
  /** Prompts for paths when the task needs one; without it the run is non-interactive */
  dialog?: FileDialog;
  /** Aborted by the host to request cooperative cancellation */
  signal?: AbortSignal;
  work?: WorkArgs;
  onProgress?: ProgressListener;
}

/**
 * A typed pipeline stage. Subclasses declare the kind of data they take
 * (`in`) and return (`out`) and implement `doTask`; the base class owns the
 * status/percent bookkeeping, the compatibility checks used by the pipeline
 * editor and the XML persistence of settings.
 */
export abstract class ProcessingTask {
  private _status: TaskStatus = TaskStatus.None;
  private _percent = 0;
  private _lastError = '';
  private _hasBrowsableSettings: boolean | null = null;
  private runOptions: RunOptions | null = null;

  abstract get in(): TaskItem;
  abstract get out(): TaskItem;
  abstract get name(): string;

  get category(): TaskCategory {
    return TaskCategory.Unknown;
  }

  get displayName(): string {
    return this.name;
  }

  get status(): TaskStatus {
    return this._status;
  }

  get percent(): number {
    return this._percent;
  }

  get lastError(): string {
    return this._lastError;
  }

  get typeName(): string {
    return this.constructor.name;
  }

  get configFileName(): string {
    return `${this.typeName}.config.xml`;
  }

  /** Whether the palette offers this task. */
  get listed(): boolean {
    return true;
  }

  /** False while a resource the task needs (hardware, calibration) is missing. */
  get ready(): boolean {
    return true;
  }

  /** A fresh instance of the same task type, with default settings. */
  abstract clone(): ProcessingTask;

  // ------------------------------------------------------------------
  // Settings
  // ------------------------------------------------------------------

  /** Persisted settings keyed by their XML element name. */
  getSettings(): TaskSettings {
    return {};
  }

  /** Validate and assign settings read back from XML or an editor. Throws on invalid values. */
  applySettings(_settings: Record<string, unknown>): void {}

  /** Settings a settings editor shows. */
  get browsableSettings(): string[] {
    return [];
  }

  get settingDescriptions(): Record<string, string> {
    return {};
  }

  get hasBrowsableSettings(): boolean {
    if (this._hasBrowsableSettings === null) {
      this._hasBrowsableSettings = this.browsableSettings.length > 0;
    }
    return this._hasBrowsableSettings;
  }

  get hasSettings(): boolean {
    return this.hasBrowsableSettings;
  }

  /** Run the task's own settings interaction; resolves true when settings changed. */
  async runSettings(_dialog?: FileDialog): Promise<boolean> {
    return false;
  }

  toXml(): string {
    return settingsToXml(this.typeName, this.getSettings());
  }

  /**
   * A new instance of this task type carrying the settings from `xml`, or
   * this instance unchanged when the document cannot be used.
   */
  loadFromXml(xml: string): ProcessingTask {
    try {
      const settings = settingsFromXml(xml, this.typeName);
      const task = this.clone();
      task.applySettings(settings);
      return task;
    } catch (err) {
      log.warn(`Ignoring settings for ${this.typeName}:`, err instanceof Error ? err.message : err);
      return this;
    }
  }

  async saveToFile(settingsDirectory: string): Promise<void> {
    await mkdir(settingsDirectory, { recursive: true });
    await writeFile(join(settingsDirectory, this.configFileName), this.toXml(), 'utf-8');
  }

  async loadFromFile(settingsDirectory: string): Promise<ProcessingTask> {
    const filename = join(settingsDirectory, this.configFileName);
    if (!existsSync(filename)) {
      return this;
    }
    try {
      return this.loadFromXml(await readFile(filename, 'utf-8'));
    } catch (err) {
      log.warn(`Could not read ${filename}:`, err instanceof Error ? err.message : err);
      return this;
    }
  }

  // ------------------------------------------------------------------
  // Execution
  // ------------------------------------------------------------------

  prepareToRun(): void {
    this._status = TaskStatus.None;
    this._percent = 0;
  }

  /**
   * Run the task on `source`. Resolves the task's output, or `null` when the
   * task ends in `Error`; failures are recorded in `lastError`, never thrown.
   */
  async run(source: ScanData, options: RunOptions = {}): Promise<ScanData | null> {
    this._lastError = '';
    this.runOptions = options;
    this._status = TaskStatus.Working;
    this.updatePercent(0, null);
    try {
      const result = await this.doTask(source);
      if (this.status === TaskStatus.Error) {
        return null;
      }
      this._status = TaskStatus.Finished;
      this.updatePercent(100, result);
      return result;
    } catch (err) {
      this._status = TaskStatus.Error;
      this._lastError = err instanceof Error ? err.message : String(err);
      log.debug(`${this.displayName} failed: ${this._lastError}`);
      return null;
    } finally {
      this.runOptions = null;
    }
  }

  /** Record progress; the listener only hears about values that changed. */
  updatePercent(percent: number, data: ScanData | null): void {
    if (this._percent === percent) return;
    this._percent = percent;
    this.runOptions?.onProgress?.({ task: this, percent, data });
  }

  protected abstract doTask(source: ScanData): Promise<ScanData>;

  protected setStatus(status: TaskStatus): void {
    this._status = status;
  }

  /** End the current run in `Error`; `run` then resolves null. */
  protected fail(message: string): void {
    this._status = TaskStatus.Error;
    this._lastError = message;
  }

  /** Dialog host of the current run, if any. */
  protected get dialog(): FileDialog | undefined {
    return this.runOptions?.dialog;
  }

  /** True once the host asked the current run to stop; flags the work args for the host. */
  protected get cancelPending(): boolean {
    const options = this.runOptions;
    if (!options?.signal?.aborted) return false;
    if (options.work) {
      options.work.cancel = true;
    }
    return true;
  }

  // ------------------------------------------------------------------
  // Pipeline compatibility
  // ------------------------------------------------------------------

  /** Whether the task fits between `prev` and `next` (either may be absent). */
  canInsert(prev: ProcessingTask | null | undefined, next: ProcessingTask | null | undefined): boolean {
    const inOk = prev ? this.in === prev.out : this.in === TaskItem.None;
    const outOk = next ? this.out === next.in : true;
    return inOk && outOk;
  }

  canInsertBetween(prevOut: TaskItem, nextIn: TaskItem): boolean {
    return this.in === prevOut && this.out === nextIn;
  }

  canFollow(item: TaskItem): boolean {
    return this.in === item;
  }

  canFollowTask(other: ProcessingTask): boolean {
    return this.canFollow(other.out);
  }

  /** Palette order: category, input kind, output kind, then display name. */
  compareTo(other: ProcessingTask): number {
    return (
      this.category - other.category ||
      this.in - other.in ||
      this.out - other.out ||
      this.displayName.localeCompare(other.displayName)
    );
  }

  get toolTip(): string {
    switch (this._status) {
      case TaskStatus.Finished:
        return 'Finished';
      case TaskStatus.Working:
        return `Working : ${this._percent}%`;
      case TaskStatus.Error:
        return `Error :${this._lastError}`;
      default:
        return this.ready
          ? `${TaskCategory[this.category]}: ${this.displayName}`
          : 'Missings Ressource to run task';
    }
  }

  toString(): string {
    return this.displayName;
  }
}
