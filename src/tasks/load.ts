import { basename } from 'path';
import type { ScanData } from '../types';
import type { FileDialog } from '../dialogs/file-dialog';
import { ScanFormatError } from '../errors';
import { ScanFormat, readScan } from '../io/scan';
import { ProcessingTask, TaskCategory, TaskItem } from './task';
import { FileTaskSettingsSchema, type TaskSettings } from './settings';

/** Read scan lines from a native scan file. Starts a pipeline. */
export class LoadPoints extends ProcessingTask {
  filename = '';

  get in(): TaskItem {
    return TaskItem.None;
  }

  get out(): TaskItem {
    return TaskItem.ScanLines;
  }

  get category(): TaskCategory {
    return TaskCategory.Input;
  }

  get dialogFilter(): string {
    return ScanFormat.dialogFilter;
  }

  get name(): string {
    return `Load ${ScanFormat.extension}`;
  }

  get displayName(): string {
    if (this.filename) {
      return `Load: "${basename(this.filename)}"`;
    }
    return super.displayName;
  }

  get hasSettings(): boolean {
    return true;
  }

  clone(): ProcessingTask {
    return new LoadPoints();
  }

  getSettings(): TaskSettings {
    return { Filename: this.filename };
  }

  applySettings(settings: Record<string, unknown>): void {
    this.filename = FileTaskSettingsSchema.parse(settings).Filename;
  }

  async runSettings(dialog?: FileDialog): Promise<boolean> {
    const file = dialog ? await dialog.showOpenDialog({ filter: this.dialogFilter, title: this.name }) : null;
    if (file) {
      this.filename = file;
    }
    return true;
  }

  protected async doTask(source: ScanData): Promise<ScanData> {
    if (!this.filename) {
      await this.runSettings(this.dialog);
    }
    if (!this.filename) {
      this.fail(`Invalid File ${this.filename}`);
      return source;
    }
    const data = await this.load();
    this.updatePercent(100, data);
    return data;
  }

  protected async load(): Promise<ScanData> {
    return readScan(this.filename);
  }
}

/** Read a mesh from a native scan file; the file must carry one. */
export class LoadMesh extends LoadPoints {
  get out(): TaskItem {
    return TaskItem.Mesh;
  }

  get name(): string {
    return `Load mesh ${ScanFormat.extension}`;
  }

  clone(): ProcessingTask {
    return new LoadMesh();
  }

  protected async load(): Promise<ScanData> {
    const data = await super.load();
    if (!data.mesh) {
      throw new ScanFormatError('File has no mesh', this.filename);
    }
    return data;
  }
}
