import { basename } from 'path';
import type { ScanData } from '../types';
import type { FileDialog } from '../dialogs/file-dialog';
import type { ScanDataFormat } from '../io/format';
import { ObjFormat } from '../io/obj';
import { PlyFormat } from '../io/ply';
import { ScanFormat } from '../io/scan';
import { StlFormat } from '../io/stl';
import { XyzFormat } from '../io/xyz';
import { ProcessingTask, TaskCategory, TaskItem, TaskStatus } from './task';
import { FileTaskSettingsSchema, type TaskSettings } from './settings';

/** Save scan lines in the native scan format. Terminal: nothing flows downstream. */
export class SavePoints extends ProcessingTask {
  filename = '';

  protected get format(): ScanDataFormat {
    return ScanFormat;
  }

  get in(): TaskItem {
    return TaskItem.ScanLines;
  }

  get out(): TaskItem {
    return TaskItem.None;
  }

  get category(): TaskCategory {
    return TaskCategory.IO;
  }

  get dialogFilter(): string {
    return this.format.dialogFilter;
  }

  get name(): string {
    return `Save ${this.format.extension}`;
  }

  get displayName(): string {
    if (this.filename) {
      return `Save: "${basename(this.filename)}"`;
    }
    return super.displayName;
  }

  get hasSettings(): boolean {
    return true;
  }

  clone(): ProcessingTask {
    return new SavePoints();
  }

  getSettings(): TaskSettings {
    return { Filename: this.filename };
  }

  applySettings(settings: Record<string, unknown>): void {
    this.filename = FileTaskSettingsSchema.parse(settings).Filename;
  }

  async runSettings(dialog?: FileDialog): Promise<boolean> {
    const file = await this.promptFilename(dialog);
    if (file) {
      this.filename = file;
    }
    return true;
  }

  protected async doTask(source: ScanData): Promise<ScanData> {
    if (!this.filename) {
      const file = await this.promptFilename(this.dialog);
      if (file) {
        this.filename = file;
      }
    }

    if (this.filename) {
      this.setStatus(TaskStatus.Working);
      this.updatePercent(0, source);
      await this.save(source);
      this.setStatus(TaskStatus.Finished);
      this.updatePercent(100, source);
    } else {
      this.fail(`Invalid File ${this.filename}`);
    }
    return source;
  }

  protected async save(source: ScanData): Promise<void> {
    await this.format.write(this.filename, source);
  }

  private async promptFilename(dialog: FileDialog | undefined): Promise<string | null> {
    if (!dialog) return null;
    return dialog.showSaveDialog({ filter: this.dialogFilter, title: this.name });
  }
}

/** Save a mesh in the native scan format. */
export class SaveMesh extends SavePoints {
  get in(): TaskItem {
    return TaskItem.Mesh;
  }

  clone(): ProcessingTask {
    return new SaveMesh();
  }
}

export class SaveStl extends SaveMesh {
  protected get format(): ScanDataFormat {
    return StlFormat;
  }

  clone(): ProcessingTask {
    return new SaveStl();
  }
}

/** Save scan lines as a PLY point cloud. */
export class SavePly extends SaveMesh {
  protected get format(): ScanDataFormat {
    return PlyFormat;
  }

  get in(): TaskItem {
    return TaskItem.ScanLines;
  }

  clone(): ProcessingTask {
    return new SavePly();
  }
}

/** Save scan lines as bare XYZ coordinates. Not offered in the palette. */
export class SaveXyz extends SaveMesh {
  protected get format(): ScanDataFormat {
    return XyzFormat;
  }

  get in(): TaskItem {
    return TaskItem.ScanLines;
  }

  get listed(): boolean {
    return false;
  }

  clone(): ProcessingTask {
    return new SaveXyz();
  }
}

export class SaveObj extends SaveMesh {
  protected get format(): ScanDataFormat {
    return ObjFormat;
  }

  clone(): ProcessingTask {
    return new SaveObj();
  }
}
