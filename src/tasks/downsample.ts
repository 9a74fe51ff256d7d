import { z } from 'zod';
import { ScanData } from '../types';
import { ProcessingTask, TaskCategory, TaskItem } from './task';
import type { TaskSettings } from './settings';

const StepSchema = z.number().int().min(1);

const DownsampleSettingsSchema = z.object({
  Step: z.coerce.number().int().min(1).default(2),
});

/** Keep every `step`-th point of each scan line. */
export class DownsampleLines extends ProcessingTask {
  private _step = 2;

  get step(): number {
    return this._step;
  }

  /** Throws unless `value` is a whole number of at least 1. */
  set step(value: number) {
    this._step = StepSchema.parse(value);
  }

  get in(): TaskItem {
    return TaskItem.ScanLines;
  }

  get out(): TaskItem {
    return TaskItem.ScanLines;
  }

  get category(): TaskCategory {
    return TaskCategory.Filter;
  }

  get name(): string {
    return 'Downsample lines';
  }

  get displayName(): string {
    return `Downsample lines (1/${this.step})`;
  }

  get browsableSettings(): string[] {
    return ['Step'];
  }

  get settingDescriptions(): Record<string, string> {
    return { Step: 'Keep one point out of this many' };
  }

  clone(): ProcessingTask {
    return new DownsampleLines();
  }

  getSettings(): TaskSettings {
    return { Step: this.step };
  }

  applySettings(settings: Record<string, unknown>): void {
    this.step = DownsampleSettingsSchema.parse(settings).Step;
  }

  protected async doTask(source: ScanData): Promise<ScanData> {
    const result = new ScanData([], source.mesh);
    const total = source.lines.length;

    for (let i = 0; i < total; i++) {
      if (this.cancelPending) {
        this.fail('Cancelled');
        return result;
      }
      const line = source.lines[i];
      result.lines.push({
        laserId: line.laserId,
        points: line.points.filter((_, index) => index % this.step === 0),
      });
      this.updatePercent(Math.floor(((i + 1) * 100) / total), result);
    }
    return result;
  }
}
