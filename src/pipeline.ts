import { ScanData } from './types';
import { IncompatibleTaskError } from './errors';
import { TaskItem, TaskStatus, type ProcessingTask, type RunOptions } from './tasks/task';
import { createLogger } from './utils/logger';

const log = createLogger('Pipeline');

export interface PipelineResult {
  /** Number of tasks that finished */
  completed: number;
  /** Task the run stopped at, if one failed */
  failed: ProcessingTask | null;
  errors: string[];
  /** Output of the last task that ran */
  output: ScanData | null;
  cancelled: boolean;
}

/**
 * Ordered list of tasks, each consuming what the previous one produces.
 * Edits that would break the chain are refused.
 */
export class TaskPipeline {
  private items: ProcessingTask[] = [];

  constructor(tasks: ProcessingTask[] = []) {
    tasks.forEach((task) => this.append(task));
  }

  get tasks(): readonly ProcessingTask[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  insert(index: number, task: ProcessingTask): void {
    if (index < 0 || index > this.items.length) {
      throw new RangeError(`Insert position ${index} out of bounds 0 .. ${this.items.length}`);
    }
    const prev = this.items[index - 1] ?? null;
    const next = this.items[index] ?? null;
    if (!task.canInsert(prev, next)) {
      throw new IncompatibleTaskError(
        `Cannot insert "${task.displayName}" (${TaskItem[task.in]} -> ${TaskItem[task.out]}) at position ${index}`
      );
    }
    this.items.splice(index, 0, task);
  }

  append(task: ProcessingTask): void {
    this.insert(this.items.length, task);
  }

  remove(index: number): ProcessingTask {
    const [removed] = this.items.splice(index, 1);
    if (!removed) {
      throw new RangeError(`No task at position ${index}`);
    }
    return removed;
  }

  clear(): void {
    this.items = [];
  }

  /** Problems that keep the pipeline from running; empty when it can run. */
  validate(): string[] {
    const problems: string[] = [];
    this.items.forEach((task, index) => {
      if (index === 0) {
        if (task.in !== TaskItem.None) {
          problems.push(`"${task.displayName}" needs ${TaskItem[task.in]} input and cannot start the pipeline`);
        }
      } else {
        const prev = this.items[index - 1];
        if (!task.canFollowTask(prev)) {
          problems.push(
            `"${task.displayName}" needs ${TaskItem[task.in]} but "${prev.displayName}" produces ${TaskItem[prev.out]}`
          );
        }
      }
    });
    return problems;
  }

  get isValid(): boolean {
    return this.validate().length === 0;
  }

  /** Run every task in order, stopping at the first failure or cancellation. */
  async run(options: RunOptions = {}): Promise<PipelineResult> {
    const problems = this.validate();
    if (problems.length > 0) {
      throw new IncompatibleTaskError('Pipeline is not runnable', problems);
    }

    this.items.forEach((task) => task.prepareToRun());

    const result: PipelineResult = {
      completed: 0,
      failed: null,
      errors: [],
      output: null,
      cancelled: false,
    };

    let data = new ScanData();
    for (const task of this.items) {
      if (options.signal?.aborted) {
        result.cancelled = true;
        if (options.work) {
          options.work.cancel = true;
        }
        log.info('Run cancelled');
        break;
      }

      log.debug(`Running ${task.displayName}`);
      const output = await task.run(data, options);
      if (output === null || task.status === TaskStatus.Error) {
        result.failed = task;
        result.errors.push(`${task.displayName}: ${task.lastError}`);
        result.cancelled = options.signal?.aborted ?? false;
        log.warn(`${task.displayName} failed: ${task.lastError}`);
        break;
      }

      result.completed++;
      result.output = output;
      data = output;
    }

    return result;
  }
}
