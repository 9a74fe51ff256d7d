/**
 * Task registry – the palette of task types the pipeline editor offers.
 */
import { DuplicateTaskError, UnknownTaskError } from '../errors';
import { DownsampleLines } from './downsample';
import { LoadMesh, LoadPoints } from './load';
import { SaveMesh, SaveObj, SavePly, SavePoints, SaveStl, SaveXyz } from './save';
import type { ProcessingTask, TaskItem } from './task';

export type TaskFactory = () => ProcessingTask;

export class TaskRegistry {
  private factories = new Map<string, TaskFactory>();

  register(factory: TaskFactory): this {
    const typeName = factory().typeName;
    if (this.factories.has(typeName)) {
      throw new DuplicateTaskError(typeName);
    }
    this.factories.set(typeName, factory);
    return this;
  }

  has(typeName: string): boolean {
    return this.factories.has(typeName);
  }

  get typeNames(): string[] {
    return [...this.factories.keys()];
  }

  create(typeName: string): ProcessingTask {
    const factory = this.factories.get(typeName);
    if (!factory) {
      throw new UnknownTaskError(typeName);
    }
    return factory();
  }

  /** Fresh instances of every listed task, in palette order. */
  palette(): ProcessingTask[] {
    return [...this.factories.values()]
      .map((factory) => factory())
      .filter((task) => task.listed)
      .sort((a, b) => a.compareTo(b));
  }

  /** Palette entries that fit between a stage producing `prevOut` and one consuming `nextIn`. */
  candidates(prevOut: TaskItem, nextIn: TaskItem): ProcessingTask[] {
    return this.palette().filter((task) => task.canInsertBetween(prevOut, nextIn));
  }

  /** Palette entries carrying the settings last saved in `settingsDirectory`. */
  async loadSettings(settingsDirectory: string): Promise<ProcessingTask[]> {
    const tasks = await Promise.all(this.palette().map((task) => task.loadFromFile(settingsDirectory)));
    return tasks.sort((a, b) => a.compareTo(b));
  }
}

export function createDefaultRegistry(): TaskRegistry {
  return new TaskRegistry()
    .register(() => new LoadPoints())
    .register(() => new LoadMesh())
    .register(() => new DownsampleLines())
    .register(() => new SavePoints())
    .register(() => new SaveMesh())
    .register(() => new SaveStl())
    .register(() => new SavePly())
    .register(() => new SaveXyz())
    .register(() => new SaveObj());
}
