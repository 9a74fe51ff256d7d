import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ScanData } from '../types';
import { restoreLogging, suppressLogging } from '../utils/logger';
import { ProcessingTask, TaskCategory, TaskItem, TaskStatus, type ProgressEvent } from './task';

class EchoTask extends ProcessingTask {
  constructor(
    private kinds: [TaskItem, TaskItem] = [TaskItem.ScanLines, TaskItem.ScanLines],
    private label = 'Echo',
    private group = TaskCategory.Filter,
    private steps: number[] = []
  ) {
    super();
  }

  get in(): TaskItem {
    return this.kinds[0];
  }

  get out(): TaskItem {
    return this.kinds[1];
  }

  get name(): string {
    return this.label;
  }

  get category(): TaskCategory {
    return this.group;
  }

  clone(): ProcessingTask {
    return new EchoTask(this.kinds, this.label, this.group, this.steps);
  }

  protected async doTask(source: ScanData): Promise<ScanData> {
    for (const step of this.steps) {
      this.updatePercent(step, source);
    }
    return source;
  }
}

class FailingTask extends EchoTask {
  protected async doTask(): Promise<ScanData> {
    throw new Error('boom');
  }
}

class RefusingTask extends EchoTask {
  protected async doTask(source: ScanData): Promise<ScanData> {
    this.fail('nothing to do');
    return source;
  }
}

class CancellableTask extends EchoTask {
  sawCancel = false;

  protected async doTask(source: ScanData): Promise<ScanData> {
    this.sawCancel = this.cancelPending;
    return source;
  }
}

class UnreadyTask extends EchoTask {
  get ready(): boolean {
    return false;
  }
}

const KINDS = [TaskItem.None, TaskItem.ScanLines, TaskItem.Mesh];

describe('ProcessingTask', () => {
  beforeAll(() => suppressLogging());
  afterAll(() => restoreLogging());

  describe('status', () => {
    it('starts idle', () => {
      const task = new EchoTask();
      expect(task.status).toBe(TaskStatus.None);
      expect(task.percent).toBe(0);
      expect(task.lastError).toBe('');
      expect(task.toolTip).toBe('Filter: Echo');
      expect(task.toString()).toBe('Echo');
    });

    it('flags a missing resource in the tool tip', () => {
      expect(new UnreadyTask().toolTip).toBe('Missings Ressource to run task');
    });

    it('finishes at 100% and passes the data through', async () => {
      const task = new EchoTask();
      const source = new ScanData();
      const result = await task.run(source);
      expect(result).toBe(source);
      expect(task.status).toBe(TaskStatus.Finished);
      expect(task.percent).toBe(100);
      expect(task.toolTip).toBe('Finished');
    });

    it('notifies each distinct percent once', async () => {
      const task = new EchoTask(undefined, undefined, undefined, [0, 0, 50, 100]);
      const events: ProgressEvent[] = [];
      await task.run(new ScanData(), { onProgress: (e) => events.push(e) });
      expect(events.map((e) => e.percent)).toEqual([50, 100]);
      expect(events.every((e) => e.task === task)).toBe(true);
    });

    it('records thrown errors and returns no result', async () => {
      const task = new FailingTask();
      const result = await task.run(new ScanData());
      expect(result).toBeNull();
      expect(task.status).toBe(TaskStatus.Error);
      expect(task.lastError).toBe('boom');
      expect(task.toolTip).toBe('Error :boom');
    });

    it('returns no result when the task reports its own error', async () => {
      const task = new RefusingTask();
      const result = await task.run(new ScanData());
      expect(result).toBeNull();
      expect(task.status).toBe(TaskStatus.Error);
      expect(task.lastError).toBe('nothing to do');
      expect(task.percent).toBe(0);
    });

    it('prepareToRun resets status and percent', async () => {
      const task = new FailingTask();
      await task.run(new ScanData());
      task.prepareToRun();
      expect(task.status).toBe(TaskStatus.None);
      expect(task.percent).toBe(0);
    });
  });

  describe('cancellation', () => {
    it('reports a pending cancel and flags the work args', async () => {
      const controller = new AbortController();
      controller.abort();
      const work = { cancel: false };
      const task = new CancellableTask();
      await task.run(new ScanData(), { signal: controller.signal, work });
      expect(task.sawCancel).toBe(true);
      expect(work.cancel).toBe(true);
    });

    it('is not pending without an aborted signal', async () => {
      const work = { cancel: false };
      const task = new CancellableTask();
      await task.run(new ScanData(), { signal: new AbortController().signal, work });
      expect(task.sawCancel).toBe(false);
      expect(work.cancel).toBe(false);
    });
  });

  describe('compatibility', () => {
    it('canFollowTask holds exactly when the other output matches this input', () => {
      for (const aIn of KINDS) {
        for (const bOut of KINDS) {
          const a = new EchoTask([aIn, TaskItem.None]);
          const b = new EchoTask([TaskItem.None, bOut]);
          expect(a.canFollowTask(b)).toBe(aIn === bOut);
          expect(a.canFollow(bOut)).toBe(aIn === bOut);
        }
      }
    });

    it('only a task without input can be inserted first', () => {
      const source = new EchoTask([TaskItem.None, TaskItem.ScanLines]);
      const filter = new EchoTask([TaskItem.ScanLines, TaskItem.ScanLines]);
      expect(source.canInsert(null, null)).toBe(true);
      expect(filter.canInsert(null, null)).toBe(false);
    });

    it('checks both neighbours', () => {
      const source = new EchoTask([TaskItem.None, TaskItem.ScanLines]);
      const filter = new EchoTask([TaskItem.ScanLines, TaskItem.ScanLines]);
      const mesher = new EchoTask([TaskItem.ScanLines, TaskItem.Mesh]);
      const meshSink = new EchoTask([TaskItem.Mesh, TaskItem.None]);

      expect(filter.canInsert(source, mesher)).toBe(true);
      expect(filter.canInsert(source, meshSink)).toBe(false);
      expect(mesher.canInsert(filter, meshSink)).toBe(true);
      expect(meshSink.canInsert(filter, null)).toBe(false);
    });

    it('canInsertBetween compares kinds', () => {
      const mesher = new EchoTask([TaskItem.ScanLines, TaskItem.Mesh]);
      expect(mesher.canInsertBetween(TaskItem.ScanLines, TaskItem.Mesh)).toBe(true);
      expect(mesher.canInsertBetween(TaskItem.ScanLines, TaskItem.ScanLines)).toBe(false);
    });
  });

  describe('ordering', () => {
    it('groups by category, then sorts by display name', () => {
      const io: [TaskItem, TaskItem] = [TaskItem.ScanLines, TaskItem.None];
      const tasks = [
        new EchoTask(io, 'Save b', TaskCategory.IO),
        new EchoTask(io, 'Zeta', TaskCategory.Filter),
        new EchoTask(io, 'Save a', TaskCategory.IO),
      ];
      expect(tasks.sort((a, b) => a.compareTo(b)).map((t) => t.name)).toEqual(['Zeta', 'Save a', 'Save b']);
    });

    it('orders by input then output kind within a category', () => {
      const tasks = [
        new EchoTask([TaskItem.Mesh, TaskItem.None], 'A'),
        new EchoTask([TaskItem.ScanLines, TaskItem.Mesh], 'B'),
        new EchoTask([TaskItem.ScanLines, TaskItem.None], 'C'),
      ];
      expect(tasks.sort((a, b) => a.compareTo(b)).map((t) => t.name)).toEqual(['C', 'B', 'A']);
    });

    it('puts IO after the unknown category', () => {
      const io = new EchoTask(undefined, 'A', TaskCategory.IO);
      const unknown = new EchoTask(undefined, 'B', TaskCategory.Unknown);
      expect(io.compareTo(unknown)).toBeGreaterThan(0);
    });
  });

  describe('settings', () => {
    it('names its config file after its type', () => {
      expect(new EchoTask().configFileName).toBe('EchoTask.config.xml');
    });

    it('has no settings by default', () => {
      const task = new EchoTask();
      expect(task.hasBrowsableSettings).toBe(false);
      expect(task.hasSettings).toBe(false);
    });

    it('falls back to itself on unreadable XML', () => {
      const task = new EchoTask();
      expect(task.loadFromXml('<EchoTask><unclosed></EchoTask>')).toBe(task);
      expect(task.loadFromXml('<OtherTask></OtherTask>')).toBe(task);
    });

    it('loads an empty settings document into a new instance', () => {
      const task = new EchoTask();
      const loaded = task.loadFromXml(task.toXml());
      expect(loaded).not.toBe(task);
      expect(loaded).toBeInstanceOf(EchoTask);
    });
  });
});
