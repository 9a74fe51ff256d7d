/**
 * Command implementations behind the `scan-tasks` CLI.
 */
import { resolve } from 'path';
import { parseArgs } from 'util';
import { configFromEnv, type Config } from './config';
import { getFormat } from './io/formats';
import { TaskPipeline } from './pipeline';
import { DownsampleLines } from './tasks/downsample';
import { LoadMesh, LoadPoints } from './tasks/load';
import { createDefaultRegistry } from './tasks/registry';
import { SaveMesh, SaveObj, SavePly, SavePoints, SaveStl, SaveXyz } from './tasks/save';
import { TaskSettingsEditor } from './tasks/settings-editor';
import { TaskCategory, TaskItem, type ProcessingTask } from './tasks/task';
import { configureLogging } from './utils/logger';

export const USAGE = `
scan-tasks: processing tasks for 3D scan data

Usage:
  scan-tasks list
  scan-tasks convert <input.scan> <output> [--step <n>] [--mesh]
  scan-tasks settings <TaskType> [Name=Value ...]

Options:
  --step <n>     Keep one point out of n before saving
  --mesh         Load the mesh stored in the input instead of its scan lines
  --help         Show this help

Environment:
  SCAN_TASKS_SETTINGS_DIR   Task settings directory (default: ./settings)
  SCAN_TASKS_DATA_DIR       Directory relative paths resolve against (default: .)
  SCAN_TASKS_LOG_LEVEL      debug | info | warn | error
`.trim();

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Run the CLI with `argv` (without node and script) and return the exit code. */
export async function runCli(
  argv: string[],
  io: CliIO = consoleIO,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let args: ReturnType<typeof parseCliArgs>;
  let config: Config;
  try {
    args = parseCliArgs(argv);
    config = configFromEnv(env);
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    io.err(USAGE);
    return 1;
  }
  configureLogging({ minLevel: config.logLevel });

  const [command, ...rest] = args.positionals;
  if (args.values.help) {
    io.out(USAGE);
    return 0;
  }
  if (!command) {
    io.err(USAGE);
    return 1;
  }

  try {
    switch (command) {
      case 'list':
        return listTasks(io);
      case 'convert':
        return await convert(rest, args.values, config, io);
      case 'settings':
        return await editSettings(rest, config, io);
      default:
        io.err(`Unknown command: ${command}`);
        io.err(USAGE);
        return 1;
    }
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      step: { type: 'string' },
      mesh: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

function describeTask(task: ProcessingTask): string {
  return `${task.typeName.padEnd(16)} ${task.displayName} (${TaskItem[task.in]} -> ${TaskItem[task.out]})`;
}

function listTasks(io: CliIO): number {
  let category: TaskCategory | null = null;
  for (const task of createDefaultRegistry().palette()) {
    if (task.category !== category) {
      category = task.category;
      io.out(`${TaskCategory[category]}:`);
    }
    io.out(`  ${describeTask(task)}`);
  }
  return 0;
}

function saveTaskFor(output: string, mesh: boolean): SavePoints {
  switch (getFormat(output).extension) {
    case '.stl':
      return new SaveStl();
    case '.ply':
      return new SavePly();
    case '.xyz':
      return new SaveXyz();
    case '.obj':
      return new SaveObj();
    default:
      return mesh ? new SaveMesh() : new SavePoints();
  }
}

async function convert(
  positionals: string[],
  options: { step?: string; mesh?: boolean },
  config: Config,
  io: CliIO
): Promise<number> {
  const [input, output] = positionals;
  if (!input || !output) {
    io.err('convert needs an input and an output file');
    return 1;
  }

  const mesh = options.mesh ?? false;
  const load = mesh ? new LoadMesh() : new LoadPoints();
  load.filename = resolve(config.userDataPath, input);

  const pipeline = new TaskPipeline([load]);
  if (options.step !== undefined) {
    const downsample = new DownsampleLines();
    downsample.applySettings({ Step: options.step });
    pipeline.append(downsample);
  }

  const save = saveTaskFor(output, mesh);
  save.filename = resolve(config.userDataPath, output);
  pipeline.append(save);

  const result = await pipeline.run({
    onProgress: ({ task, percent }) => io.out(`  ${task.displayName}: ${percent}%`),
  });

  if (result.failed) {
    result.errors.forEach((error) => io.err(error));
    return 1;
  }
  io.out(`Saved ${save.filename}`);
  return 0;
}

async function editSettings(positionals: string[], config: Config, io: CliIO): Promise<number> {
  const [typeName, ...assignments] = positionals;
  if (!typeName) {
    io.err('settings needs a task type');
    return 1;
  }

  const task = await createDefaultRegistry().create(typeName).loadFromFile(config.settingsDirectory);
  const editor = new TaskSettingsEditor(task);
  for (const assignment of assignments) {
    const eq = assignment.indexOf('=');
    if (eq <= 0) {
      io.err(`Expected Name=Value, got "${assignment}"`);
      return 1;
    }
    editor.set(assignment.slice(0, eq), assignment.slice(eq + 1));
  }

  if (editor.dirty) {
    await editor.confirm(config.settingsDirectory);
  }

  io.out(editor.title);
  for (const field of editor.fields) {
    io.out(`  ${field.name} = ${field.value}  (${field.description})`);
  }
  return 0;
}
