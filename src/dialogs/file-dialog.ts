import { createInterface, type Interface } from 'readline/promises';
import { extname, resolve } from 'path';
import type { Readable, Writable } from 'stream';
import { filterExtensions } from '../io/format';

export interface FileDialogOptions {
  /** `Description (*.ext)|*.ext` filter, as exposed by the tasks */
  filter: string;
  title?: string;
}

/**
 * Host-supplied prompt for file paths. Resolves `null` when the user
 * dismisses the prompt without choosing a file.
 */
export interface FileDialog {
  showSaveDialog(options: FileDialogOptions): Promise<string | null>;
  showOpenDialog(options: FileDialogOptions): Promise<string | null>;
}

export interface ConsoleFileDialogOptions {
  input?: Readable;
  output?: Writable;
  /** Directory relative answers are resolved against */
  initialDirectory?: string;
}

interface LineReader {
  rl: Interface;
  lines: AsyncIterator<string>;
}

/**
 * Terminal file dialog: asks for a path on `output` and reads one line
 * from `input`. A save answer without an extension gets the filter's first one.
 *
 * All prompts share one line reader, so answers piped ahead of their prompt
 * are kept for the prompts that follow. Once `input` ends every prompt
 * resolves as dismissed. Call `close` when the host is done with the dialog.
 */
export class ConsoleFileDialog implements FileDialog {
  private input: Readable;
  private output: Writable;
  private initialDirectory: string;
  private reader: LineReader | null = null;

  constructor(options: ConsoleFileDialogOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.initialDirectory = options.initialDirectory ?? process.cwd();
  }

  async showSaveDialog(options: FileDialogOptions): Promise<string | null> {
    const answer = await this.ask(options.title ?? 'Save as', options.filter);
    if (!answer) return null;
    const [defaultExtension] = filterExtensions(options.filter);
    if (defaultExtension && !extname(answer)) {
      return resolve(this.initialDirectory, answer + defaultExtension);
    }
    return resolve(this.initialDirectory, answer);
  }

  async showOpenDialog(options: FileDialogOptions): Promise<string | null> {
    const answer = await this.ask(options.title ?? 'Open', options.filter);
    return answer ? resolve(this.initialDirectory, answer) : null;
  }

  close(): void {
    this.reader?.rl.close();
    this.reader = null;
  }

  private async ask(title: string, filter: string): Promise<string> {
    const reader = this.reader ?? this.openReader();
    const patterns = filterExtensions(filter)
      .map((ext) => `*${ext}`)
      .join(', ');
    this.output.write(`${title} [${patterns}] (${this.initialDirectory}): `);
    const line = await reader.lines.next();
    return line.done ? '' : line.value.trim();
  }

  private openReader(): LineReader {
    const rl = createInterface({ input: this.input, terminal: false });
    this.reader = { rl, lines: rl[Symbol.asyncIterator]() };
    return this.reader;
  }
}
