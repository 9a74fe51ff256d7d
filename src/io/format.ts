import type { ScanData } from '../types';

/**
 * A file format scan data can be written to (and, for the native format,
 * read back from).
 */
export interface ScanDataFormat {
  /** Extension including the dot, e.g. `.stl` */
  extension: string;
  description: string;
  /** Filter string for file dialogs: `Description (*.ext)|*.ext` */
  dialogFilter: string;
  write(path: string, data: ScanData): Promise<void>;
  read?(path: string): Promise<ScanData>;
}

export function dialogFilter(description: string, extension: string): string {
  return `${description} (*${extension})|*${extension}`;
}

/** Parse a dialog filter back into its extensions (`*.stl;*.STL` style patterns allowed). */
export function filterExtensions(filter: string): string[] {
  const parts = filter.split('|');
  const extensions: string[] = [];
  for (let i = 1; i < parts.length; i += 2) {
    for (const pattern of parts[i].split(';')) {
      const trimmed = pattern.trim();
      if (trimmed.startsWith('*.')) {
        extensions.push(trimmed.slice(1).toLowerCase());
      }
    }
  }
  return extensions;
}
