import { extname } from 'path';
import { UnknownFormatError } from '../errors';
import type { ScanDataFormat } from './format';
import { ObjFormat } from './obj';
import { PlyFormat } from './ply';
import { ScanFormat } from './scan';
import { StlFormat } from './stl';
import { XyzFormat } from './xyz';

export const FORMATS: readonly ScanDataFormat[] = [ScanFormat, StlFormat, PlyFormat, XyzFormat, ObjFormat];

/** Look up a format by extension (`.stl`, `stl`) or by a file path ending in one. */
export function getFormat(extensionOrPath: string): ScanDataFormat {
  const ext = extname(extensionOrPath) || extensionOrPath;
  const normalised = (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase();
  const format = FORMATS.find((f) => f.extension === normalised);
  if (!format) {
    throw new UnknownFormatError(normalised);
  }
  return format;
}
