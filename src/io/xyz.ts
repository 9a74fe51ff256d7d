import { writeFile } from 'fs/promises';
import type { ScanData } from '../types';
import { dialogFilter, type ScanDataFormat } from './format';
import { pointCoordinates } from './text';

export function encodeXYZ(data: ScanData): string {
  return data.lines
    .flatMap((line) => line.points)
    .map((point) => pointCoordinates(point) + '\n')
    .join('');
}

export const XyzFormat: ScanDataFormat = {
  extension: '.xyz',
  description: 'XYZ point cloud',
  dialogFilter: dialogFilter('XYZ point cloud', '.xyz'),
  async write(path: string, data: ScanData): Promise<void> {
    await writeFile(path, encodeXYZ(data), 'utf-8');
  },
};
