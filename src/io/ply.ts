import { writeFile } from 'fs/promises';
import type { ScanData } from '../types';
import { dialogFilter, type ScanDataFormat } from './format';
import { colorByte, formatNumber, pointCoordinates } from './text';

/** ASCII PLY point cloud with normals and 8-bit colors, one vertex per scanned point. */
export function encodePLY(data: ScanData): string {
  const points = data.lines.flatMap((line) => line.points);
  const lines = [
    'ply',
    'format ascii 1.0',
    'comment exported from scan-tasks',
    `element vertex ${points.length}`,
    'property float x',
    'property float y',
    'property float z',
    'property float nx',
    'property float ny',
    'property float nz',
    'property uchar red',
    'property uchar green',
    'property uchar blue',
    'end_header',
  ];
  for (const point of points) {
    const { normal, color } = point;
    lines.push(
      [
        pointCoordinates(point),
        formatNumber(normal.x),
        formatNumber(normal.y),
        formatNumber(normal.z),
        colorByte(color.r),
        colorByte(color.g),
        colorByte(color.b),
      ].join(' ')
    );
  }
  return lines.join('\n') + '\n';
}

export const PlyFormat: ScanDataFormat = {
  extension: '.ply',
  description: 'PLY file',
  dialogFilter: dialogFilter('PLY file', '.ply'),
  async write(path: string, data: ScanData): Promise<void> {
    await writeFile(path, encodePLY(data), 'utf-8');
  },
};
