import { writeFile } from 'fs/promises';
import type { ScanData, SerializedMesh } from '../types';
import { ScanFormatError } from '../errors';
import { dialogFilter, type ScanDataFormat } from './format';
import { formatNumber } from './text';

/** Wavefront OBJ: vertex lines followed by 1-based triangle faces. */
export function encodeOBJ(mesh: SerializedMesh): string {
  if (mesh.indices.length % 3 !== 0) {
    throw new ScanFormatError(`Index count ${mesh.indices.length} is not a multiple of 3`);
  }
  const lines = ['# exported from scan-tasks'];
  for (let i = 0; i + 2 < mesh.vertices.length; i += 3) {
    const [x, y, z] = mesh.vertices.slice(i, i + 3);
    lines.push(`v ${formatNumber(x)} ${formatNumber(y)} ${formatNumber(z)}`);
  }
  for (let i = 0; i < mesh.indices.length; i += 3) {
    const [a, b, c] = mesh.indices.slice(i, i + 3);
    lines.push(`f ${a + 1} ${b + 1} ${c + 1}`);
  }
  return lines.join('\n') + '\n';
}

export const ObjFormat: ScanDataFormat = {
  extension: '.obj',
  description: 'Wavefront OBJ',
  dialogFilter: dialogFilter('Wavefront OBJ', '.obj'),
  async write(path: string, data: ScanData): Promise<void> {
    if (!data.mesh) {
      throw new ScanFormatError('OBJ export requires a mesh', path);
    }
    await writeFile(path, encodeOBJ(data.mesh), 'utf-8');
  },
};
