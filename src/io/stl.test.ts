import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { ScanFormatError } from '../errors';
import { TRIANGLE, makeTmpDir } from '../test-fixtures';
import { ScanData } from '../types';
import { STL_TRIANGLE_SIZE, StlFormat, exportToSTL } from './stl';

describe('STL export', () => {
  it('writes header, count and one record per triangle', () => {
    const buffer = exportToSTL(TRIANGLE, { name: 'part' });
    const view = new DataView(buffer);

    expect(buffer.byteLength).toBe(84 + STL_TRIANGLE_SIZE);
    expect(new TextDecoder().decode(new Uint8Array(buffer, 0, 4))).toBe('part');
    expect(view.getUint8(4)).toBe(0);
    expect(view.getUint32(80, true)).toBe(1);

    const floats = Array.from({ length: 12 }, (_, i) => view.getFloat32(84 + i * 4, true));
    expect(floats).toEqual([0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1, 0]);
    expect(view.getUint16(84 + 48, true)).toBe(0);
  });

  it('scales vertices', () => {
    const view = new DataView(exportToSTL(TRIANGLE, { scale: 10 }));
    // x of the second vertex
    expect(view.getFloat32(84 + 12 + 12, true)).toBe(10);
  });

  it('rejects indices past the vertex list', () => {
    expect(() => exportToSTL({ vertices: [0, 0, 0], indices: [0, 1, 2] })).toThrow(ScanFormatError);
  });

  it('writes the mesh to disk', async () => {
    const file = join(makeTmpDir(), 'part.stl');
    await StlFormat.write(file, new ScanData([], TRIANGLE));
    expect(readFileSync(file).length).toBe(134);
  });
});
