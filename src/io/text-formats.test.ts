import { describe, it, expect } from 'vitest';
import { ScanFormatError } from '../errors';
import { TRIANGLE, makeScan } from '../test-fixtures';
import { encodeOBJ } from './obj';
import { encodePLY } from './ply';
import { colorByte, formatNumber } from './text';
import { encodeXYZ } from './xyz';

describe('formatNumber', () => {
  it('drops trailing zeros and negative zero', () => {
    expect(formatNumber(1)).toBe('1');
    expect(formatNumber(0.1234567)).toBe('0.123457');
    expect(formatNumber(-0.0000001)).toBe('0');
  });

  it('maps color channels to bytes', () => {
    expect([colorByte(0), colorByte(0.5), colorByte(1), colorByte(2)]).toEqual([0, 128, 255, 255]);
  });
});

describe('PLY', () => {
  it('writes one vertex per point with normal and color', () => {
    expect(encodePLY(makeScan([[[1, 2, 3]], [[-1.5, 0, 0.25]]]))).toBe(
      [
        'ply',
        'format ascii 1.0',
        'comment exported from scan-tasks',
        'element vertex 2',
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
        '1 2 3 0 0 1 255 128 0',
        '-1.5 0 0.25 0 0 1 255 128 0',
        '',
      ].join('\n')
    );
  });
});

describe('XYZ', () => {
  it('writes one line per point', () => {
    expect(encodeXYZ(makeScan([[[1, 2, 3], [4, 5, 6]], [[0.5, 0, 0]]]))).toBe('1 2 3\n4 5 6\n0.5 0 0\n');
  });

  it('writes nothing for an empty scan', () => {
    expect(encodeXYZ(makeScan([]))).toBe('');
  });
});

describe('OBJ', () => {
  it('writes vertices and 1-based faces', () => {
    expect(encodeOBJ(TRIANGLE)).toBe('# exported from scan-tasks\nv 0 0 0\nv 1 0 0\nv 0 1 0\nf 1 2 3\n');
  });

  it('rejects partial triangles', () => {
    expect(() => encodeOBJ({ vertices: TRIANGLE.vertices, indices: [0, 1] })).toThrow(ScanFormatError);
  });
});
