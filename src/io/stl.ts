import * as THREE from 'three';
import { writeFile } from 'fs/promises';
import type { ScanData, SerializedMesh } from '../types';
import { ScanFormatError } from '../errors';
import { dialogFilter, type ScanDataFormat } from './format';

export interface STLExportOptions {
  scale?: number; // Scale factor for output (default: 1)
  name?: string; // Model name for STL header
}

// Binary STL format:
// 80 bytes - Header
// 4 bytes - Number of triangles (uint32)
// For each triangle:
//   12 bytes - Normal vector (3 floats)
//   36 bytes - Vertices (9 floats)
//   2 bytes - Attribute byte count (uint16)
const HEADER_SIZE = 80;
const COUNT_SIZE = 4;
const NORMAL_SIZE = 12;
const VERTEX_SIZE = 36;
const ATTR_SIZE = 2;
export const STL_TRIANGLE_SIZE = NORMAL_SIZE + VERTEX_SIZE + ATTR_SIZE;

export function exportToSTL(mesh: SerializedMesh, options: STLExportOptions = {}): ArrayBuffer {
  const scale = options.scale || 1;
  const name = options.name || 'Binary STL file exported from scan-tasks';
  const { vertices, indices } = mesh;

  if (indices.length % 3 !== 0) {
    throw new ScanFormatError(`Index count ${indices.length} is not a multiple of 3`);
  }
  const triangleCount = indices.length / 3;
  const bufferSize = HEADER_SIZE + COUNT_SIZE + STL_TRIANGLE_SIZE * triangleCount;

  const buffer = new ArrayBuffer(bufferSize);
  const view = new DataView(buffer);

  const header = new TextEncoder().encode(name);
  for (let i = 0; i < HEADER_SIZE; i++) {
    view.setUint8(i, i < header.length ? header[i] : 0);
  }

  view.setUint32(HEADER_SIZE, triangleCount, true);

  let offset = HEADER_SIZE + COUNT_SIZE;
  const vertexAt = (idx: number): THREE.Vector3 => {
    if (idx < 0 || idx * 3 + 2 >= vertices.length) {
      throw new ScanFormatError(`Vertex index ${idx} out of bounds 0 .. ${vertices.length / 3}`);
    }
    return new THREE.Vector3(vertices[idx * 3], vertices[idx * 3 + 1], vertices[idx * 3 + 2]);
  };

  for (let i = 0; i < indices.length; i += 3) {
    const v1 = vertexAt(indices[i]);
    const v2 = vertexAt(indices[i + 1]);
    const v3 = vertexAt(indices[i + 2]);

    const normal = new THREE.Vector3()
      .crossVectors(new THREE.Vector3().subVectors(v2, v1), new THREE.Vector3().subVectors(v3, v1))
      .normalize();

    for (const value of [normal.x, normal.y, normal.z]) {
      view.setFloat32(offset, value, true);
      offset += 4;
    }

    for (const v of [v1, v2, v3]) {
      view.setFloat32(offset, v.x * scale, true);
      view.setFloat32(offset + 4, v.y * scale, true);
      view.setFloat32(offset + 8, v.z * scale, true);
      offset += 12;
    }

    // Attribute byte count (unused)
    view.setUint16(offset, 0, true);
    offset += 2;
  }

  return buffer;
}

export const StlFormat: ScanDataFormat = {
  extension: '.stl',
  description: 'STL file',
  dialogFilter: dialogFilter('STL file', '.stl'),
  async write(path: string, data: ScanData): Promise<void> {
    if (!data.mesh) {
      throw new ScanFormatError('STL export requires a mesh', path);
    }
    await writeFile(path, new Uint8Array(exportToSTL(data.mesh)));
  },
};
