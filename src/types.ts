import * as THREE from 'three';

export interface SerializedMesh {
  vertices: number[]; // Flat array of vertex positions [x,y,z, x,y,z, ...]
  indices: number[]; // Triangle indices
  faceColors?: number[]; // Optional face colors [r,g,b per face]
}

export interface ScanPoint {
  position: THREE.Vector3;
  normal: THREE.Vector3;
  color: THREE.Color;
}

/** Points captured by one laser during a single turntable step. */
export interface ScanLine {
  laserId: number;
  points: ScanPoint[];
}

/**
 * Payload passed between processing tasks: the raw scan lines and, once a
 * mesh has been built, the triangle mesh. Tasks hand it on by reference and
 * never keep it.
 */
export class ScanData {
  constructor(
    public lines: ScanLine[] = [],
    public mesh: SerializedMesh | null = null
  ) {}

  get pointCount(): number {
    return this.lines.reduce((sum, line) => sum + line.points.length, 0);
  }

  get isEmpty(): boolean {
    return this.pointCount === 0 && (this.mesh === null || this.mesh.indices.length === 0);
  }
}

export function scanPoint(
  x: number,
  y: number,
  z: number,
  normal: THREE.Vector3 = new THREE.Vector3(0, 0, 1),
  color: THREE.Color = new THREE.Color(1, 1, 1)
): ScanPoint {
  return { position: new THREE.Vector3(x, y, z), normal, color };
}
