import * as THREE from 'three';
import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ScanData, scanPoint, type SerializedMesh } from './types';
import type { FileDialog } from './dialogs/file-dialog';

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), 'scan-tasks-'));
}

/** One line per entry, each point given as [x, y, z]. */
export function makeScan(lines: Array<Array<[number, number, number]>>, mesh: SerializedMesh | null = null): ScanData {
  return new ScanData(
    lines.map((points, laserId) => ({
      laserId,
      points: points.map(([x, y, z]) => scanPoint(x, y, z, new THREE.Vector3(0, 0, 1), new THREE.Color(1, 0.5, 0))),
    })),
    mesh
  );
}

export const TRIANGLE: SerializedMesh = {
  vertices: [0, 0, 0, 1, 0, 0, 0, 1, 0],
  indices: [0, 1, 2],
};

/** Dialog answering every prompt with `answer`. */
export function fixedDialog(answer: string | null): FileDialog & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    async showSaveDialog(options) {
      prompts.push(`save ${options.filter}`);
      return answer;
    },
    async showOpenDialog(options) {
      prompts.push(`open ${options.filter}`);
      return answer;
    },
  };
}
