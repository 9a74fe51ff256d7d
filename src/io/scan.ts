/**
 * Native `.scan` format: JSON holding the scan lines and the optional mesh.
 * Each point is stored as `[x, y, z, nx, ny, nz, r, g, b]` with color channels in 0..1.
 */
import * as THREE from 'three';
import { readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import { ScanData, type ScanLine } from '../types';
import { ScanFormatError } from '../errors';
import { dialogFilter, type ScanDataFormat } from './format';

export const SCAN_FORMAT_VERSION = 1;

const PointSchema = z.array(z.number()).length(9);

const LineSchema = z.object({
  laserId: z.number().int().nonnegative(),
  points: z.array(PointSchema),
});

const MeshSchema = z.object({
  vertices: z.array(z.number()),
  indices: z.array(z.number().int().nonnegative()),
  faceColors: z.array(z.number()).optional(),
});

export const ScanFileSchema = z.object({
  version: z.literal(SCAN_FORMAT_VERSION),
  lines: z.array(LineSchema),
  mesh: MeshSchema.nullable().default(null),
});

export type ScanFile = z.infer<typeof ScanFileSchema>;

export function encodeScan(data: ScanData): string {
  const file: ScanFile = {
    version: SCAN_FORMAT_VERSION,
    lines: data.lines.map((line) => ({
      laserId: line.laserId,
      points: line.points.map(({ position: p, normal: n, color: c }) => [
        p.x,
        p.y,
        p.z,
        n.x,
        n.y,
        n.z,
        c.r,
        c.g,
        c.b,
      ]),
    })),
    mesh: data.mesh,
  };
  return JSON.stringify(file);
}

export function decodeScan(text: string, path?: string): ScanData {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ScanFormatError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`, path);
  }

  const parsed = ScanFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ScanFormatError(`Invalid scan file at ${issue.path.join('.') || '<root>'}: ${issue.message}`, path);
  }

  const lines: ScanLine[] = parsed.data.lines.map((line) => ({
    laserId: line.laserId,
    points: line.points.map(([x, y, z, nx, ny, nz, r, g, b]) => ({
      position: new THREE.Vector3(x, y, z),
      normal: new THREE.Vector3(nx, ny, nz),
      color: new THREE.Color(r, g, b),
    })),
  }));
  return new ScanData(lines, parsed.data.mesh);
}

export async function readScan(path: string): Promise<ScanData> {
  return decodeScan(await readFile(path, 'utf-8'), path);
}

export const ScanFormat: ScanDataFormat = {
  extension: '.scan',
  description: 'Scan data',
  dialogFilter: dialogFilter('Scan data', '.scan'),
  async write(path: string, data: ScanData): Promise<void> {
    await writeFile(path, encodeScan(data), 'utf-8');
  },
  read: readScan,
};
