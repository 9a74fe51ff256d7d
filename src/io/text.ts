import type { ScanPoint } from '../types';

/** Fixed precision without trailing zeros: 1 -> "1", 0.1234567 -> "0.123457" */
export function formatNumber(value: number): string {
  const rounded = Number(value.toFixed(6));
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

export function colorByte(channel: number): number {
  return Math.max(0, Math.min(255, Math.round(channel * 255)));
}

export function pointCoordinates(point: ScanPoint): string {
  const { x, y, z } = point.position;
  return `${formatNumber(x)} ${formatNumber(y)} ${formatNumber(z)}`;
}
