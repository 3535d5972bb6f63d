import type { Coord } from './types';

/** Straight-line distance between two planar points, in km. */
export function euclideanKm(a: Coord, b: Coord): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

export function travelMinutes(distanceKm: number, speedKmh: number): number {
  if (speedKmh <= 0) {
    throw new Error(`Speed must be greater than 0 km/h: ${speedKmh}`);
  }
  return (distanceKm / speedKmh) * 60;
}

/** Distance and drive minutes for a single leg. */
export function legMetrics(
  from: Coord,
  to: Coord,
  speedKmh: number,
): { distanceKm: number; driveMin: number } {
  const distanceKm = euclideanKm(from, to);
  return { distanceKm, driveMin: travelMinutes(distanceKm, speedKmh) };
}

export function roundTo(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}
