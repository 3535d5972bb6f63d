import seedrandom from 'seedrandom';
import type { Coord, Customer } from '../types';

export interface GenerateOptions {
  count: number;
  seed?: number;
  /** Half-width of the square around the depot, in km */
  extentKm?: number;
  minWeightKg?: number;
  maxWeightKg?: number;
  depot?: Coord;
}

/**
 * Seeded synthetic customers spread uniformly around the depot, with
 * integer weights in [minWeightKg, maxWeightKg].
 */
export function generateCustomers(opts: GenerateOptions): Customer[] {
  const extent = opts.extentKm ?? 50;
  const minW = opts.minWeightKg ?? 1;
  const maxW = opts.maxWeightKg ?? 10;
  const [ox, oy] = opts.depot ?? [0, 0];
  if (!Number.isInteger(opts.count) || opts.count < 0) {
    throw new Error(`count must be a non-negative integer: ${opts.count}`);
  }
  if (!(extent > 0)) {
    throw new Error(`extentKm must be greater than 0: ${extent}`);
  }
  const lo = Math.ceil(minW);
  const hi = Math.floor(maxW);
  if (!(lo > 0) || hi < lo) {
    throw new Error(`invalid weight range: ${minW}..${maxW}`);
  }

  const rng = seedrandom(String(opts.seed ?? 0));
  const round2 = (n: number) => Math.round(n * 100) / 100;
  const customers: Customer[] = [];
  for (let i = 1; i <= opts.count; i++) {
    const x = round2(ox + (rng() * 2 - 1) * extent);
    const y = round2(oy + (rng() * 2 - 1) * extent);
    const weightKg = lo + Math.floor(rng() * (hi - lo + 1));
    customers.push({ id: String(i), coord: [x, y], weightKg });
  }
  return customers;
}

/** Plan document shape accepted by the parser. */
export function toPlanDocument(customers: readonly Customer[]): {
  customers: { id: string; name?: string; x: number; y: number; weight: number }[];
} {
  return {
    customers: customers.map((c) => ({
      id: c.id,
      ...(c.name ? { name: c.name } : {}),
      x: c.coord[0],
      y: c.coord[1],
      weight: c.weightKg,
    })),
  };
}
