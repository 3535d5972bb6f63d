import { describe, it, expect } from 'vitest';
import { generateCustomers, toPlanDocument } from '../src/io/generate';
import { parsePlan } from '../src/io/parse';

describe('generateCustomers', () => {
  it('is reproducible for a seed', () => {
    const a = generateCustomers({ count: 20, seed: 42 });
    const b = generateCustomers({ count: 20, seed: 42 });
    expect(a).toEqual(b);
  });

  it('differs between seeds', () => {
    const a = generateCustomers({ count: 20, seed: 1 });
    const b = generateCustomers({ count: 20, seed: 2 });
    expect(a).not.toEqual(b);
  });

  it('stays inside the extent and weight range', () => {
    const customers = generateCustomers({
      count: 100,
      seed: 3,
      extentKm: 10,
      minWeightKg: 2,
      maxWeightKg: 5,
      depot: [100, 100],
    });
    expect(customers.map((c) => c.id).slice(0, 3)).toEqual(['1', '2', '3']);
    for (const c of customers) {
      expect(Math.abs(c.coord[0] - 100)).toBeLessThanOrEqual(10);
      expect(Math.abs(c.coord[1] - 100)).toBeLessThanOrEqual(10);
      expect(Number.isInteger(c.weightKg)).toBe(true);
      expect(c.weightKg).toBeGreaterThanOrEqual(2);
      expect(c.weightKg).toBeLessThanOrEqual(5);
    }
  });

  it('rejects an empty weight range', () => {
    expect(() => generateCustomers({ count: 1, minWeightKg: 5, maxWeightKg: 4 })).toThrow(
      'invalid weight range: 5..4',
    );
  });

  it('produces documents the parser accepts', () => {
    const customers = generateCustomers({ count: 5, seed: 9 });
    const parsed = parsePlan(toPlanDocument(customers));
    expect(parsed.customers).toEqual(customers);
  });
});
