import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../src/config';
import { CustomerLedger } from '../src/ledger';
import { planDay } from '../src/schedule';
import { DEPOT_ID } from '../src/types';
import type { Customer, FleetConfig } from '../src/types';
import type { RoutingCtx } from '../src/routing';

function buildCtx(overrides: Partial<FleetConfig> = {}): RoutingCtx {
  return {
    config: resolveConfig(overrides, {
      capacityKg: 15,
      speedKmh: 60,
      dispatchMin: 10,
      reloadMin: 20,
      workdayMin: 420,
      fleetSize: 1,
    }),
  };
}

const A: Customer = { id: 'A', coord: [0, 10], weightKg: 10 };
const B: Customer = { id: 'B', coord: [0, 20], weightKg: 10 };

describe('planDay', () => {
  it('routes one vehicle through a reload and back to the depot', () => {
    const ctx = buildCtx();
    const ledger = new CustomerLedger([A, B]);
    const plan = planDay(1, ledger, ctx);
    expect(plan.vehicles).toHaveLength(1);
    expect(plan.vehicles[0].route).toEqual([DEPOT_ID, 'A', DEPOT_ID, 'B', DEPOT_ID]);
    expect(plan.deliveries.map((d) => d.customerId)).toEqual(['A', 'B']);
    expect(plan.metrics).toEqual([
      {
        day: 1,
        vehicle: 1,
        distanceKm: 60,
        timeMin: 100,
        deliveries: 2,
        reloads: 1,
        loadKg: 20,
        overtimeMin: 0,
      },
    ]);
  });

  it('lets the next vehicle pick up what the first could not reach in time', () => {
    const ctx = buildCtx({ workdayMin: 60, fleetSize: 2 });
    const ledger = new CustomerLedger([A, B]);
    const plan = planDay(1, ledger, ctx);
    expect(plan.vehicles.map((v) => v.route)).toEqual([
      [DEPOT_ID, 'A', DEPOT_ID],
      [DEPOT_ID, 'B', DEPOT_ID],
    ]);
    expect(plan.deliveries).toEqual([
      { day: 1, vehicle: 1, customerId: 'A', arrivalMin: 10, departureMin: 20, legDistanceKm: 10 },
      { day: 1, vehicle: 2, customerId: 'B', arrivalMin: 20, departureMin: 30, legDistanceKm: 20 },
    ]);
    expect(plan.metrics.map((m) => [m.vehicle, m.distanceKm, m.timeMin])).toEqual([
      [1, 20, 50],
      [2, 40, 50],
    ]);
  });

  it('reports idle vehicles with zero metrics', () => {
    const ctx = buildCtx({ fleetSize: 3 });
    const ledger = new CustomerLedger([A]);
    const plan = planDay(1, ledger, ctx);
    expect(plan.vehicles[2].route).toEqual([DEPOT_ID]);
    expect(plan.metrics[2]).toEqual({
      day: 1,
      vehicle: 3,
      distanceKm: 0,
      timeMin: 0,
      deliveries: 0,
      reloads: 0,
      loadKg: 0,
      overtimeMin: 0,
    });
  });

  it('flags overtime caused by an unconditional reload', () => {
    const ctx = buildCtx({ workdayMin: 30 });
    const near: Customer = { id: 'N', coord: [0, 5], weightKg: 10 };
    const ledger = new CustomerLedger([A, near]);
    const plan = planDay(1, ledger, ctx);
    expect(plan.metrics[0]).toEqual({
      day: 1,
      vehicle: 1,
      distanceKm: 10,
      timeMin: 40,
      deliveries: 1,
      reloads: 1,
      loadKg: 10,
      overtimeMin: 10,
      limitViolations: ['workday'],
    });
  });
});
