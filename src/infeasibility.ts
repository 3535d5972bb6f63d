import { euclideanKm, travelMinutes } from './distance';
import type { UnservableCustomer } from './errors';
import type { Customer, FleetConfig } from './types';

/**
 * Customers that no vehicle can serve on any day: heavier than a full
 * vehicle, or too far for a fresh vehicle to reach, dispatch and return
 * within one workday.
 */
export function findUnservable(
  customers: readonly Customer[],
  config: FleetConfig,
): UnservableCustomer[] {
  const out: UnservableCustomer[] = [];
  for (const c of customers) {
    if (c.weightKg > config.capacityKg) {
      out.push({
        customerId: c.id,
        reason: 'overCapacity',
        weightKg: c.weightKg,
        capacityKg: config.capacityKg,
      });
      continue;
    }
    const oneWay = travelMinutes(euclideanKm(config.depot, c.coord), config.speedKmh);
    const roundTripMin = 2 * oneWay + config.dispatchMin;
    if (roundTripMin > config.workdayMin) {
      out.push({
        customerId: c.id,
        reason: 'beyondWorkday',
        roundTripMin,
        workdayMin: config.workdayMin,
      });
    }
  }
  return out;
}
