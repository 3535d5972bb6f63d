import { legMetrics, roundTo } from './distance';
import type { CustomerLedger } from './ledger';
import { commitDelivery, reloadAtDepot, type VehicleState } from './vehicle';
import type { Customer, DeliveryRecord, FleetConfig, ID } from './types';

export type RejectionReason =
  | { type: 'capacity'; loadKg: number; weightKg: number; capacityKg: number }
  | { type: 'workday'; elapsedMin: number; costMin: number; workdayMin: number };

export interface RoutingCtx {
  config: FleetConfig;
  verbose?: boolean;
  /** Latest reason each customer was passed over, keyed by customer id. */
  exclusionLog?: Map<ID, RejectionReason>;
}

export interface CandidateEvaluation {
  customer: Customer;
  distanceKm: number;
  driveMin: number;
  /** Drive there, dispatch, and the hypothetical drive back to the depot. */
  costMin: number;
  rejected?: RejectionReason;
}

/** Score every unserved customer for the vehicle's next stop. */
export function evaluateCandidates(
  vehicle: VehicleState,
  ledger: CustomerLedger,
  ctx: RoutingCtx,
): CandidateEvaluation[] {
  const { capacityKg, speedKmh, dispatchMin, workdayMin, depot } = ctx.config;
  const out: CandidateEvaluation[] = [];
  for (const customer of ledger.unserved()) {
    if (vehicle.loadKg + customer.weightKg > capacityKg) {
      out.push({
        customer,
        distanceKm: NaN,
        driveMin: NaN,
        costMin: NaN,
        rejected: {
          type: 'capacity',
          loadKg: vehicle.loadKg,
          weightKg: customer.weightKg,
          capacityKg,
        },
      });
      continue;
    }
    const there = legMetrics(vehicle.location, customer.coord, speedKmh);
    const back = legMetrics(customer.coord, depot, speedKmh);
    const costMin = there.driveMin + dispatchMin + back.driveMin;
    const evaluation: CandidateEvaluation = {
      customer,
      distanceKm: there.distanceKm,
      driveMin: there.driveMin,
      costMin,
    };
    if (vehicle.elapsedMin + costMin > workdayMin) {
      evaluation.rejected = {
        type: 'workday',
        elapsedMin: vehicle.elapsedMin,
        costMin,
        workdayMin,
      };
    }
    out.push(evaluation);
  }
  return out;
}

/**
 * Pick the feasible candidate with strictly minimal cost; on ties the
 * first one in ledger iteration order wins. Returns null when nothing
 * fits in the vehicle or the remaining workday.
 */
export function selectCandidate(
  vehicle: VehicleState,
  ledger: CustomerLedger,
  ctx: RoutingCtx,
): CandidateEvaluation | null {
  const evaluations = evaluateCandidates(vehicle, ledger, ctx);
  let best: CandidateEvaluation | null = null;
  for (const e of evaluations) {
    if (e.rejected) continue;
    if (best === null || e.costMin < best.costMin) {
      best = e;
    }
  }
  if (best === null && ctx.exclusionLog) {
    for (const e of evaluations) {
      if (e.rejected) ctx.exclusionLog.set(e.customer.id, e.rejected);
    }
  }
  return best;
}

/**
 * Extend the vehicle's route one customer at a time, reloading at the
 * depot whenever the lightest unserved customer no longer fits, until no
 * feasible customer remains. Mutates both the vehicle and the ledger.
 */
export function buildRoute(
  vehicle: VehicleState,
  ledger: CustomerLedger,
  ctx: RoutingCtx,
  day: number,
): DeliveryRecord[] {
  const { config } = ctx;
  const records: DeliveryRecord[] = [];
  while (!ledger.allServed()) {
    const pick = selectCandidate(vehicle, ledger, ctx);
    if (!pick) break;

    const { customer } = pick;
    const { arrivalMin, departureMin, leg } = commitDelivery(vehicle, customer, config);
    ledger.markServed(customer.id, day, arrivalMin, departureMin);
    ctx.exclusionLog?.delete(customer.id);
    records.push({
      day,
      vehicle: vehicle.slot,
      customerId: customer.id,
      arrivalMin: roundTo(arrivalMin, 1),
      departureMin: roundTo(departureMin, 1),
      legDistanceKm: roundTo(leg.distanceKm, 2),
    });
    if (ctx.verbose) {
      console.log(
        `day ${day} vehicle ${vehicle.slot} serve ${customer.id} arrive ${arrivalMin.toFixed(
          1,
        )} load ${vehicle.loadKg}`,
      );
    }

    const lightest = ledger.minUnservedWeight();
    if (lightest !== undefined && vehicle.loadKg + lightest > config.capacityKg) {
      reloadAtDepot(vehicle, config);
      if (ctx.verbose) {
        console.log(
          `day ${day} vehicle ${vehicle.slot} reload at ${vehicle.elapsedMin.toFixed(1)}`,
        );
      }
    }
  }
  return records;
}
