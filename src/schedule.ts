import { roundTo } from './distance';
import type { CustomerLedger } from './ledger';
import { buildRoute, type RoutingCtx } from './routing';
import {
  createVehicle,
  returnToDepot,
  toVehicleRoute,
  type VehicleState,
} from './vehicle';
import type { DailyMetric, DayPlan, DeliveryRecord, VehicleRoute } from './types';

function dailyMetric(day: number, vehicle: VehicleState, workdayMin: number): DailyMetric {
  const overtimeMin = Math.max(0, vehicle.elapsedMin - workdayMin);
  const metric: DailyMetric = {
    day,
    vehicle: vehicle.slot,
    distanceKm: roundTo(vehicle.distanceKm, 2),
    timeMin: roundTo(vehicle.elapsedMin, 1),
    deliveries: vehicle.deliveries,
    reloads: vehicle.reloads,
    loadKg: vehicle.deliveredKg,
    overtimeMin: roundTo(overtimeMin, 1),
  };
  if (overtimeMin > 1e-9) {
    metric.limitViolations = ['workday'];
  }
  return metric;
}

/**
 * Run one operating day: a fresh fleet, each vehicle in slot order routed
 * to exhaustion against the shared ledger, then closed at the depot.
 */
export function planDay(day: number, ledger: CustomerLedger, ctx: RoutingCtx): DayPlan {
  const { fleetSize, workdayMin } = ctx.config;
  const vehicles: VehicleRoute[] = [];
  const deliveries: DeliveryRecord[] = [];
  const metrics: DailyMetric[] = [];

  for (let slot = 1; slot <= fleetSize; slot++) {
    const vehicle = createVehicle(slot, ctx.config.depot);
    deliveries.push(...buildRoute(vehicle, ledger, ctx, day));
    returnToDepot(vehicle, ctx.config);
    vehicles.push(toVehicleRoute(vehicle));
    metrics.push(dailyMetric(day, vehicle, workdayMin));
  }

  return { day, vehicles, deliveries, metrics };
}
