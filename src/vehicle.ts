import { legMetrics } from './distance';
import { DEPOT_ID } from './types';
import type { Coord, Customer, ID, Leg, VehicleRoute } from './types';

export interface VehicleState {
  slot: number;
  route: ID[];
  legs: Leg[];
  locationId: ID;
  location: Coord;
  loadKg: number;
  deliveredKg: number;
  elapsedMin: number;
  distanceKm: number;
  deliveries: number;
  reloads: number;
}

export interface MoveParams {
  depot: Coord;
  speedKmh: number;
}

export function createVehicle(slot: number, depot: Coord): VehicleState {
  return {
    slot,
    route: [DEPOT_ID],
    legs: [],
    locationId: DEPOT_ID,
    location: depot,
    loadKg: 0,
    deliveredKg: 0,
    elapsedMin: 0,
    distanceKm: 0,
    deliveries: 0,
    reloads: 0,
  };
}

export function isAtDepot(vehicle: VehicleState): boolean {
  return vehicle.locationId === DEPOT_ID;
}

/** Drive to the customer and unload; returns arrival and departure minutes. */
export function commitDelivery(
  vehicle: VehicleState,
  customer: Customer,
  params: MoveParams & { dispatchMin: number; capacityKg: number },
): { arrivalMin: number; departureMin: number; leg: Leg } {
  if (vehicle.loadKg + customer.weightKg > params.capacityKg) {
    throw new Error(
      `Vehicle ${vehicle.slot} cannot take ${customer.id}: load ${vehicle.loadKg} + ${customer.weightKg} kg > ${params.capacityKg} kg`,
    );
  }
  const { distanceKm, driveMin } = legMetrics(
    vehicle.location,
    customer.coord,
    params.speedKmh,
  );
  const arrivalMin = vehicle.elapsedMin + driveMin;
  const departureMin = arrivalMin + params.dispatchMin;
  const leg: Leg = {
    fromId: vehicle.locationId,
    toId: customer.id,
    kind: 'delivery',
    distanceKm,
    driveMin,
  };
  vehicle.legs.push(leg);
  vehicle.route.push(customer.id);
  vehicle.loadKg += customer.weightKg;
  vehicle.deliveredKg += customer.weightKg;
  vehicle.elapsedMin = departureMin;
  vehicle.distanceKm += distanceKm;
  vehicle.locationId = customer.id;
  vehicle.location = customer.coord;
  vehicle.deliveries += 1;
  return { arrivalMin, departureMin, leg };
}

function driveToDepot(
  vehicle: VehicleState,
  params: MoveParams,
  kind: 'reload' | 'return',
  extraMin: number,
): Leg {
  const { distanceKm, driveMin } = legMetrics(
    vehicle.location,
    params.depot,
    params.speedKmh,
  );
  const leg: Leg = {
    fromId: vehicle.locationId,
    toId: DEPOT_ID,
    kind,
    distanceKm,
    driveMin,
  };
  vehicle.legs.push(leg);
  vehicle.route.push(DEPOT_ID);
  vehicle.elapsedMin += driveMin + extraMin;
  vehicle.distanceKm += distanceKm;
  vehicle.locationId = DEPOT_ID;
  vehicle.location = params.depot;
  return leg;
}

/** Mid-day depot visit that empties the vehicle. Not bounded by the workday. */
export function reloadAtDepot(
  vehicle: VehicleState,
  params: MoveParams & { reloadMin: number },
): Leg {
  const leg = driveToDepot(vehicle, params, 'reload', params.reloadMin);
  vehicle.loadKg = 0;
  vehicle.reloads += 1;
  return leg;
}

/** Day-end closure. Does nothing when the vehicle already sits at the depot. */
export function returnToDepot(
  vehicle: VehicleState,
  params: MoveParams,
): Leg | undefined {
  if (isAtDepot(vehicle)) return undefined;
  return driveToDepot(vehicle, params, 'return', 0);
}

export function toVehicleRoute(vehicle: VehicleState): VehicleRoute {
  return {
    vehicle: vehicle.slot,
    route: vehicle.route.slice(),
    legs: vehicle.legs.slice(),
  };
}
