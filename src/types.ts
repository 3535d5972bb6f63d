export type ID = string;

export const DEPOT_ID: ID = '__depot__';

/** Planar coordinates in km. */
export type Coord = readonly [number, number];

export interface Customer {
  id: ID;
  name?: string;
  coord: Coord;
  weightKg: number;
}

export type TieBreak = 'input' | 'id';

export interface FleetConfig {
  capacityKg: number;
  speedKmh: number;
  dispatchMin: number;
  reloadMin: number;
  workdayMin: number;
  fleetSize: number;
  maxDays: number;
  tieBreak: TieBreak;
  depot: Coord;
  dayStart: string; // "HH:mm"
}

export type LegKind = 'delivery' | 'reload' | 'return';

export interface Leg {
  fromId: ID;
  toId: ID;
  kind: LegKind;
  distanceKm: number;
  driveMin: number;
}

export interface DeliveryRecord {
  day: number;
  vehicle: number;
  customerId: ID;
  arrivalMin: number;
  departureMin: number;
  legDistanceKm: number;
}

export interface DailyMetric {
  day: number;
  vehicle: number;
  distanceKm: number;
  timeMin: number;
  deliveries: number;
  reloads: number;
  loadKg: number;
  overtimeMin: number;
  limitViolations?: string[];
}

export interface VehicleRoute {
  vehicle: number;
  route: ID[];
  legs: Leg[];
}

export interface DayPlan {
  day: number;
  vehicles: VehicleRoute[];
  deliveries: DeliveryRecord[];
  metrics: DailyMetric[];
}

export interface ScheduleTotals {
  days: number;
  customers: number;
  distanceKm: number;
  timeMin: number;
  reloads: number;
  overtimeMin: number;
}

export interface SchedulePlan {
  days: DayPlan[];
  deliveries: DeliveryRecord[];
  metrics: DailyMetric[];
  totals: ScheduleTotals;
}

export interface PlanInput {
  config: Partial<FleetConfig> & { runId?: string; runNote?: string };
  customers: Customer[];
}
