import { clockAt } from '../time';
import type { DailyMetric, DeliveryRecord } from '../types';

export interface EmitCsvOptions {
  /** Day start used for the clock columns, "HH:mm" */
  dayStart?: string;
  /** Customer names by id */
  names?: ReadonlyMap<string, string>;
}

export function escapeCsv(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Serialize delivery records to CSV, one row per served customer. */
export function emitDeliveriesCsv(
  deliveries: readonly DeliveryRecord[],
  runTimestamp: string,
  opts: EmitCsvOptions = {},
): string {
  const dayStart = opts.dayStart ?? '00:00';
  const header = [
    'run_timestamp',
    'day',
    'vehicle',
    'customer_id',
    'customer_name',
    'arrival_min',
    'departure_min',
    'arrive',
    'depart',
    'leg_distance_km',
  ];
  const lines = [header.join(',')];
  for (const d of deliveries) {
    lines.push(
      [
        runTimestamp,
        String(d.day),
        String(d.vehicle),
        escapeCsv(d.customerId),
        escapeCsv(opts.names?.get(d.customerId) ?? ''),
        String(d.arrivalMin),
        String(d.departureMin),
        clockAt(dayStart, d.arrivalMin),
        clockAt(dayStart, d.departureMin),
        String(d.legDistanceKm),
      ].join(','),
    );
  }
  return lines.join('\n');
}

/** Serialize per-vehicle daily metrics to CSV. */
export function emitMetricsCsv(
  metrics: readonly DailyMetric[],
  runTimestamp: string,
): string {
  const header = [
    'run_timestamp',
    'day',
    'vehicle',
    'distance_km',
    'time_min',
    'deliveries',
    'reloads',
    'load_kg',
    'overtime_min',
  ];
  const lines = [header.join(',')];
  for (const m of metrics) {
    lines.push(
      [
        runTimestamp,
        m.day,
        m.vehicle,
        m.distanceKm,
        m.timeMin,
        m.deliveries,
        m.reloads,
        m.loadKg,
        m.overtimeMin,
      ]
        .map(String)
        .join(','),
    );
  }
  return lines.join('\n');
}
