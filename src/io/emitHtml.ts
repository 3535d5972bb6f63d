import { readFileSync } from 'node:fs';
import Mustache from 'mustache';
import { clockAt } from '../time';
import type { Customer, SchedulePlan } from '../types';

const defaultTemplate = readFileSync(
  new URL('./templates/report.mustache', import.meta.url),
  'utf8',
);
const defaultPartials = {
  metric: readFileSync(new URL('./templates/metric.mustache', import.meta.url), 'utf8'),
};

export interface EmitHtmlOptions {
  /** Override the base template */
  template?: string;
  /** Override or add partials */
  partials?: Record<string, string>;
  /** Inline SVG route plot */
  svg?: string;
  dayStart?: string;
  runNote?: string;
  customers?: readonly Customer[];
}

interface ViewModel {
  runTimestamp: string;
  runNote?: string;
  totals: {
    customers: number;
    days: number;
    distanceKm: string;
    timeMin: string;
    reloads: number;
  };
  metrics: {
    day: number;
    vehicle: number;
    deliveries: number;
    reloads: number;
    distanceKm: string;
    timeMin: string;
    overtime: boolean;
  }[];
  deliveries: {
    day: number;
    vehicle: number;
    customer: string;
    arrive: string;
    depart: string;
    legDistanceKm: string;
  }[];
  svg?: string;
}

export function emitHtml(
  plan: SchedulePlan,
  runTimestamp: string,
  opts: EmitHtmlOptions = {},
): string {
  const dayStart = opts.dayStart ?? '00:00';
  const names = new Map<string, string>();
  for (const c of opts.customers ?? []) {
    if (c.name) names.set(c.id, c.name);
  }
  const view: ViewModel = {
    runTimestamp,
    runNote: opts.runNote,
    totals: {
      customers: plan.totals.customers,
      days: plan.totals.days,
      distanceKm: plan.totals.distanceKm.toFixed(2),
      timeMin: plan.totals.timeMin.toFixed(1),
      reloads: plan.totals.reloads,
    },
    metrics: plan.metrics.map((m) => ({
      day: m.day,
      vehicle: m.vehicle,
      deliveries: m.deliveries,
      reloads: m.reloads,
      distanceKm: m.distanceKm.toFixed(2),
      timeMin: m.timeMin.toFixed(1),
      overtime: m.overtimeMin > 0,
    })),
    deliveries: plan.deliveries.map((d) => ({
      day: d.day,
      vehicle: d.vehicle,
      customer: names.get(d.customerId) ?? d.customerId,
      arrive: clockAt(dayStart, d.arrivalMin),
      depart: clockAt(dayStart, d.departureMin),
      legDistanceKm: d.legDistanceKm.toFixed(2),
    })),
    svg: opts.svg,
  };
  const template = opts.template ?? defaultTemplate;
  const partials = opts.partials ?? defaultPartials;
  return Mustache.render(template, view, partials);
}

export default emitHtml;
