import { validateConfig } from './config';
import { roundTo } from './distance';
import { DayLimitError, UnservableCustomersError } from './errors';
import { findUnservable } from './infeasibility';
import { CustomerLedger } from './ledger';
import type { RejectionReason } from './routing';
import { planDay } from './schedule';
import type {
  Customer,
  DayPlan,
  FleetConfig,
  ID,
  SchedulePlan,
  ScheduleTotals,
} from './types';

export interface ProgressSnapshot {
  servedToday: number;
  servedTotal: number;
  remaining: number;
  distanceKm: number;
}

export type ProgressFn = (day: number, snapshot: ProgressSnapshot) => void;

export interface PlanOptions {
  verbose?: boolean;
  progress?: ProgressFn;
  /** Reject structurally unservable customers before the first day. */
  preflight?: boolean;
}

function summarize(days: DayPlan[], customers: number): ScheduleTotals {
  let distanceKm = 0;
  let timeMin = 0;
  let reloads = 0;
  let overtimeMin = 0;
  for (const d of days) {
    for (const m of d.metrics) {
      distanceKm += m.distanceKm;
      timeMin += m.timeMin;
      reloads += m.reloads;
      overtimeMin += m.overtimeMin;
    }
  }
  return {
    days: days.length,
    customers,
    distanceKm: roundTo(distanceKm, 2),
    timeMin: roundTo(timeMin, 1),
    reloads,
    overtimeMin: roundTo(overtimeMin, 1),
  };
}

/**
 * Schedule operating days until every customer is served. Throws
 * {@link DayLimitError} when the day ceiling is reached first.
 */
export function planSchedule(
  customers: readonly Customer[],
  config: FleetConfig,
  opts: PlanOptions = {},
): SchedulePlan {
  validateConfig(config);
  if (opts.preflight ?? true) {
    const unservable = findUnservable(customers, config);
    if (unservable.length > 0) {
      throw new UnservableCustomersError(unservable);
    }
  }

  const ledger = new CustomerLedger(customers, config.tieBreak);
  const exclusionLog = new Map<ID, RejectionReason>();
  const ctx = { config, verbose: opts.verbose, exclusionLog };
  const days: DayPlan[] = [];
  let day = 1;
  while (!ledger.allServed()) {
    if (day > config.maxDays) {
      const unservedIds = ledger.unserved().map((c) => c.id);
      const rejections = new Map<ID, RejectionReason['type']>();
      for (const id of unservedIds) {
        const reason = exclusionLog.get(id);
        if (reason) rejections.set(id, reason.type);
      }
      throw new DayLimitError(config.maxDays, unservedIds, rejections);
    }
    const plan = planDay(day, ledger, ctx);
    days.push(plan);
    opts.progress?.(day, {
      servedToday: plan.deliveries.length,
      servedTotal: ledger.servedCount,
      remaining: ledger.unservedCount,
      distanceKm: roundTo(
        plan.metrics.reduce((sum, m) => sum + m.distanceKm, 0),
        2,
      ),
    });
    day += 1;
  }

  const byDayVehicleArrival = (
    a: { day: number; vehicle: number },
    b: { day: number; vehicle: number },
  ): number => a.day - b.day || a.vehicle - b.vehicle;
  const deliveries = days
    .flatMap((d) => d.deliveries)
    .sort((a, b) => byDayVehicleArrival(a, b) || a.arrivalMin - b.arrivalMin);
  const metrics = days.flatMap((d) => d.metrics).sort(byDayVehicleArrival);

  return {
    days,
    deliveries,
    metrics,
    totals: summarize(days, customers.length),
  };
}
