import { resolveConfig } from '../config';
import { emitSchedule, type EmitResult } from '../io/emit';
import { loadPlan } from '../io/parse';
import { planSchedule, type ProgressFn } from '../planner';
import type { Customer, FleetConfig, SchedulePlan } from '../types';

export interface SolveScheduleOptions {
  planPath: string;
  customersCsvPath?: string;
  /** Overrides for the plan document's config */
  overrides?: Partial<FleetConfig>;
  verbose?: boolean;
  progress?: ProgressFn;
  markdown?: boolean;
}

export interface SolveScheduleResult extends EmitResult {
  plan: SchedulePlan;
  config: FleetConfig;
  customers: Customer[];
}

export function solveSchedule(opts: SolveScheduleOptions): SolveScheduleResult {
  const input = loadPlan(opts.planPath, opts.customersCsvPath);
  const { runId, runNote, ...fileConfig } = input.config;
  const config = resolveConfig(opts.overrides, fileConfig);

  const plan = planSchedule(input.customers, config, {
    verbose: opts.verbose,
    progress: opts.progress,
  });

  const runTimestamp = new Date().toISOString();
  const emit = emitSchedule(plan, runTimestamp, {
    runId,
    runNote,
    config,
    markdown: opts.markdown,
  });
  const t = plan.totals;
  console.log(
    [
      `days=${t.days}`,
      `customers=${t.customers}`,
      `distance=${t.distanceKm.toFixed(2)} km`,
      `time=${t.timeMin.toFixed(1)} min`,
      `reloads=${t.reloads}`,
      `overtime=${t.overtimeMin.toFixed(1)} min`,
    ].join(' | '),
  );
  return { ...emit, plan, config, customers: input.customers };
}
