import type { FleetConfig, SchedulePlan } from '../types';

export interface EmitOptions {
  /** include Markdown summary */
  markdown?: boolean;
  runId?: string;
  runNote?: string;
  config?: FleetConfig;
}

export interface EmitResult {
  json: string;
  runTimestamp: string;
  runId?: string;
  runNote?: string;
  markdown?: string;
}

function toMarkdown(plan: SchedulePlan): string {
  const t = plan.totals;
  const lines: string[] = [
    '# Delivery Schedule Summary',
    '',
    `${t.customers} customers served in ${t.days} day(s); ${t.distanceKm.toFixed(
      2,
    )} km, ${t.timeMin.toFixed(1)} min, ${t.reloads} reload(s).`,
    '',
    '| Day | Vehicle | Deliveries | Reloads | Load (kg) | Distance (km) | Time (min) | Overtime (min) |',
    '| ---:| -------:| ----------:| -------:| ---------:| -------------:| ----------:| --------------:|',
  ];
  for (const m of plan.metrics) {
    lines.push(
      `| ${m.day} | ${m.vehicle} | ${m.deliveries} | ${m.reloads} | ${m.loadKg} | ${m.distanceKm.toFixed(
        2,
      )} | ${m.timeMin.toFixed(1)} | ${m.overtimeMin.toFixed(1)} |`,
    );
  }
  lines.push('');

  const overtime = plan.metrics.filter((m) => m.limitViolations?.length);
  if (overtime.length > 0) {
    lines.push('## Workday Overruns', '');
    for (const m of overtime) {
      lines.push(
        `- **Day ${m.day}, vehicle ${m.vehicle}** – ${m.overtimeMin.toFixed(1)} min past the workday`,
      );
    }
    lines.push('');
  }
  return lines.join('\n');
}

/** Serialize a schedule to JSON and optional Markdown summary. */
export function emitSchedule(
  plan: SchedulePlan,
  runTimestamp = new Date().toISOString(),
  opts: EmitOptions = {},
): EmitResult {
  const json = JSON.stringify(
    {
      runTimestamp,
      runId: opts.runId,
      runNote: opts.runNote,
      config: opts.config,
      totals: plan.totals,
      deliveries: plan.deliveries,
      metrics: plan.metrics,
      days: plan.days.map((d) => ({ day: d.day, vehicles: d.vehicles })),
    },
    null,
    2,
  );
  const result: EmitResult = { json, runTimestamp };
  if (opts.runId) result.runId = opts.runId;
  if (opts.runNote) result.runNote = opts.runNote;
  if (opts.markdown) {
    result.markdown = toMarkdown(plan);
  }
  return result;
}

