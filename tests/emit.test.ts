import { describe, it, expect } from 'vitest';
import { DOMParser } from '@xmldom/xmldom';
import { resolveConfig } from '../src/config';
import { emitSchedule } from '../src/io/emit';
import { emitDeliveriesCsv, emitMetricsCsv } from '../src/io/emitCsv';
import { emitHtml } from '../src/io/emitHtml';
import { emitSvg } from '../src/io/emitSvg';
import { planSchedule } from '../src/planner';
import type { Customer } from '../src/types';

const customers: Customer[] = [
  { id: 'A', name: 'Alpha', coord: [0, 10], weightKg: 10 },
  { id: 'B', coord: [0, 20], weightKg: 10 },
];
const config = resolveConfig({ fleetSize: 1, dayStart: '08:00' });
const plan = planSchedule(customers, config);
const runTs = '2024-01-01T00:00:00Z';

describe('emitSchedule', () => {
  it('serializes totals, records and routes', () => {
    const result = emitSchedule(plan, runTs, { runId: 'RID', runNote: 'RN', config });
    const data = JSON.parse(result.json);
    expect(data.runTimestamp).toBe(runTs);
    expect(data.runId).toBe('RID');
    expect(data.runNote).toBe('RN');
    expect(data.config.capacityKg).toBe(15);
    expect(data.totals).toEqual({
      days: 1,
      customers: 2,
      distanceKm: 60,
      timeMin: 100,
      reloads: 1,
      overtimeMin: 0,
    });
    expect(data.deliveries).toHaveLength(2);
    expect(data.days[0].vehicles[0].legs.map((l: { kind: string }) => l.kind)).toEqual([
      'delivery',
      'reload',
      'delivery',
      'return',
    ]);
    expect(result.runId).toBe('RID');
    expect(result.markdown).toBeUndefined();
  });

  it('adds a Markdown summary on request', () => {
    const { markdown } = emitSchedule(plan, runTs, { markdown: true });
    const lines = (markdown ?? '').split('\n');
    expect(lines[0]).toBe('# Delivery Schedule Summary');
    expect(lines[2]).toBe('2 customers served in 1 day(s); 60.00 km, 100.0 min, 1 reload(s).');
    expect(lines).toContain('| 1 | 1 | 2 | 1 | 20 | 60.00 | 100.0 | 0.0 |');
    expect(lines).not.toContain('## Workday Overruns');
  });
});

describe('emitCsv', () => {
  it('writes one delivery row per customer with clock times', () => {
    const names = new Map([['A', 'Alpha']]);
    const csv = emitDeliveriesCsv(plan.deliveries, runTs, { dayStart: '08:00', names });
    expect(csv.split('\n')).toEqual([
      'run_timestamp,day,vehicle,customer_id,customer_name,arrival_min,departure_min,arrive,depart,leg_distance_km',
      `${runTs},1,1,A,Alpha,10,20,08:10,08:20,10`,
      `${runTs},1,1,B,,70,80,09:10,09:20,20`,
    ]);
  });

  it('quotes values containing commas', () => {
    const names = new Map([['A', 'Alpha, Inc.']]);
    const csv = emitDeliveriesCsv(plan.deliveries.slice(0, 1), runTs, { names });
    expect(csv.split('\n')[1]).toBe(`${runTs},1,1,A,"Alpha, Inc.",10,20,00:10,00:20,10`);
  });

  it('writes one metric row per vehicle-day', () => {
    const csv = emitMetricsCsv(plan.metrics, runTs);
    expect(csv.split('\n')).toEqual([
      'run_timestamp,day,vehicle,distance_km,time_min,deliveries,reloads,load_kg,overtime_min',
      `${runTs},1,1,60,100,2,1,20,0`,
    ]);
  });
});

describe('emitSvg', () => {
  it('draws each route with customer and depot markers', () => {
    const svg = emitSvg(plan.days, customers, config.depot);
    const doc = new DOMParser().parseFromString(svg, 'image/svg+xml');
    const lines = doc.getElementsByTagName('polyline');
    expect(lines.length).toBe(1);
    expect(lines[0].getAttribute('points')).toBe('40,560 40,300 40,560 40,40 40,560');
    expect(doc.getElementsByTagName('circle').length).toBe(2);
    expect(doc.getElementsByTagName('rect').length).toBe(1);
  });

  it('skips vehicles that never left the depot', () => {
    const twoVehicles = planSchedule(customers, resolveConfig({ fleetSize: 2 }));
    const svg = emitSvg(twoVehicles.days, customers, config.depot);
    const doc = new DOMParser().parseFromString(svg, 'image/svg+xml');
    expect(doc.getElementsByTagName('polyline').length).toBe(1);
  });
});

describe('emitHtml', () => {
  it('renders the metric and delivery tables', () => {
    const html = emitHtml(plan, runTs, { dayStart: '08:00', customers, runNote: 'RN' });
    expect(html).toContain(
      '<tr><td>1</td><td>1</td><td>2</td><td>1</td><td>60.00</td><td>100.0</td></tr>',
    );
    expect(html).toContain(
      '<tr><td>1</td><td>1</td><td>Alpha</td><td>08:10</td><td>08:20</td><td>10.00</td></tr>',
    );
    expect(html).toContain('<p class="note">RN</p>');
    expect(html).not.toContain('<h2>Routes</h2>');
  });

  it('inlines the route plot unescaped', () => {
    const svg = emitSvg(plan.days, customers, config.depot);
    const html = emitHtml(plan, runTs, { svg });
    expect(html).toContain('<h2>Routes</h2>');
    expect(html).toContain('<svg xmlns="http://www.w3.org/2000/svg"');
  });

  it('accepts a custom template', () => {
    const html = emitHtml(plan, runTs, {
      template: '{{#deliveries}}{{customer}};{{/deliveries}}',
      partials: {},
    });
    expect(html).toBe('A;B;');
  });
});
