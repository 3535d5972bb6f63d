import { DEPOT_ID } from '../types';
import type { Coord, Customer, DayPlan, ID } from '../types';

export interface EmitSvgOptions {
  width?: number;
  height?: number;
  margin?: number;
}

const PALETTE = [
  '#1f77b4',
  '#ff7f0e',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#7f7f7f',
  '#bcbd22',
  '#17becf',
];

function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

const fmt = (n: number): string => String(Math.round(n * 100) / 100);

/** Plot every vehicle-day route in x/y km, with the depot as a square. */
export function emitSvg(
  days: readonly DayPlan[],
  customers: readonly Customer[],
  depot: Coord,
  opts: EmitSvgOptions = {},
): string {
  const width = opts.width ?? 800;
  const height = opts.height ?? 600;
  const margin = opts.margin ?? 40;

  const coords = new Map<ID, Coord>([[DEPOT_ID, depot]]);
  for (const c of customers) coords.set(c.id, c.coord);

  const xs = [...coords.values()].map((c) => c[0]);
  const ys = [...coords.values()].map((c) => c[1]);
  const minX = Math.min(...xs);
  const maxX = Math.max(...xs);
  const minY = Math.min(...ys);
  const maxY = Math.max(...ys);
  const scale = Math.min(
    (width - 2 * margin) / Math.max(maxX - minX, 1e-9),
    (height - 2 * margin) / Math.max(maxY - minY, 1e-9),
  );
  const px = (c: Coord): [number, number] => [
    margin + (c[0] - minX) * scale,
    height - margin - (c[1] - minY) * scale,
  ];

  const routes: string[] = [];
  let colorIdx = 0;
  for (const day of days) {
    for (const v of day.vehicles) {
      if (v.route.length < 2) continue;
      const color = PALETTE[colorIdx % PALETTE.length];
      colorIdx += 1;
      const points = v.route
        .map((id) => coords.get(id))
        .filter((c): c is Coord => c !== undefined)
        .map((c) => px(c).map(fmt).join(','))
        .join(' ');
      routes.push(
        `<polyline fill="none" stroke="${color}" stroke-width="2" points="${points}"><title>Day ${day.day} vehicle ${v.vehicle}</title></polyline>`,
      );
    }
  }

  const markers = customers.map((c) => {
    const [x, y] = px(c.coord);
    return `<circle cx="${fmt(x)}" cy="${fmt(y)}" r="3" fill="#333"><title>${escapeXml(
      c.name ?? c.id,
    )}</title></circle>`;
  });
  const [dx, dy] = px(depot);
  const depotMarker = `<rect x="${fmt(dx - 6)}" y="${fmt(dy - 6)}" width="12" height="12" fill="#000"><title>Depot</title></rect>`;

  const doc = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    ...routes,
    ...markers,
    depotMarker,
    '</svg>',
  ];
  return doc.join('\n');
}

export default emitSvg;
