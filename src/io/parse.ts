import { readFileSync } from 'node:fs';
import Ajv, { type Schema } from 'ajv';
import { parse } from 'csv-parse/sync';
import { InputError } from '../errors';
import { DEPOT_ID } from '../types';
import type { Coord, Customer, PlanInput, TieBreak } from '../types';

export interface RawCustomer {
  id: string | number;
  name?: string;
  x: number;
  y: number;
  weight: number;
}

interface RawPlanDocument {
  config?: {
    capacityKg?: number;
    speedKmh?: number;
    dispatchMin?: number;
    reloadMin?: number;
    workdayMin?: number;
    fleetSize?: number;
    maxDays?: number;
    tieBreak?: TieBreak;
    depot?: [number, number];
    dayStart?: string;
    runId?: string;
    runNote?: string;
  };
  customers: RawCustomer[];
}

const planSchema: Schema = JSON.parse(
  readFileSync(new URL('./schemas/plan.schema.json', import.meta.url), 'utf8'),
);

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
const validatePlan = ajv.compile<RawPlanDocument>(planSchema);

type PlainObj = Record<string, unknown>;

function parseCustomer(raw: RawCustomer): Customer {
  const id = String(raw.id).trim();
  if (!id) {
    throw new InputError('Customer must have a non-empty id');
  }
  if (id === DEPOT_ID) {
    throw new InputError(`Customer id ${DEPOT_ID} is reserved for the depot`);
  }
  if (!Number.isFinite(raw.x) || !Number.isFinite(raw.y)) {
    throw new InputError(`Invalid coordinates for customer ${id}: ${raw.x},${raw.y}`);
  }
  if (!Number.isFinite(raw.weight) || raw.weight <= 0) {
    throw new InputError(`Invalid weight for customer ${id}: ${raw.weight}`);
  }
  const coord: Coord = [raw.x, raw.y];
  const customer: Customer = { id, coord, weightKg: raw.weight };
  if (raw.name !== undefined) {
    customer.name = raw.name;
  }
  return customer;
}

/**
 * Parse a CSV customer list. The header must name `id`, `x`, `y` and
 * `weight`; `name` is optional. Quoted fields follow RFC 4180.
 */
export function parseCustomersCsv(csv: string): RawCustomer[] {
  let headers: string[] = [];
  const records = parse<PlainObj>(csv, {
    columns: (header: string[]) => {
      headers = header.map((h) => h.trim().toLowerCase());
      return headers;
    },
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });
  if (headers.length === 0) return [];
  for (const required of ['id', 'x', 'y', 'weight']) {
    if (!headers.includes(required)) {
      throw new InputError(`Customer CSV missing column: ${required}`);
    }
  }
  return records.map((obj) => {
    const row: RawCustomer = {
      id: String(obj.id ?? ''),
      x: Number(obj.x),
      y: Number(obj.y),
      weight: Number(obj.weight),
    };
    if (typeof obj.name === 'string' && obj.name.length > 0) {
      row.name = obj.name;
    }
    return row;
  });
}

/**
 * Validate a plan document (and optional CSV list of customers) and turn
 * it into typed structures.
 */
export function parsePlan(json: unknown, customersCsv?: string): PlanInput {
  if (!validatePlan(json)) {
    const problems = (validatePlan.errors ?? []).map(
      (e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`,
    );
    throw new InputError('Plan document is invalid', problems);
  }

  let raws = [...json.customers];
  if (customersCsv) {
    raws = raws.concat(parseCustomersCsv(customersCsv));
  }
  const customers = raws.map(parseCustomer);

  const seen = new Set<string>();
  const seenAt = new Map<string, string>();
  for (const c of customers) {
    if (seen.has(c.id)) {
      throw new InputError(`Duplicate customer id: ${c.id}`);
    }
    seen.add(c.id);
    const key = `${c.coord[0]},${c.coord[1]}`;
    const other = seenAt.get(key);
    if (other !== undefined) {
      console.warn(`Customer ${c.id} shares location ${key} with ${other}`);
    } else {
      seenAt.set(key, c.id);
    }
  }

  const { depot, ...rest }: NonNullable<RawPlanDocument['config']> =
    json.config ?? {};
  const config: PlanInput['config'] = { ...rest };
  if (depot) {
    config.depot = [depot[0], depot[1]];
  }
  return { config, customers };
}

/** Read and parse a plan file, appending customers from an optional CSV file. */
export function loadPlan(planPath: string, customersCsvPath?: string): PlanInput {
  const raw = readFileSync(planPath, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputError(`Plan file ${planPath} is not valid JSON: ${reason}`);
  }
  const csv = customersCsvPath ? readFileSync(customersCsvPath, 'utf8') : undefined;
  return parsePlan(json, csv);
}
