import { ConfigError } from './errors';
import type { FleetConfig } from './types';

export const DEFAULT_CONFIG: Readonly<FleetConfig> = {
  capacityKg: 15,
  speedKmh: 60,
  dispatchMin: 10,
  reloadMin: 20,
  workdayMin: 7 * 60,
  fleetSize: 4,
  maxDays: 365,
  tieBreak: 'input',
  depot: [0, 0],
  dayStart: '08:00',
};

/**
 * Merge configuration layers; earlier layers win. Undefined values fall
 * through to the next layer and finally to {@link DEFAULT_CONFIG}.
 */
export function resolveConfig(
  ...layers: (Partial<FleetConfig> | undefined)[]
): FleetConfig {
  const pick = <K extends keyof FleetConfig>(key: K): FleetConfig[K] => {
    for (const layer of layers) {
      const value = layer?.[key];
      if (value !== undefined) return value;
    }
    return DEFAULT_CONFIG[key];
  };
  return {
    capacityKg: pick('capacityKg'),
    speedKmh: pick('speedKmh'),
    dispatchMin: pick('dispatchMin'),
    reloadMin: pick('reloadMin'),
    workdayMin: pick('workdayMin'),
    fleetSize: pick('fleetSize'),
    maxDays: pick('maxDays'),
    tieBreak: pick('tieBreak'),
    depot: pick('depot'),
    dayStart: pick('dayStart'),
  };
}

function requirePositive(field: keyof FleetConfig, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, `must be greater than 0 (got ${value})`);
  }
}

function requireNonNegative(field: keyof FleetConfig, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(field, `must not be negative (got ${value})`);
  }
}

/** Reject configurations under which the day loop could never finish. */
export function validateConfig(config: FleetConfig): void {
  requirePositive('fleetSize', config.fleetSize);
  if (!Number.isInteger(config.fleetSize)) {
    throw new ConfigError('fleetSize', `must be an integer (got ${config.fleetSize})`);
  }
  requirePositive('capacityKg', config.capacityKg);
  requirePositive('speedKmh', config.speedKmh);
  requirePositive('workdayMin', config.workdayMin);
  requireNonNegative('dispatchMin', config.dispatchMin);
  requireNonNegative('reloadMin', config.reloadMin);
  requirePositive('maxDays', config.maxDays);
  if (!Number.isInteger(config.maxDays)) {
    throw new ConfigError('maxDays', `must be an integer (got ${config.maxDays})`);
  }
  if (config.tieBreak !== 'input' && config.tieBreak !== 'id') {
    throw new ConfigError('tieBreak', `must be "input" or "id" (got ${String(config.tieBreak)})`);
  }
  if (!config.depot.every(Number.isFinite)) {
    throw new ConfigError('depot', `coordinates must be finite (got ${config.depot.join(',')})`);
  }
  const m = /^(\d{1,2}):(\d{2})$/.exec(config.dayStart);
  if (!m || Number(m[1]) > 23 || Number(m[2]) > 59) {
    throw new ConfigError('dayStart', `must be HH:mm (got ${config.dayStart})`);
  }
}
