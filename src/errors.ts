import type { RejectionReason } from './routing';
import type { ID } from './types';

export type UnservableCustomer =
  | { customerId: ID; reason: 'overCapacity'; weightKg: number; capacityKg: number }
  | {
      customerId: ID;
      reason: 'beyondWorkday';
      roundTripMin: number;
      workdayMin: number;
    };

export class ConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid config ${field}: ${message}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}

export class InputError extends Error {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'InputError';
    this.problems = problems;
  }
}

export class UnservableCustomersError extends Error {
  readonly customers: UnservableCustomer[];

  constructor(customers: UnservableCustomer[]) {
    super(
      `${customers.length} customer(s) can never be served: ${customers
        .map((c) => c.customerId)
        .join(', ')}`,
    );
    this.name = 'UnservableCustomersError';
    this.customers = customers;
  }
}

export class DayLimitError extends Error {
  readonly maxDays: number;
  readonly unservedIds: ID[];
  /** Why each unserved customer was last passed over. */
  readonly rejections: ReadonlyMap<ID, RejectionReason['type']>;

  constructor(
    maxDays: number,
    unservedIds: ID[],
    rejections: ReadonlyMap<ID, RejectionReason['type']> = new Map(),
  ) {
    super(
      `schedule not complete after ${maxDays} day(s); ${unservedIds.length} customer(s) unserved`,
    );
    this.name = 'DayLimitError';
    this.maxDays = maxDays;
    this.unservedIds = unservedIds;
    this.rejections = rejections;
  }
}

function describeUnservable(c: UnservableCustomer): string {
  if (c.reason === 'overCapacity') {
    return `${c.customerId} weighs ${c.weightKg} kg > capacity ${c.capacityKg} kg`;
  }
  return `${c.customerId} needs ${c.roundTripMin.toFixed(
    1,
  )} min from the depot > workday ${c.workdayMin} min`;
}

/** Append the reasons carried by scheduling errors to the message. */
export function describeError(err: unknown): string {
  if (err instanceof UnservableCustomersError) {
    return `${err.message}; reasons: ${err.customers
      .map(describeUnservable)
      .join('; ')}`;
  }
  if (err instanceof DayLimitError) {
    const ids = err.unservedIds.map((id) => {
      const reason = err.rejections.get(id);
      return reason ? `${id} (${reason})` : id;
    });
    return `${err.message}; unserved: ${ids.join(', ')}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
