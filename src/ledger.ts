import type { Customer, ID, TieBreak } from './types';

export interface ServiceState {
  served: boolean;
  assignedDay?: number;
  arrivalMin?: number;
  departureMin?: number;
}

const compareIds = (a: Customer, b: Customer): number =>
  a.id.localeCompare(b.id, 'en', { numeric: true });

/**
 * Customer records plus their service state. The records never change;
 * each customer's state is written once, when it is committed to a route.
 */
export class CustomerLedger {
  readonly customers: readonly Customer[];
  private readonly states = new Map<ID, ServiceState>();
  private readonly byId = new Map<ID, Customer>();
  private readonly order: readonly Customer[];
  private remaining: number;

  constructor(customers: readonly Customer[], tieBreak: TieBreak = 'input') {
    this.customers = customers;
    for (const c of customers) {
      if (this.byId.has(c.id)) {
        throw new Error(`Duplicate customer id: ${c.id}`);
      }
      this.byId.set(c.id, c);
      this.states.set(c.id, { served: false });
    }
    this.order = tieBreak === 'id' ? [...customers].sort(compareIds) : customers;
    this.remaining = customers.length;
  }

  get unservedCount(): number {
    return this.remaining;
  }

  get servedCount(): number {
    return this.customers.length - this.remaining;
  }

  allServed(): boolean {
    return this.remaining === 0;
  }

  get(id: ID): Customer | undefined {
    return this.byId.get(id);
  }

  state(id: ID): Readonly<ServiceState> | undefined {
    return this.states.get(id);
  }

  isServed(id: ID): boolean {
    return this.states.get(id)?.served ?? false;
  }

  /** Unserved customers in iteration order. */
  unserved(): Customer[] {
    return this.order.filter((c) => !this.isServed(c.id));
  }

  minUnservedWeight(): number | undefined {
    let min: number | undefined;
    for (const c of this.customers) {
      if (this.isServed(c.id)) continue;
      if (min === undefined || c.weightKg < min) min = c.weightKg;
    }
    return min;
  }

  markServed(id: ID, day: number, arrivalMin: number, departureMin: number): void {
    const state = this.states.get(id);
    if (!state) {
      throw new Error(`Unknown customer id: ${id}`);
    }
    if (state.served) {
      throw new Error(`Customer ${id} already served on day ${state.assignedDay}`);
    }
    state.served = true;
    state.assignedDay = day;
    state.arrivalMin = arrivalMin;
    state.departureMin = departureMin;
    this.remaining -= 1;
  }
}
