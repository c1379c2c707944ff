import type { Pagination } from './Pagination.js';

/**
 * User input that has been marked as irrelevant
 */
export interface Counterexample {
  readonly text: string;
  readonly created?: string;
  readonly updated?: string;
}

export interface CounterexampleCollection {
  readonly counterexamples: Counterexample[];
  readonly pagination: Pagination;
}

export interface CreateCounterexample {
  readonly text: string;
}

export interface UpdateCounterexample {
  readonly text?: string;
}
