import type { Pagination } from './Pagination.js';

/**
 * Example utterance of an intent
 */
export interface Example {
  readonly text: string;
  readonly created?: string;
  readonly updated?: string;
}

export interface ExampleCollection {
  readonly examples: Example[];
  readonly pagination: Pagination;
}

export interface CreateExample {
  readonly text: string;
}

export interface UpdateExample {
  readonly text?: string;
}

/**
 * Labeled user-goal category
 */
export interface Intent {
  readonly intent: string;
  readonly created?: string;
  readonly updated?: string;
  readonly description?: string;
  /** Only returned when the intent is exported */
  readonly examples?: Example[];
}

export interface IntentCollection {
  readonly intents: Intent[];
  readonly pagination: Pagination;
}

export interface CreateIntent {
  readonly intent: string;
  readonly description?: string;
  readonly examples?: CreateExample[];
}

export interface UpdateIntent {
  readonly intent?: string;
  readonly description?: string;
  readonly examples?: CreateExample[];
}
