import type { JsonObject } from './JsonValue.js';
import type { Pagination } from './Pagination.js';

/**
 * Alternative spelling of an entity value
 */
export interface Synonym {
  readonly synonym: string;
  readonly created?: string;
  readonly updated?: string;
}

export interface SynonymCollection {
  readonly synonyms: Synonym[];
  readonly pagination: Pagination;
}

export interface CreateSynonym {
  readonly synonym: string;
}

export interface UpdateSynonym {
  readonly synonym?: string;
}

/**
 * One of the values an entity can take
 */
export interface Value {
  readonly value: string;
  readonly metadata?: JsonObject;
  readonly created?: string;
  readonly updated?: string;
  /** Only returned when the value is exported */
  readonly synonyms?: string[];
}

export interface ValueCollection {
  readonly values: Value[];
  readonly pagination: Pagination;
}

export interface CreateValue {
  readonly value: string;
  readonly metadata?: JsonObject;
  readonly synonyms?: string[];
}

export interface UpdateValue {
  readonly value?: string;
  readonly metadata?: JsonObject;
  readonly synonyms?: string[];
}

/**
 * Named slot type with enumerated values
 */
export interface Entity {
  readonly entity: string;
  readonly created?: string;
  readonly updated?: string;
  readonly description?: string;
  readonly metadata?: JsonObject;
  readonly fuzzyMatch?: boolean;
  /** Only returned when the entity is exported */
  readonly values?: Value[];
}

export interface EntityCollection {
  readonly entities: Entity[];
  readonly pagination: Pagination;
}

export interface CreateEntity {
  readonly entity: string;
  readonly description?: string;
  readonly metadata?: JsonObject;
  readonly values?: CreateValue[];
  readonly fuzzyMatch?: boolean;
}

export interface UpdateEntity {
  readonly entity?: string;
  readonly description?: string;
  readonly metadata?: JsonObject;
  readonly values?: CreateValue[];
  readonly fuzzyMatch?: boolean;
}
