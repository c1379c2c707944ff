import type {
  CreateEntity,
  CreateSynonym,
  CreateValue,
  Entity,
  EntityCollection,
  Synonym,
  SynonymCollection,
  UpdateEntity,
  UpdateSynonym,
  UpdateValue,
  Value,
  ValueCollection,
} from '../../domain/entities/Entity.js';
import { array, boolean, jsonObject, string } from '../codec/fields.js';
import { defineRecord, optional, record, required } from '../codec/RecordCodec.js';
import { paginationSchema } from './paginationSchemas.js';

export const synonymSchema = defineRecord<Synonym>('Synonym', {
  synonym: required('synonym', string()),
  created: optional('created', string()),
  updated: optional('updated', string()),
});

export const synonymCollectionSchema = defineRecord<SynonymCollection>('SynonymCollection', {
  synonyms: required('synonyms', array(record(synonymSchema))),
  pagination: required('pagination', record(paginationSchema)),
});

export const createSynonymSchema = defineRecord<CreateSynonym>('CreateSynonym', {
  synonym: required('synonym', string()),
});

export const updateSynonymSchema = defineRecord<UpdateSynonym>('UpdateSynonym', {
  synonym: optional('synonym', string()),
});

export const valueSchema = defineRecord<Value>('Value', {
  value: required('value', string()),
  metadata: optional('metadata', jsonObject()),
  created: optional('created', string()),
  updated: optional('updated', string()),
  synonyms: optional('synonyms', array(string())),
});

export const valueCollectionSchema = defineRecord<ValueCollection>('ValueCollection', {
  values: required('values', array(record(valueSchema))),
  pagination: required('pagination', record(paginationSchema)),
});

export const createValueSchema = defineRecord<CreateValue>('CreateValue', {
  value: required('value', string()),
  metadata: optional('metadata', jsonObject()),
  synonyms: optional('synonyms', array(string())),
});

export const updateValueSchema = defineRecord<UpdateValue>('UpdateValue', {
  value: optional('value', string()),
  metadata: optional('metadata', jsonObject()),
  synonyms: optional('synonyms', array(string())),
});

export const entitySchema = defineRecord<Entity>('Entity', {
  entity: required('entity', string()),
  created: optional('created', string()),
  updated: optional('updated', string()),
  description: optional('description', string()),
  metadata: optional('metadata', jsonObject()),
  fuzzyMatch: optional('fuzzy_match', boolean()),
  values: optional('values', array(record(valueSchema))),
});

export const entityCollectionSchema = defineRecord<EntityCollection>('EntityCollection', {
  entities: required('entities', array(record(entitySchema))),
  pagination: required('pagination', record(paginationSchema)),
});

export const createEntitySchema = defineRecord<CreateEntity>('CreateEntity', {
  entity: required('entity', string()),
  description: optional('description', string()),
  metadata: optional('metadata', jsonObject()),
  values: optional('values', array(record(createValueSchema))),
  fuzzyMatch: optional('fuzzy_match', boolean()),
});

export const updateEntitySchema = defineRecord<UpdateEntity>('UpdateEntity', {
  entity: optional('entity', string()),
  description: optional('description', string()),
  metadata: optional('metadata', jsonObject()),
  values: optional('values', array(record(createValueSchema))),
  fuzzyMatch: optional('fuzzy_match', boolean()),
});
