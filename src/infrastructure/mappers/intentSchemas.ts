import type {
  CreateExample,
  CreateIntent,
  Example,
  ExampleCollection,
  Intent,
  IntentCollection,
  UpdateExample,
  UpdateIntent,
} from '../../domain/entities/Intent.js';
import type {
  Counterexample,
  CounterexampleCollection,
  CreateCounterexample,
  UpdateCounterexample,
} from '../../domain/entities/Counterexample.js';
import { array, string } from '../codec/fields.js';
import { defineRecord, optional, record, required } from '../codec/RecordCodec.js';
import { paginationSchema } from './paginationSchemas.js';

export const exampleSchema = defineRecord<Example>('Example', {
  text: required('text', string()),
  created: optional('created', string()),
  updated: optional('updated', string()),
});

export const exampleCollectionSchema = defineRecord<ExampleCollection>('ExampleCollection', {
  examples: required('examples', array(record(exampleSchema))),
  pagination: required('pagination', record(paginationSchema)),
});

export const createExampleSchema = defineRecord<CreateExample>('CreateExample', {
  text: required('text', string()),
});

export const updateExampleSchema = defineRecord<UpdateExample>('UpdateExample', {
  text: optional('text', string()),
});

export const intentSchema = defineRecord<Intent>('Intent', {
  intent: required('intent', string()),
  created: optional('created', string()),
  updated: optional('updated', string()),
  description: optional('description', string()),
  examples: optional('examples', array(record(exampleSchema))),
});

export const intentCollectionSchema = defineRecord<IntentCollection>('IntentCollection', {
  intents: required('intents', array(record(intentSchema))),
  pagination: required('pagination', record(paginationSchema)),
});

export const createIntentSchema = defineRecord<CreateIntent>('CreateIntent', {
  intent: required('intent', string()),
  description: optional('description', string()),
  examples: optional('examples', array(record(createExampleSchema))),
});

export const updateIntentSchema = defineRecord<UpdateIntent>('UpdateIntent', {
  intent: optional('intent', string()),
  description: optional('description', string()),
  examples: optional('examples', array(record(createExampleSchema))),
});

export const counterexampleSchema = defineRecord<Counterexample>('Counterexample', {
  text: required('text', string()),
  created: optional('created', string()),
  updated: optional('updated', string()),
});

export const counterexampleCollectionSchema = defineRecord<CounterexampleCollection>(
  'CounterexampleCollection',
  {
    counterexamples: required('counterexamples', array(record(counterexampleSchema))),
    pagination: required('pagination', record(paginationSchema)),
  }
);

export const createCounterexampleSchema = defineRecord<CreateCounterexample>('CreateCounterexample', {
  text: required('text', string()),
});

export const updateCounterexampleSchema = defineRecord<UpdateCounterexample>('UpdateCounterexample', {
  text: optional('text', string()),
});
