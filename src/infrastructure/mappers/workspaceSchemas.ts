import type {
  CreateWorkspace,
  Workspace,
  WorkspaceCollection,
} from '../../domain/entities/Workspace.js';
import { array, boolean, jsonObject, string } from '../codec/fields.js';
import { defineRecord, optional, record, required } from '../codec/RecordCodec.js';
import { createDialogNodeSchema, dialogNodeSchema } from './dialogNodeSchemas.js';
import { createEntitySchema, entitySchema } from './entitySchemas.js';
import {
  counterexampleSchema,
  createCounterexampleSchema,
  createIntentSchema,
  intentSchema,
} from './intentSchemas.js';
import { paginationSchema } from './paginationSchemas.js';

export const workspaceSchema = defineRecord<Workspace>('Workspace', {
  name: required('name', string()),
  language: required('language', string()),
  created: optional('created', string()),
  updated: optional('updated', string()),
  workspaceId: required('workspace_id', string()),
  description: optional('description', string()),
  metadata: optional('metadata', jsonObject()),
  learningOptOut: optional('learning_opt_out', boolean()),
  status: optional('status', string()),
  intents: optional('intents', array(record(intentSchema))),
  entities: optional('entities', array(record(entitySchema))),
  counterexamples: optional('counterexamples', array(record(counterexampleSchema))),
  dialogNodes: optional('dialog_nodes', array(record(dialogNodeSchema))),
});

export const workspaceCollectionSchema = defineRecord<WorkspaceCollection>('WorkspaceCollection', {
  workspaces: required('workspaces', array(record(workspaceSchema))),
  pagination: required('pagination', record(paginationSchema)),
});

/**
 * Body of both create and update requests
 */
export const createWorkspaceSchema = defineRecord<CreateWorkspace>('CreateWorkspace', {
  name: optional('name', string()),
  description: optional('description', string()),
  language: optional('language', string()),
  intents: optional('intents', array(record(createIntentSchema))),
  entities: optional('entities', array(record(createEntitySchema))),
  dialogNodes: optional('dialog_nodes', array(record(createDialogNodeSchema))),
  counterexamples: optional('counterexamples', array(record(createCounterexampleSchema))),
  metadata: optional('metadata', jsonObject()),
  learningOptOut: optional('learning_opt_out', boolean()),
});
