import {
  DIALOG_NODE_ACTION_TYPES,
  DIALOG_NODE_EVENT_NAMES,
  DIALOG_NODE_TYPES,
  NEXT_STEP_BEHAVIORS,
  NEXT_STEP_SELECTORS,
  type CreateDialogNode,
  type DialogNode,
  type DialogNodeAction,
  type DialogNodeCollection,
  type DialogNodeNextStep,
  type UpdateDialogNode,
} from '../../domain/entities/DialogNode.js';
import { array, enumeration, jsonObject, string } from '../codec/fields.js';
import { defineRecord, optional, record, required } from '../codec/RecordCodec.js';
import { paginationSchema } from './paginationSchemas.js';

export const dialogNodeNextStepSchema = defineRecord<DialogNodeNextStep>('DialogNodeNextStep', {
  behavior: required('behavior', enumeration(NEXT_STEP_BEHAVIORS)),
  dialogNode: optional('dialog_node', string()),
  selector: optional('selector', enumeration(NEXT_STEP_SELECTORS)),
});

export const dialogNodeActionSchema = defineRecord<DialogNodeAction>('DialogNodeAction', {
  name: required('name', string()),
  actionType: optional('type', enumeration(DIALOG_NODE_ACTION_TYPES)),
  parameters: optional('parameters', jsonObject()),
  resultVariable: required('result_variable', string()),
  credentials: optional('credentials', string()),
});

// Fields common to nodes and their create/update payloads, in wire order
const nodeFields = {
  description: optional('description', string()),
  conditions: optional('conditions', string()),
  parent: optional('parent', string()),
  previousSibling: optional('previous_sibling', string()),
  output: optional('output', jsonObject()),
  context: optional('context', jsonObject()),
  metadata: optional('metadata', jsonObject()),
  nextStep: optional('next_step', record(dialogNodeNextStepSchema)),
  actions: optional('actions', array(record(dialogNodeActionSchema))),
  title: optional('title', string()),
  nodeType: optional('type', enumeration(DIALOG_NODE_TYPES)),
  eventName: optional('event_name', enumeration(DIALOG_NODE_EVENT_NAMES)),
  variable: optional('variable', string()),
};

export const dialogNodeSchema = defineRecord<DialogNode>('DialogNode', {
  dialogNode: required('dialog_node', string()),
  ...nodeFields,
  created: optional('created', string()),
  updated: optional('updated', string()),
});

export const dialogNodeCollectionSchema = defineRecord<DialogNodeCollection>('DialogNodeCollection', {
  dialogNodes: required('dialog_nodes', array(record(dialogNodeSchema))),
  pagination: required('pagination', record(paginationSchema)),
});

export const createDialogNodeSchema = defineRecord<CreateDialogNode>('CreateDialogNode', {
  dialogNode: required('dialog_node', string()),
  ...nodeFields,
});

export const updateDialogNodeSchema = defineRecord<UpdateDialogNode>('UpdateDialogNode', {
  dialogNode: optional('dialog_node', string()),
  ...nodeFields,
});
