import type { Enumerated, JsonObject } from './JsonValue.js';
import type { Pagination } from './Pagination.js';

export const DIALOG_NODE_TYPES = [
  'standard',
  'event_handler',
  'frame',
  'slot',
  'response_condition',
] as const;

export const DIALOG_NODE_EVENT_NAMES = [
  'focus',
  'input',
  'filled',
  'validate',
  'filled_multiple',
  'generic',
  'nomatch',
  'nomatch_responses_depleted',
] as const;

export const NEXT_STEP_BEHAVIORS = [
  'get_user_input',
  'skip_user_input',
  'jump_to',
  'reprompt',
  'skip_slot',
  'skip_all_slots',
] as const;

export const NEXT_STEP_SELECTORS = ['condition', 'client', 'user_input', 'body'] as const;

export const DIALOG_NODE_ACTION_TYPES = ['client', 'server'] as const;

/**
 * How the dialog node is processed
 */
export type DialogNodeType = Enumerated<(typeof DIALOG_NODE_TYPES)[number]>;

/**
 * How an `event_handler` node is processed
 */
export type DialogNodeEventName = Enumerated<(typeof DIALOG_NODE_EVENT_NAMES)[number]>;

export type DialogNodeNextStepBehavior = Enumerated<(typeof NEXT_STEP_BEHAVIORS)[number]>;

export type DialogNodeNextStepSelector = Enumerated<(typeof NEXT_STEP_SELECTORS)[number]>;

export type DialogNodeActionType = Enumerated<(typeof DIALOG_NODE_ACTION_TYPES)[number]>;

/**
 * What happens after the node is executed
 */
export interface DialogNodeNextStep {
  readonly behavior: DialogNodeNextStepBehavior;
  /** Target node for `jump_to` */
  readonly dialogNode?: string;
  /** Part of the target node to process first for `jump_to` */
  readonly selector?: DialogNodeNextStepSelector;
}

/**
 * Programmatic call made when the node is reached
 */
export interface DialogNodeAction {
  readonly name: string;
  readonly actionType?: DialogNodeActionType;
  readonly parameters?: JsonObject;
  /** Context location where the action result is stored */
  readonly resultVariable: string;
  readonly credentials?: string;
}

/**
 * Fields shared by dialog nodes and their create payload
 */
export interface DialogNodeFields {
  readonly description?: string;
  readonly conditions?: string;
  readonly parent?: string;
  readonly previousSibling?: string;
  readonly output?: JsonObject;
  readonly context?: JsonObject;
  readonly metadata?: JsonObject;
  readonly nextStep?: DialogNodeNextStep;
  readonly actions?: DialogNodeAction[];
  readonly title?: string;
  readonly nodeType?: DialogNodeType;
  readonly eventName?: DialogNodeEventName;
  readonly variable?: string;
}

/**
 * Node of the conversation flow graph
 */
export interface DialogNode extends DialogNodeFields {
  readonly dialogNode: string;
  readonly created?: string;
  readonly updated?: string;
}

export interface DialogNodeCollection {
  readonly dialogNodes: DialogNode[];
  readonly pagination: Pagination;
}

export interface CreateDialogNode extends DialogNodeFields {
  readonly dialogNode: string;
}

export interface UpdateDialogNode extends DialogNodeFields {
  readonly dialogNode?: string;
}
