import {
  LOG_MESSAGE_LEVELS,
  type Context,
  type InputData,
  type LogMessage,
  type MessageInput,
  type MessageRequest,
  type MessageResponse,
  type OutputData,
  type RuntimeEntity,
  type RuntimeIntent,
  type SystemResponse,
} from '../../domain/entities/Message.js';
import { array, boolean, enumeration, integer, jsonObject, number, string } from '../codec/fields.js';
import { defineOpenRecord, defineRecord, optional, record, required } from '../codec/RecordCodec.js';

export const inputDataSchema = defineOpenRecord<InputData>('InputData', {
  text: required('text', string()),
});

export const messageInputSchema = defineRecord<MessageInput>('MessageInput', {
  text: optional('text', string()),
});

export const systemResponseSchema = defineOpenRecord<SystemResponse>('SystemResponse', {});

export const contextSchema = defineOpenRecord<Context>('Context', {
  conversationId: required('conversation_id', string()),
  system: required('system', record(systemResponseSchema)),
});

export const runtimeIntentSchema = defineOpenRecord<RuntimeIntent>('RuntimeIntent', {
  intent: required('intent', string()),
  confidence: required('confidence', number()),
});

export const runtimeEntitySchema = defineOpenRecord<RuntimeEntity>('RuntimeEntity', {
  entity: required('entity', string()),
  location: required('location', array(integer())),
  value: required('value', string()),
  confidence: optional('confidence', number()),
  metadata: optional('metadata', jsonObject()),
});

export const logMessageSchema = defineOpenRecord<LogMessage>('LogMessage', {
  level: required('level', enumeration(LOG_MESSAGE_LEVELS)),
  msg: required('msg', string()),
});

export const outputDataSchema = defineOpenRecord<OutputData>('OutputData', {
  logMessages: required('log_messages', array(record(logMessageSchema))),
  text: required('text', array(string())),
  nodesVisited: optional('nodes_visited', array(string())),
});

export const messageRequestSchema = defineRecord<MessageRequest>('MessageRequest', {
  input: optional('input', record(inputDataSchema)),
  alternateIntents: optional('alternate_intents', boolean()),
  context: optional('context', record(contextSchema)),
  entities: optional('entities', array(record(runtimeEntitySchema))),
  intents: optional('intents', array(record(runtimeIntentSchema))),
  output: optional('output', record(outputDataSchema)),
});

export const messageResponseSchema = defineOpenRecord<MessageResponse>('MessageResponse', {
  input: optional('input', record(messageInputSchema)),
  intents: required('intents', array(record(runtimeIntentSchema))),
  entities: required('entities', array(record(runtimeEntitySchema))),
  alternateIntents: optional('alternate_intents', boolean()),
  context: required('context', record(contextSchema)),
  output: required('output', record(outputDataSchema)),
});
