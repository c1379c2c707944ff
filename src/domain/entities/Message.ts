import type { Enumerated, JsonObject } from './JsonValue.js';

export const LOG_MESSAGE_LEVELS = ['info', 'error', 'warn'] as const;

export type LogMessageLevel = Enumerated<(typeof LOG_MESSAGE_LEVELS)[number]>;

/**
 * User input sent to the message endpoint
 */
export interface InputData {
  readonly text: string;
  readonly additionalProperties?: JsonObject;
}

/**
 * User input echoed back in a message response
 */
export interface MessageInput {
  readonly text?: string;
}

/**
 * Service-owned dialog state. Opaque to the client.
 */
export interface SystemResponse {
  readonly additionalProperties?: JsonObject;
}

/**
 * Conversation state. Pass the context of the previous response with the
 * next message to continue the same conversation.
 */
export interface Context {
  readonly conversationId: string;
  readonly system: SystemResponse;
  /** Application variables stored in the context */
  readonly additionalProperties?: JsonObject;
}

/**
 * Intent recognized in the user input
 */
export interface RuntimeIntent {
  readonly intent: string;
  /** Confidence in the range 0 to 1 */
  readonly confidence: number;
  readonly additionalProperties?: JsonObject;
}

/**
 * Entity recognized in the user input
 */
export interface RuntimeEntity {
  readonly entity: string;
  /** Zero-based start and end offsets of the entity in the input text */
  readonly location: number[];
  readonly value: string;
  readonly confidence?: number;
  readonly metadata?: JsonObject;
  readonly additionalProperties?: JsonObject;
}

export interface LogMessage {
  readonly level: LogMessageLevel;
  readonly msg: string;
  readonly additionalProperties?: JsonObject;
}

/**
 * Dialog output for a message
 */
export interface OutputData {
  readonly logMessages: LogMessage[];
  readonly text: string[];
  readonly nodesVisited?: string[];
  readonly additionalProperties?: JsonObject;
}

/**
 * Body of a message request
 */
export interface MessageRequest {
  readonly input?: InputData;
  readonly alternateIntents?: boolean;
  readonly context?: Context;
  readonly entities?: RuntimeEntity[];
  readonly intents?: RuntimeIntent[];
  readonly output?: OutputData;
}

export interface MessageResponse {
  readonly input?: MessageInput;
  readonly intents: RuntimeIntent[];
  readonly entities: RuntimeEntity[];
  readonly alternateIntents?: boolean;
  readonly context: Context;
  readonly output: OutputData;
  readonly additionalProperties?: JsonObject;
}
