export * from "./domain/index.js";
export * from "./application/index.js";
export { Conversation } from "./presentation/Conversation.js";
export {
  createConversation,
  createConversationFromEnv,
  type ConversationOptions,
} from "./presentation/createConversation.js";
export {
  loadConfig,
  validateConfig,
  DEFAULT_SERVICE_URL,
  DEFAULT_VERSION,
  type AppConfig,
} from "./infrastructure/config/Config.js";
export { PinoLogger, type PinoLoggerOptions } from "./infrastructure/logging/PinoLogger.js";
export { AxiosTransport, type AxiosTransportOptions } from "./infrastructure/http/AxiosTransport.js";
export { RestClient } from "./infrastructure/http/RestClient.js";
export {
  buildRequest,
  jsonBody,
  type ApiOperation,
  type QueryValue,
  type RequestBody,
  type ServiceSettings,
} from "./infrastructure/http/RequestBuilder.js";
export {
  dispatchResponse,
  extractErrorMessage,
  type ResponseOutcome,
} from "./infrastructure/http/ResponseDispatcher.js";
export {
  RecordSchema,
  defineRecord,
  defineOpenRecord,
  decodeRecord,
  encodeRecord,
  serializeRecord,
} from "./infrastructure/codec/RecordCodec.js";
export * from "./infrastructure/mappers/index.js";
