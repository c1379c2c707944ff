export * from './entities/JsonValue.js';
export * from './entities/Pagination.js';
export * from './entities/Credentials.js';
export * from './entities/Workspace.js';
export * from './entities/Intent.js';
export * from './entities/Counterexample.js';
export * from './entities/Entity.js';
export * from './entities/DialogNode.js';
export * from './entities/Message.js';
export * from './entities/Log.js';
export * from './errors/ConversationError.js';
export type * from './ports/IHttpTransport.js';
export type * from './ports/ILogger.js';
