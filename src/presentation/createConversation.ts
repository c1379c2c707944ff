import type { Credentials } from "../domain/entities/Credentials.js";
import type { IHttpTransport } from "../domain/ports/IHttpTransport.js";
import type { ILogger } from "../domain/ports/ILogger.js";
import {
  DEFAULT_SERVICE_URL,
  loadConfig,
  validateConfig,
} from "../infrastructure/config/Config.js";
import { AxiosTransport } from "../infrastructure/http/AxiosTransport.js";
import { RestClient } from "../infrastructure/http/RestClient.js";
import { PinoLogger } from "../infrastructure/logging/PinoLogger.js";
import { Conversation } from "./Conversation.js";

export interface ConversationOptions {
  /** API version date, YYYY-MM-DD */
  version: string;
  serviceUrl?: string;
  credentials?: Credentials;
  /** Sent with every request, before the client's own headers */
  defaultHeaders?: Record<string, string>;
  /** Ignored when a custom transport is given */
  timeoutMs?: number;
  transport?: IHttpTransport;
  logger?: ILogger;
}

/**
 * Wire a client from explicit options
 */
export function createConversation(options: ConversationOptions): Conversation {
  const logger = options.logger ?? new PinoLogger();
  const transport =
    options.transport ?? new AxiosTransport({ timeoutMs: options.timeoutMs });

  const rest = new RestClient(
    {
      serviceUrl: options.serviceUrl ?? DEFAULT_SERVICE_URL,
      version: options.version,
      defaultHeaders: { ...options.defaultHeaders },
      ...(options.credentials && { credentials: options.credentials }),
    },
    transport,
    logger.child({ component: "rest" })
  );

  return new Conversation(rest, logger);
}

/**
 * Wire a client from environment variables (and `.env`)
 */
export function createConversationFromEnv(
  env?: Record<string, string | undefined>,
  overrides: Pick<ConversationOptions, "transport" | "logger"> = {}
): Conversation {
  const config = loadConfig(env);
  validateConfig(config);

  const logger =
    overrides.logger ??
    new PinoLogger({
      level: config.logging.level,
      pretty: config.logging.pretty,
    });

  return createConversation({
    version: config.service.version,
    serviceUrl: config.service.url,
    timeoutMs: config.service.timeoutMs,
    logger,
    ...(config.service.credentials && { credentials: config.service.credentials }),
    ...(overrides.transport && { transport: overrides.transport }),
  });
}
