import { DecodeError, TransportError } from '../../domain/errors/ConversationError.js';
import type { HttpResponse, IHttpTransport } from '../../domain/ports/IHttpTransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import type { RecordSchema } from '../codec/RecordCodec.js';
import { buildRequest, type ApiOperation, type ServiceSettings } from './RequestBuilder.js';
import { dispatchResponse, type ResponseOutcome } from './ResponseDispatcher.js';

/**
 * Runs operations: build the request, send it through the transport and
 * classify the response. Holds only immutable settings, so one instance
 * can serve any number of concurrent calls.
 */
export class RestClient {
  constructor(
    private readonly settings: ServiceSettings,
    private readonly transport: IHttpTransport,
    private readonly logger: ILogger
  ) {}

  /**
   * Run an operation that answers with a record
   */
  async requestObject<T extends object>(operation: ApiOperation, schema: RecordSchema<T>): Promise<T> {
    const outcome = await this.execute(operation, schema);

    switch (outcome.kind) {
      case 'success':
        return outcome.value;
      case 'empty':
        throw new DecodeError('missing_or_wrong_type', '$', `expected ${schema.name} in response body`);
      case 'error':
        throw outcome.error;
    }
  }

  /**
   * Run an operation whose success carries no payload (deletes)
   */
  async requestVoid(operation: ApiOperation): Promise<void> {
    const outcome = await this.execute(operation);
    if (outcome.kind === 'error') {
      throw outcome.error;
    }
  }

  async execute<T extends object>(
    operation: ApiOperation,
    schema?: RecordSchema<T>
  ): Promise<ResponseOutcome<T>> {
    const request = buildRequest(operation, this.settings);

    this.logger.debug('Sending request', { method: request.method, path: request.path });

    let response: HttpResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(error instanceof Error ? error.message : String(error), null, {
        cause: error,
      });
    }

    this.logger.debug('Response received', {
      method: request.method,
      path: request.path,
      status: response.status,
    });

    return dispatchResponse(response, schema);
  }
}
