import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { TransportError } from '../../domain/errors/ConversationError.js';
import type { HttpResponse, IHttpTransport, RequestDescriptor } from '../../domain/ports/IHttpTransport.js';

export interface AxiosTransportOptions {
  /** Request timeout in milliseconds (0 disables it) */
  timeoutMs?: number;
  /** Replaces the Node http adapter, mostly for tests */
  adapter?: AxiosRequestConfig['adapter'];
}

const DEFAULT_TIMEOUT_MS = 30_000;

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  const entries: Array<[string, unknown]> = Object.entries(headers);
  for (const [name, value] of entries) {
    if (value === undefined || value === null) {
      continue;
    }
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return flat;
}

/**
 * HTTP transport on top of an axios instance. Every status code resolves;
 * only a missing response rejects, with a `TransportError`.
 */
export class AxiosTransport implements IHttpTransport {
  private readonly instance: AxiosInstance;

  constructor(options: AxiosTransportOptions = {}) {
    this.instance = axios.create({
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      validateStatus: () => true,
      responseType: 'text',
      // Bodies are already serialized, and decoding happens in the dispatcher
      transformRequest: [(data: unknown) => data],
      transformResponse: [(data: unknown) => data],
      ...(options.adapter !== undefined ? { adapter: options.adapter } : {}),
    });
  }

  async send(request: RequestDescriptor): Promise<HttpResponse> {
    try {
      const response = await this.instance.request<string>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        ...(request.body !== undefined && { data: request.body }),
      });

      return {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : '',
        headers: flattenHeaders(response.headers),
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new TransportError(error.message, error.code ?? null, { cause: error });
      }
      throw new TransportError(error instanceof Error ? error.message : String(error), null, {
        cause: error,
      });
    }
  }
}
