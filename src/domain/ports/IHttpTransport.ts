export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Fully built request, ready to be sent by a transport
 */
export interface RequestDescriptor {
  method: HttpMethod;
  /** Service URL + encoded path + query string */
  url: string;
  /** Encoded path, without the service URL */
  path: string;
  /** Query items in the order they appear in the URL */
  query: Array<[string, string]>;
  headers: Record<string, string>;
  /** Serialized JSON body */
  body?: string;
}

/**
 * Raw HTTP response, whatever the status
 */
export interface HttpResponse {
  status: number;
  body: string;
  headers: Record<string, string>;
}

/**
 * Port interface for the HTTP transport.
 * Connection handling, TLS, timeouts and retries belong to the implementation.
 */
export interface IHttpTransport {
  /**
   * Send a request and resolve with the response for any status code.
   * Rejects only when no response was received.
   */
  send(request: RequestDescriptor): Promise<HttpResponse>;
}
