/**
 * HTTP transport type definitions for the OpenStack Swift client
 */

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method (GET, HEAD, PUT, POST, DELETE, COPY) */
  method: string;
  /** Full URL including query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: Uint8Array | ReadableStream<Uint8Array>;
  /** Aborts the exchange, including reading or writing the body */
  signal?: AbortSignal;
}

/**
 * HTTP response with a streaming body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Response body; null when the response has none (e.g. HEAD) */
  body: ReadableStream<Uint8Array> | null;
}

/**
 * HTTP transport interface
 *
 * The transport applies authentication and resolves nothing on its own: the
 * request URL is already complete. Implementations must not retry.
 */
export interface HttpTransport {
  /**
   * Sends a request and resolves once the response headers are available
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Closes the transport and releases resources
   */
  close(): Promise<void>;
}
