/**
 * Raw HTTP capability.
 * Everything above this layer deals in status codes and text bodies;
 * only the transport knows which client library moves the bytes.
 */

export type HttpMethod = "GET" | "POST";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  params?: Record<string, string | number | boolean>;
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  /** Header names are lowercased */
  headers: Record<string, string>;
  /** Raw response text; callers decode */
  body: string;
}

export interface HttpTransport {
  /**
   * Perform one request. Non-2xx statuses are returned, not thrown.
   * Implementations own retry: transient faults up to a bound, 429 until it clears.
   * Faults left after that surface as TransportError or RetryExhaustedError.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}
