import type { HttpMethod, RequestOptions, RequestOutcome } from '../domain/http/request-outcome.js';

export interface HttpTransport {
  readonly name: string;
  request(method: HttpMethod, url: string, options: RequestOptions): Promise<RequestOutcome>;
  /** Streams a GET body into `destination`. Resolves with the HTTP status. */
  download(url: string, destination: string, timeoutSeconds: number): Promise<number>;
}
