export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RequestOptions {
  jsonBody?: unknown;
  headers?: Record<string, string>;
  timeoutSeconds: number;
}

/**
 * Uniform response returned by every transport. Callers never learn which
 * strategy produced it.
 */
export class RequestOutcome {
  private decoded: { value: unknown } | null = null;

  constructor(
    readonly statusCode: number,
    readonly text: string,
  ) {}

  get ok(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }

  /** Decodes the body on first use. An empty body decodes to `{}`; malformed JSON throws. */
  json(): unknown {
    if (this.decoded === null) {
      this.decoded = { value: this.text.trim() ? JSON.parse(this.text) : {} };
    }
    return this.decoded.value;
  }

  /** Like `json()` but returns `undefined` instead of throwing. */
  tryJson(): unknown {
    try {
      return this.json();
    } catch {
      return undefined;
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
