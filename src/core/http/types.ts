// src/core/http/types.ts

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | undefined>;

export interface HttpRequestConfig {
  query?: QueryParams;
  timeout?: number;
  signal?: AbortSignal;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface HttpConfig {
  /** Relative request paths resolve against this origin. */
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
}

/**
 * The one operation the rest of the system needs from the transport.
 */
export interface Transport {
  get(url: string, config?: HttpRequestConfig): Promise<HttpResponse<unknown>>;
}
