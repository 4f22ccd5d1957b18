// src/core/http/HttpCore.ts

import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpConfig, HttpRequestConfig, HttpResponse, QueryParams, QueryValue, Transport } from './types';
import type { LoggerLike } from '../../observability/types';
import { noopLogger } from '../../observability/types';
import {
  ApiClientError,
  ApiServerError,
  NetworkTimeoutError,
  NetworkError,
  OperationCancelledError,
  RateLimitError,
} from '../../utils/errors';

/**
 * Single-request GET transport over one keep-alive session.
 *
 * Failures are surfaced as typed errors and never retried here.
 */
export class HttpCore implements Transport {
  private axiosInstance: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private requestCount = 0;

  constructor(
    private config: HttpConfig,
    private logger: LoggerLike = noopLogger
  ) {
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });

    this.axiosInstance = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: {
        'User-Agent': config.userAgent,
        Accept: 'application/json',
      },
    });
  }

  get userAgent(): string {
    return this.config.userAgent;
  }

  async get<T = unknown>(url: string, config: HttpRequestConfig = {}): Promise<HttpResponse<T>> {
    const requestId = this.generateRequestId();

    this.logger.debug('HTTP request', {
      requestId,
      url,
      query: config.query,
    });

    try {
      const axiosResponse = await this.axiosInstance.request<T>({
        url,
        method: 'GET',
        // Fixed for the whole session
        headers: { 'User-Agent': this.config.userAgent },
        params: this.compactQuery(config.query),
        timeout: config.timeout,
        signal: config.signal,
      });

      this.logger.debug('HTTP response', { requestId, status: axiosResponse.status });

      return {
        data: axiosResponse.data,
        status: axiosResponse.status,
        headers: this.toHeaderRecord(axiosResponse.headers),
      };
    } catch (error: unknown) {
      throw this.transformError(error, url);
    }
  }

  /**
   * Release pooled sockets. The instance must not be used afterwards.
   */
  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    this.logger.debug('HTTP session closed', { requests: this.requestCount });
  }

  private compactQuery(query?: QueryParams): Record<string, QueryValue> | undefined {
    if (!query) return undefined;
    const params: Record<string, QueryValue> = {};
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params[key] = value;
    }
    return params;
  }

  private generateRequestId(): string {
    this.requestCount++;
    return `req_${Date.now()}_${this.requestCount}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, url: string): Error {
    if (axios.isCancel(error)) {
      return new OperationCancelledError('Request cancelled', { url });
    }

    if (!axios.isAxiosError(error)) {
      return new NetworkError('Network error', { url, cause: error });
    }

    if (error.response) {
      const status = error.response.status;
      const body: unknown = error.response.data;

      this.logger.debug('HTTP error response', {
        url,
        status,
        statusText: error.response.statusText,
        data: body,
      });

      if (status === 429) {
        const retryAfter = Number(error.response.headers['retry-after']);
        return new RateLimitError('Rate limit exceeded', Number.isFinite(retryAfter) ? retryAfter : undefined, {
          url,
          response: body,
        });
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, { url, response: body });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { url, response: body });
      }
      return new ApiClientError(`Unexpected status: ${status}`, status, { url, response: body });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { url });
    }
    return new NetworkError(`Network error: ${error.message}`, { url, code: error.code });
  }
}
