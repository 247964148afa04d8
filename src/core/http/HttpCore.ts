// src/core/http/HttpCore.ts

import axios, { AxiosInstance, AxiosResponseHeaders, RawAxiosResponseHeaders, isAxiosError } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpConfig, HttpRequestConfig, HttpResponse } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  ApiClientError,
  ApiServerError,
  NetworkTimeoutError,
  NetworkError,
  errorMessage,
} from '../../utils/errors';
import { generateCorrelationId, withHttpSpan } from '../../observability/tracing';

/**
 * Single-attempt HTTP client for provider APIs. No retries, no rate limiting.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private metrics: MetricsCollector;
  private logger: Logger;
  private userAgent: string;

  constructor(config: HttpConfig, metrics: MetricsCollector, logger: Logger) {
    this.metrics = metrics;
    this.logger = logger;
    this.userAgent = config.userAgent ?? 'saved-hub/1.0';

    this.axiosInstance = axios.create({
      timeout: config.timeout ?? 30000,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url });
  }

  private async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const provider = this.extractProvider(config.url);
    const requestId = generateCorrelationId();
    const method = 'GET'; // Provider reads only

    this.logger.debug('HTTP request', {
      requestId,
      provider,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.userAgent,
      ...config.headers,
    };

    return withHttpSpan(method, config.url, async () => {
      const startTime = Date.now();

      try {
        const axiosResponse = await this.axiosInstance.request<T>({
          url: config.url,
          method,
          headers,
          params: config.query,
          timeout: config.timeout,
        });

        this.metrics.incrementCounter('http_requests_total', {
          provider,
          method,
          status: axiosResponse.status.toString(),
        });
        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          provider,
          status: axiosResponse.status,
        });

        return {
          data: axiosResponse.data,
          status: axiosResponse.status,
          headers: this.toHeaderRecord(axiosResponse.headers),
        };
      } catch (error: unknown) {
        const status = isAxiosError(error) ? error.response?.status : undefined;
        this.metrics.incrementCounter('http_requests_total', {
          provider,
          method,
          status: status?.toString() ?? 'error',
        });
        throw this.transformError(error, provider);
      }
    });
  }

  private extractProvider(url: string): string {
    if (url.includes('googleapis.com')) return 'youtube';
    if (url.includes('reddit.com')) return 'reddit';
    return 'other';
  }

  private toHeaderRecord(
    headers: RawAxiosResponseHeaders | AxiosResponseHeaders
  ): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, provider: string): Error {
    if (!isAxiosError(error)) {
      return new NetworkError(errorMessage(error), { provider, cause: error });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        provider,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, { provider });
      }
      return new ApiServerError(`Server error: ${status}`, status, { provider });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { provider });
    }
    return new NetworkError(`Network error: ${error.message}`, { provider, code: error.code });
  }
}
