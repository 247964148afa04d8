// src/core/http/types.ts

export interface HttpRequestConfig {
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  timeout?: number;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface HttpConfig {
  timeout?: number; // milliseconds
  userAgent?: string;
}
