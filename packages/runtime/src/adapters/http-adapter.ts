// loadramp - Node.js Runtime
// HTTP Client Adapter using Axios

import axios from 'axios';
import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { ErrorCode, LoadRampError } from '@loadramp/shared';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpAdapterConfig {
  /** Base URL prepended to relative request URLs */
  baseUrl?: string;
  /**
   * Request timeout in milliseconds.
   * @default 30000
   */
  timeout?: number;
  headers?: Record<string, string>;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string>;
  timeout?: number;
  signal?: AbortSignal;
  /** 'text' leaves the body unparsed */
  responseType?: 'json' | 'text';
  /**
   * Throw on a non-2xx status.
   * @default true
   */
  throwOnError?: boolean;
}

export interface HttpResponse<T> {
  data: T;
  status: number;
  statusText: string;
  /** Round trip time in milliseconds */
  duration: number;
}

export interface HttpAdapterErrorDetails {
  status?: number;
  data?: unknown;
  code?: string;
  isTimeout?: boolean;
  isNetworkError?: boolean;
  isCancelled?: boolean;
  cause?: Error;
}

/**
 * Failed HTTP exchange
 */
export class HttpAdapterError extends LoadRampError {
  readonly status?: number;
  readonly data?: unknown;
  readonly isTimeout: boolean;
  readonly isNetworkError: boolean;
  readonly isCancelled: boolean;

  constructor(message: string, details: HttpAdapterErrorDetails = {}) {
    const code = details.isTimeout ? ErrorCode.TIMEOUT : details.isCancelled ? ErrorCode.CANCELLED : ErrorCode.UNKNOWN;
    super(message, code, { status: details.status, code: details.code }, details.cause);
    this.name = 'HttpAdapterError';
    this.status = details.status;
    this.data = details.data;
    this.isTimeout = details.isTimeout ?? false;
    this.isNetworkError = details.isNetworkError ?? false;
    this.isCancelled = details.isCancelled ?? false;
  }
}

/**
 * HTTP adapter wrapping Axios for the Node.js runtime.
 */
export class HttpAdapter {
  private readonly config: Required<HttpAdapterConfig>;
  private readonly client: AxiosInstance;

  constructor(config: HttpAdapterConfig = {}) {
    this.config = {
      baseUrl: config.baseUrl ?? '',
      timeout: config.timeout ?? 30000,
      headers: config.headers ?? {},
    };

    this.client = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
      headers: this.config.headers,
      validateStatus: () => true, // Handle all status codes manually
    });
  }

  // ============================================
  // Core HTTP Methods
  // ============================================

  async get<T = unknown>(url: string, options?: HttpRequestOptions): Promise<HttpResponse<T>> {
    return this.request<T>('GET', url, undefined, options);
  }

  async post<T = unknown>(url: string, data?: unknown, options?: HttpRequestOptions): Promise<HttpResponse<T>> {
    return this.request<T>('POST', url, data, options);
  }

  async delete<T = unknown>(url: string, options?: HttpRequestOptions): Promise<HttpResponse<T>> {
    return this.request<T>('DELETE', url, undefined, options);
  }

  /**
   * Perform a single request. Callers own any retry policy.
   */
  async request<T = unknown>(
    method: HttpMethod,
    url: string,
    data?: unknown,
    options?: HttpRequestOptions,
  ): Promise<HttpResponse<T>> {
    let response: HttpResponse<T>;
    try {
      response = await this.executeRequest<T>(method, url, data, options);
    } catch (error) {
      throw this.normalizeError(error);
    }

    const throwOnError = options?.throwOnError ?? true;
    if (throwOnError && (response.status < 200 || response.status >= 300)) {
      throw new HttpAdapterError(`HTTP ${response.status}: ${response.statusText}`, {
        status: response.status,
        data: response.data,
      });
    }
    return response;
  }

  private async executeRequest<T>(
    method: HttpMethod,
    url: string,
    data?: unknown,
    options?: HttpRequestOptions,
  ): Promise<HttpResponse<T>> {
    const config: AxiosRequestConfig = {
      method,
      url,
      data,
      headers: options?.headers,
      params: options?.params,
      timeout: options?.timeout,
      responseType: options?.responseType,
      signal: options?.signal,
    };

    const startTime = Date.now();
    const response: AxiosResponse<T> = await this.client.request<T>(config);

    return {
      data: response.data,
      status: response.status,
      statusText: response.statusText,
      duration: Date.now() - startTime,
    };
  }

  /**
   * Normalize various error types to HttpAdapterError.
   */
  private normalizeError(error: unknown): HttpAdapterError {
    if (error instanceof HttpAdapterError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      return new HttpAdapterError(error.message || 'Request failed', {
        status: error.response?.status,
        data: error.response?.data,
        code: error.code,
        isTimeout: error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT',
        isNetworkError: error.code === 'ERR_NETWORK' || error.response === undefined,
        isCancelled: axios.isCancel(error),
        cause: error,
      });
    }

    if (error instanceof Error) {
      return new HttpAdapterError(error.message, { cause: error });
    }

    return new HttpAdapterError(String(error));
  }
}
