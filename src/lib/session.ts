import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { Logger } from 'pino';
import type { DeleteOptions, PostOptions, QueryParams, Transport } from '../types/common';
import { toSapiError } from './error-handler';
import { logger } from './logger';

export const USER_AGENT = 'sapi-resources/0.1.0';

export interface SessionOptions {
  endpoint: string;
  token?: string;
  requestTimeoutSec?: number;
  headers?: Record<string, string>;
  adapter?: AxiosAdapter;
}

export function joinUrl(base: string, path: string): string {
  if (!path) return base;
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export class SapiSession implements Transport {
  readonly baseUrl: string;
  private readonly options: SessionOptions;
  private readonly http: AxiosInstance;
  private readonly log: Logger;

  constructor(options: SessionOptions) {
    this.options = options;
    this.baseUrl = options.endpoint;
    this.log = logger.child({ baseUrl: this.baseUrl });

    const headers: Record<string, string> = { 'User-Agent': USER_AGENT, ...options.headers };
    if (options.token) headers['X-Auth-Token'] = options.token;

    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: (options.requestTimeoutSec ?? 0) * 1000,
      headers,
      adapter: options.adapter,
    });
  }

  withPath(path: string): SapiSession {
    return new SapiSession({ ...this.options, endpoint: joinUrl(this.baseUrl, path) });
  }

  get(path: string, params?: QueryParams): Promise<unknown> {
    return this.request({ method: 'GET', url: path, params });
  }

  post(path: string, options: PostOptions): Promise<unknown> {
    const data = 'body' in options ? options.body : options.json;
    return this.request({ method: 'POST', url: path, data, headers: options.headers });
  }

  delete(path: string, options: DeleteOptions = {}): Promise<unknown> {
    return this.request({ method: 'DELETE', url: path, data: options.json, headers: options.headers });
  }

  private async request(request: AxiosRequestConfig): Promise<unknown> {
    this.log.debug({ method: request.method, url: request.url, params: request.params }, 'SAPI request');
    try {
      const response = await this.http.request<unknown>(request);
      this.log.debug({ method: request.method, url: request.url, status: response.status }, 'SAPI response');
      return response.data;
    } catch (err) {
      const error = toSapiError(err);
      this.log.debug({ method: request.method, url: request.url, err: error }, 'SAPI request failed');
      throw error;
    }
  }
}
