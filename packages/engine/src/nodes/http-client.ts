/**
 * Default HTTP client for get_api and post_api nodes, backed by axios.
 *
 * @module @nodeflow/engine/nodes/http-client
 */

import axios, { type AxiosInstance } from 'axios';
import { RetryableError } from '@nodeflow/core';
import type { HttpClient, HttpRequest, HttpResponse } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;

export class AxiosHttpClient implements HttpClient {
  private client: AxiosInstance;

  constructor(options: { timeoutMs?: number; headers?: Record<string, string> } = {}) {
    this.client = axios.create({
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: {
        Accept: 'application/json',
        ...options.headers,
      },
      // Status handling belongs to the calling node
      validateStatus: () => true,
    });
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        params: request.params,
        data: request.data,
        timeout: request.timeoutMs,
        signal: request.signal,
      });

      const headers: Record<string, string> = {};
      for (const [name, value] of Object.entries(response.headers)) {
        if (typeof value === 'string') headers[name.toLowerCase()] = value;
      }

      return { status: response.status, headers, body: response.data };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new RetryableError(`Network error: ${error.message}`, 'NETWORK_ERROR', {
          cause: error,
          context: { url: request.url, method: request.method, code: error.code },
        });
      }
      throw error;
    }
  }
}
