/**
 * Review API Client
 *
 * Single GET against the homework statuses endpoint.
 * Failures come back as PollError values; nothing here retries.
 */

import axios, { type AxiosInstance } from 'axios';
import { logger, maskSecret } from '../logger.js';
import { fail, ok, type ReviewApiClientConfig, type Result } from './types.js';

export class ReviewApiClient {
  private readonly http: AxiosInstance;
  private readonly endpoint: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;

  constructor(config: ReviewApiClientConfig, http: AxiosInstance = axios.create()) {
    this.http = http;
    this.endpoint = config.endpoint;
    this.token = config.token;
    this.requestTimeoutMs = config.requestTimeoutMs;

    logger.info('Review API client initialized', {
      endpoint: config.endpoint,
      token: maskSecret(config.token),
    });
  }

  /**
   * Fetch homework statuses changed since the given Unix time
   */
  async fetchStatus(fromTimestamp: number): Promise<Result<unknown>> {
    let status: number;
    let body: unknown;

    try {
      const response = await this.http.get<unknown>(this.endpoint, {
        headers: { Authorization: `OAuth ${this.token}` },
        params: { from_date: fromTimestamp },
        timeout: this.requestTimeoutMs,
        responseType: 'text',
        // Parsing happens below so a bad body is told apart from a bad status
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug('Review API request failed', { endpoint: this.endpoint, error: message });
      return fail({
        kind: 'APIRequestError',
        message: `Connection error: ${message}`,
        endpoint: this.endpoint,
      });
    }

    if (status !== 200) {
      return fail({
        kind: 'APIRequestError',
        message: `Endpoint ${this.endpoint} is unavailable. Response code: ${status}`,
        endpoint: this.endpoint,
        statusCode: status,
      });
    }

    if (typeof body !== 'string') {
      return ok(body);
    }

    try {
      const parsed: unknown = JSON.parse(body);
      return ok(parsed);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return fail({ kind: 'ParseError', message: `JSON parse error: ${message}` });
    }
  }
}
