// src/core/http/client.ts
import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from '../config/constants.js';
import { ErrorCode, VidError } from '../errors.js';

export interface HttpResponse {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Statuses other than 2xx that should be returned instead of thrown (e.g. 304). */
  acceptStatus?: number[];
}

/**
 * A single bounded-timeout GET. Everything the planner and the iterators
 * fetch goes through this interface.
 */
export interface Fetcher {
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;
}

export interface HttpClientOptions {
  timeout?: number;
  userAgent?: string;
  verbose?: boolean;
}

const DEFAULT_HEADERS = {
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.8,*/*;q=0.7',
  'Accept-Language': 'en-US,en;q=0.9',
};

export class HttpClient implements Fetcher {
  private options: Required<HttpClientOptions>;

  constructor(options: HttpClientOptions = {}) {
    this.options = {
      timeout: options.timeout ?? DEFAULT_TIMEOUT,
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      verbose: options.verbose ?? false,
    };
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    if (this.options.verbose) {
      console.log(`[Http] GET ${url}`);
    }

    const { response, body } = await this.send(url, options);

    const accepted = options.acceptStatus?.includes(response.status) ?? false;
    if (!response.ok && !accepted) {
      throw new VidError(
        ErrorCode.FETCH_FAILED,
        `HTTP ${response.status}: ${response.statusText} (${url})`,
        response.status === 429 || response.status >= 500,
        undefined,
        { url, status: response.status }
      );
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    return { url, status: response.status, headers, body };
  }

  private async send(url: string, options: RequestOptions): Promise<{ response: Response; body: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          ...DEFAULT_HEADERS,
          'User-Agent': this.options.userAgent,
          ...options.headers,
        },
        signal: controller.signal,
      });
      return { response, body: await response.text() };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new VidError(
          ErrorCode.TIMEOUT,
          `Request timed out after ${this.options.timeout}ms: ${url}`,
          true,
          'Increase the timeout with --timeout',
          { url }
        );
      }
      throw new VidError(
        ErrorCode.FETCH_FAILED,
        `Request failed: ${url} (${error instanceof Error ? error.message : String(error)})`,
        true,
        undefined,
        { url }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
