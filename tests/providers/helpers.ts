/**
 * Provider Test Helpers
 *
 * An in-process axios adapter that answers from a route table, so provider
 * clients run their real request and error-conversion code without a network.
 */

import {
  AxiosAdapter,
  AxiosError,
  AxiosResponse,
  CanceledError,
  InternalAxiosRequestConfig,
} from 'axios';

export interface FakeResponse {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type FakeRoute = FakeResponse | ((request: RecordedRequest) => FakeResponse);

export interface RecordedRequest {
  url: string;
  params: Record<string, unknown>;
  header(name: string): string | undefined;
}

export interface FakeTransport {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
  /** Request paths in call order */
  urls(): string[];
}

function recordRequest(config: InternalAxiosRequestConfig): RecordedRequest {
  const params: Record<string, unknown> = { ...config.params };
  return {
    url: config.url ?? '',
    params,
    header: (name: string) => {
      const value = config.headers.get(name);
      return value === undefined || value === null ? undefined : String(value);
    },
  };
}

/**
 * Build an adapter that answers by request path. Unknown paths answer 404.
 * An already-aborted signal rejects the way axios does.
 */
export function createFakeTransport(routes: Record<string, FakeRoute>): FakeTransport {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const recorded = recordRequest(config);
    requests.push(recorded);

    if (config.signal?.aborted) {
      throw new CanceledError(undefined, undefined, config);
    }

    const route = routes[recorded.url];
    const answer = typeof route === 'function' ? route(recorded) : route ?? { status: 404, data: {} };
    const status = answer.status ?? 200;

    const response: AxiosResponse<unknown> = {
      data: answer.data ?? {},
      status,
      statusText: String(status),
      headers: answer.headers ?? {},
      config,
    };

    if (status >= 200 && status < 300) {
      return response;
    }

    throw new AxiosError(
      `Request failed with status code ${status}`,
      status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      null,
      response
    );
  };

  return {
    adapter,
    requests,
    urls: () => requests.map(request => request.url),
  };
}

/**
 * Adapter that fails every request without a response
 */
export function createFailingTransport(code: string, message: string): AxiosAdapter {
  return async (config) => {
    throw new AxiosError(message, code, config);
  };
}
