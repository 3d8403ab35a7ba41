import { XiorError } from 'xior';
import type { XiorPlugin, XiorResponse } from 'xior';
import { classifyResponse, getHeader, resolveExpectations } from './classify.js';
import type { HttpExchange, ResponseExpectations } from './classify.js';
import { HttpResponseError, HttpResponseErrorKind } from './errors.js';
import { logData, logError } from './logger.js';

export interface ResponseValidationOptions extends Partial<ResponseExpectations> {
  /**
   * Name used in log output
   */
  name?: string;
  /**
   * Whether to log rejected responses and transport errors
   */
  debug?: boolean;
  /**
   * fetch implementation the request goes through
   * @default globalThis.fetch
   */
  fetch?: FetchFunction;
}

/**
 * A fetch implementation, as passed to xior
 */
export type FetchFunction = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

/**
 * Builds an exchange record from a xior response.
 * xior has already decoded `data`, so the body is taken from `body` (the raw
 * bytes read off the wire) and is omitted when those are unknown.
 */
export function toHttpExchange(
  response: Pick<XiorResponse, 'status' | 'headers' | 'config'>,
  body?: Uint8Array
): HttpExchange {
  return {
    status: response.status,
    headers: response.headers,
    ...(body && { body }),
    request: {
      method: (response.config?.method || 'GET').toUpperCase(),
      url: response.config?.url || '',
    },
  };
}

/**
 * xior plugin that rejects responses which do not satisfy the given
 * expectations with an {@link HttpResponseError}.
 *
 * Responses xior itself rejects for their status are classified too, so a
 * custom `successStatusPredicate` can turn them back into successes. When
 * redirects are disallowed the request is sent with `redirect: 'manual'` so
 * the 3xx response reaches the classifier.
 *
 * The request is given a `fetch` that keeps a copy of the raw response bytes,
 * and `bodyData` is built from that copy rather than from xior's decoded `data`.
 *

 * @example
 * ```typescript
 * const client = xior.create({ baseURL: 'https://api.example.com' });
 * client.plugins.use(
 *   responseValidationPlugin({ requiresContentType: 'application/json', allowsRedirects: false })
 * );
 * ```
 */
export function responseValidationPlugin(options: ResponseValidationOptions = {}): XiorPlugin {
  const { name = 'ResponseValidation', debug = false, fetch: fetchOption, ...overrides } = options;
  const expectations = resolveExpectations(overrides);

  const validate = (response: XiorResponse, body: Uint8Array | undefined): XiorResponse => {
    const exchange = toHttpExchange(response, body);
    const details = classifyResponse(exchange, expectations);
    if (!details) {
      return response;
    }

    const error = new HttpResponseError(details, exchange.request);
    if (debug) {
      logData(`[${name}] ${error.message}`, {
        kind: HttpResponseErrorKind[details.kind],
        status: exchange.status,
        contentType: getHeader(exchange.headers, 'content-type'),
      });
    }
    throw error;
  };

  return adapter => async config => {
    // xior decodes the body it reads, so a clone of each response is read
    // here to keep the bytes as sent
    let body: Uint8Array | undefined;
    const baseFetch: FetchFunction = fetchOption ?? ((input, init) => globalThis.fetch(input, init));
    const capturingFetch: FetchFunction = async (input, init) => {
      const response = await baseFetch(input, init);
      body = new Uint8Array(await response.clone().arrayBuffer());
      return response;
    };
    const request = {
      ...config,
      fetch: capturingFetch,
      ...(!expectations.allowsRedirects && { redirect: 'manual' as const }),
    };

    let response: XiorResponse;
    try {
      response = await adapter(request);
    } catch (error) {
      if (error instanceof XiorError && error.response) {
        return validate(error.response, body);
      }
      if (debug) {
        logError(error, `[${name}] ${(config.method || 'GET').toUpperCase()} ${config.url || ''}`);
      }
      throw error;
    }
    return validate(response, body);
  };
}
