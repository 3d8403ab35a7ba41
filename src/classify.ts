import { isJsonMediaType, matchesContentType, parseMediaType } from './content-type.js';
import type { ContentTypeMatcher, MediaType } from './content-type.js';
import {
  HttpResponseError,
  HttpResponseErrorKind,
  type HttpResponseErrorDetails,
  type JsonBodyObject,
  type JsonValue,
  type ResponseErrorRequest,
} from './errors.js';

/**
 * Response headers as a WHATWG Headers object or a plain record.
 * Record lookups are case-insensitive; array values are joined with ", ".
 */
export type HeaderSource =
  | Headers
  | Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * A completed HTTP exchange handed over by the transport
 */
export interface HttpExchange {
  /** HTTP status code */
  status: number;
  /** Response headers */
  headers: HeaderSource;
  /** Raw response body, possibly empty */
  body?: Uint8Array;
  /** The request the response answered */
  request?: ResponseErrorRequest;
}

export interface ResponseExpectations {
  /**
   * Whether redirect responses are acceptable
   * @default true
   */
  allowsRedirects: boolean;
  /**
   * Content-Type the response must carry. Unset means any.
   */
  requiresContentType?: ContentTypeMatcher;
  /**
   * Whether a 204 No Content is a failure
   * @default false
   */
  requiresEntity: boolean;
  /**
   * Decides which status codes count as success
   * @default 2xx
   */
  successStatusPredicate: (status: number) => boolean;
  /**
   * Decides which status codes count as redirects
   * @default 3xx
   */
  redirectStatusPredicate: (status: number) => boolean;
  /**
   * Decides which Content-Types carry a JSON body worth decoding on failure
   * @default application/json and any +json suffix
   */
  isJsonContentType: (mediaType: MediaType) => boolean;
}

export const defaultResponseExpectations: Readonly<ResponseExpectations> = Object.freeze({
  allowsRedirects: true,
  requiresEntity: false,
  successStatusPredicate: (status: number) => status >= 200 && status < 300,
  redirectStatusPredicate: (status: number) => status >= 300 && status < 400,
  isJsonContentType: isJsonMediaType,
});

/**
 * Merges caller overrides over {@link defaultResponseExpectations}.
 * Overrides set to undefined keep the default.
 */
export function resolveExpectations(
  overrides: Partial<ResponseExpectations> = {}
): ResponseExpectations {
  const defaults = defaultResponseExpectations;
  return {
    allowsRedirects: overrides.allowsRedirects ?? defaults.allowsRedirects,
    requiresContentType: overrides.requiresContentType ?? defaults.requiresContentType,
    requiresEntity: overrides.requiresEntity ?? defaults.requiresEntity,
    successStatusPredicate: overrides.successStatusPredicate ?? defaults.successStatusPredicate,
    redirectStatusPredicate: overrides.redirectStatusPredicate ?? defaults.redirectStatusPredicate,
    isJsonContentType: overrides.isJsonContentType ?? defaults.isJsonContentType,
  };
}

/**
 * Reads a header, treating missing and empty values alike
 */
export function getHeader(headers: HeaderSource, name: string): string | undefined {
  let value: string | null | undefined;
  if (headers instanceof Headers) {
    value = headers.get(name);
  } else {
    const wanted = name.toLowerCase();
    for (const [key, entry] of Object.entries(headers)) {
      if (key.toLowerCase() === wanted && entry !== undefined) {
        value = typeof entry === 'string' ? entry : entry.join(', ');
        break;
      }
    }
  }
  return value ? value : undefined;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decodes a response body as a JSON object for attachment to a failure.
 *
 * Returns undefined when the bytes are not UTF-8, are not JSON or when the
 * top-level value is not an object. Top-level null entries are dropped;
 * nested values are returned untouched.
 */
export function decodeJsonBody(body: Uint8Array): JsonBodyObject | undefined {
  let value: JsonValue;
  try {
    value = JSON.parse(utf8.decode(body));
  } catch {
    // Undecodable bodies leave bodyJson unset
    return undefined;
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(
    Object.entries(value).filter(
      (entry): entry is [string, Exclude<JsonValue, null>] => entry[1] !== null
    )
  );
}

/**
 * Classifies a completed exchange against the caller's expectations.
 *
 * Rules are checked in a fixed order and the first match wins: disallowed
 * redirect, failing status, unexpected 204, unexpected Content-Type.
 *
 * @param exchange - The status, headers and body of the response
 * @param expectations - Overrides for {@link defaultResponseExpectations}
 * @returns The failure details, or undefined when the exchange is acceptable
 */
export function classifyResponse(
  exchange: HttpExchange,
  expectations: Partial<ResponseExpectations> = {}
): HttpResponseErrorDetails | undefined {
  const {
    allowsRedirects,
    requiresContentType,
    requiresEntity,
    successStatusPredicate,
    redirectStatusPredicate,
    isJsonContentType,
  } = resolveExpectations(expectations);
  const { status } = exchange;
  const bodyData =
    exchange.body && exchange.body.byteLength > 0 ? new Uint8Array(exchange.body) : undefined;
  const contentType = getHeader(exchange.headers, 'content-type');

  if (!allowsRedirects && redirectStatusPredicate(status)) {
    const location = getHeader(exchange.headers, 'location');
    return {
      kind: HttpResponseErrorKind.UnexpectedRedirect,
      statusCode: status,
      ...(location !== undefined && { location }),
      ...(bodyData && { bodyData }),
    };
  }

  if (!successStatusPredicate(status)) {
    if (!bodyData) {
      return { kind: HttpResponseErrorKind.FailedResponse, statusCode: status };
    }
    const mediaType = contentType !== undefined ? parseMediaType(contentType) : undefined;
    const bodyJson = mediaType && isJsonContentType(mediaType) ? decodeJsonBody(bodyData) : undefined;
    return {
      kind: HttpResponseErrorKind.FailedResponse,
      statusCode: status,
      bodyData,
      ...(bodyJson && { bodyJson }),
    };
  }

  if (status === 204 && requiresEntity) {
    return { kind: HttpResponseErrorKind.UnexpectedNoContent };
  }

  if (requiresContentType !== undefined && !matchesContentType(contentType, requiresContentType)) {
    return {
      kind: HttpResponseErrorKind.UnexpectedContentType,
      ...(contentType !== undefined && { contentType }),
      ...(bodyData && { bodyData }),
    };
  }

  return undefined;
}

/**
 * Throws an {@link HttpResponseError} when the exchange does not satisfy
 * the caller's expectations
 */
export function checkResponse(
  exchange: HttpExchange,
  expectations: Partial<ResponseExpectations> = {}
): void {
  const details = classifyResponse(exchange, expectations);
  if (details) {
    throw new HttpResponseError(details, exchange.request);
  }
}
