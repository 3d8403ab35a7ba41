/**
 * Error domain for {@link HttpResponseError} values
 */
export const HTTP_RESPONSE_ERROR_DOMAIN = 'http-response-classifier.HttpResponseError';

/**
 * Kinds of unacceptable HTTP responses.
 *
 * This is a closed set. Adding a member breaks exhaustive `switch` statements
 * in consumers.
 */
export enum HttpResponseErrorKind {
  /** The status code indicates failure. Carries `statusCode`, `bodyData`, `bodyJson` */
  FailedResponse = 1,
  /** The Content-Type header did not match. Carries `contentType`, `bodyData` */
  UnexpectedContentType = 2,
  /** A 204 No Content was returned where an entity was expected */
  UnexpectedNoContent = 3,
  /** A redirect was returned while redirects are disabled. Carries `statusCode`, `location`, `bodyData` */
  UnexpectedRedirect = 4,
}

/**
 * Payload keys, named after the fields of {@link HttpResponseErrorDetails}
 */
export const HttpResponseErrorKey = {
  /** `number`, the status code of the response */
  StatusCode: 'statusCode',
  /** `Uint8Array`, the raw body of the response */
  BodyData: 'bodyData',
  /**
   * The body decoded as a JSON object. Absent when the Content-Type is not
   * JSON, when decoding fails or when the top-level value is not an object.
   * Never holds a top-level `null`.
   */
  BodyJSON: 'bodyJson',
  /** `string`, the Content-Type header of the response */
  ContentType: 'contentType',
  /** `string`, the Location header of the response. May be absent */
  Location: 'location',
} as const;

export type HttpResponseErrorKey = (typeof HttpResponseErrorKey)[keyof typeof HttpResponseErrorKey];

const payloadKeys: ReadonlySet<string> = new Set(Object.values(HttpResponseErrorKey));

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A decoded JSON body. Only top-level entries are guaranteed non-null.
 */
export type JsonBodyObject = { [key: string]: Exclude<JsonValue, null> };

/**
 * `bodyJson` is a view of `bodyData`, so it only appears alongside it
 */
export type FailedResponseDetails = {
  readonly kind: HttpResponseErrorKind.FailedResponse;
  readonly statusCode: number;
} & (
  | { readonly bodyData?: undefined; readonly bodyJson?: undefined }
  | { readonly bodyData: Uint8Array; readonly bodyJson?: Readonly<JsonBodyObject> }
);

export interface UnexpectedContentTypeDetails {
  readonly kind: HttpResponseErrorKind.UnexpectedContentType;
  readonly contentType?: string;
  readonly bodyData?: Uint8Array;
}

export interface UnexpectedNoContentDetails {
  readonly kind: HttpResponseErrorKind.UnexpectedNoContent;
}

export interface UnexpectedRedirectDetails {
  readonly kind: HttpResponseErrorKind.UnexpectedRedirect;
  readonly statusCode: number;
  readonly location?: string;
  readonly bodyData?: Uint8Array;
}

export type HttpResponseErrorDetails =
  | FailedResponseDetails
  | UnexpectedContentTypeDetails
  | UnexpectedNoContentDetails
  | UnexpectedRedirectDetails;

export type DetailsOfKind<K extends HttpResponseErrorKind> = Extract<
  HttpResponseErrorDetails,
  { kind: K }
>;

/**
 * The request an exchange answered, for messages and logging
 */
export interface ResponseErrorRequest {
  /** HTTP method (GET, POST, etc.) */
  method: string;
  /** Request URL */
  url: string;
}

/**
 * Error codes for programmatic handling, one per kind
 */
export const HttpResponseErrorCode: Record<HttpResponseErrorKind, string> = {
  [HttpResponseErrorKind.FailedResponse]: 'FAILED_RESPONSE',
  [HttpResponseErrorKind.UnexpectedContentType]: 'UNEXPECTED_CONTENT_TYPE',
  [HttpResponseErrorKind.UnexpectedNoContent]: 'UNEXPECTED_NO_CONTENT',
  [HttpResponseErrorKind.UnexpectedRedirect]: 'UNEXPECTED_REDIRECT',
};

/**
 * Thrown when a completed HTTP exchange does not satisfy the caller's
 * expectations. Branch on `kind` (or `details.kind`) and read only the
 * fields of that case.
 */
export class HttpResponseError extends Error {
  /** Error domain, shared by every HttpResponseError */
  readonly domain: typeof HTTP_RESPONSE_ERROR_DOMAIN = HTTP_RESPONSE_ERROR_DOMAIN;
  /** Error code for programmatic handling */
  readonly code: string;
  readonly kind: HttpResponseErrorKind;
  readonly details: Readonly<HttpResponseErrorDetails>;
  readonly request?: Readonly<ResponseErrorRequest>;

  /**
   * Creates an instance of HttpResponseError
   * @param details - The classified failure
   * @param request - The request the response answered, if known
   */
  constructor(details: HttpResponseErrorDetails, request?: ResponseErrorRequest) {
    super(describeHttpResponseError(details, request));
    this.name = this.constructor.name;
    this.kind = details.kind;
    this.code = HttpResponseErrorCode[details.kind];
    this.details = freezeDetails(details);
    if (request) {
      this.request = Object.freeze({ method: request.method, url: request.url });
    }

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Copies details so nothing reachable from the error can change: `bodyJson`
 * is deep-frozen and `bodyData` is served as a fresh copy on every read
 */
function freezeDetails(details: HttpResponseErrorDetails): Readonly<HttpResponseErrorDetails> {
  const copy = { ...details };
  if ('bodyData' in details && details.bodyData) {
    const bytes = new Uint8Array(details.bodyData);
    Object.defineProperty(copy, HttpResponseErrorKey.BodyData, {
      get: () => new Uint8Array(bytes),
      enumerable: true,
    });
  }
  if ('bodyJson' in details && details.bodyJson) {
    Object.defineProperty(copy, HttpResponseErrorKey.BodyJSON, {
      value: freezeBodyJson(details.bodyJson),
      enumerable: true,
    });
  }
  return Object.freeze(copy);
}

function freezeBodyJson(body: Readonly<JsonBodyObject>): Readonly<JsonBodyObject> {
  const entries: [string, Exclude<JsonValue, null>][] = [];
  for (const [key, value] of Object.entries(body)) {
    const frozen = frozenJsonCopy(value);
    if (frozen !== null) {
      entries.push([key, frozen]);
    }
  }
  return Object.freeze(Object.fromEntries(entries));
}

function frozenJsonCopy(value: JsonValue): JsonValue {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  const copy = Array.isArray(value)
    ? value.map(frozenJsonCopy)
    : Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [key, frozenJsonCopy(entry)] as const)
      );
  Object.freeze(copy);
  return copy;
}

/**
 * Builds the human-readable message for a classified failure
 */
export function describeHttpResponseError(
  details: HttpResponseErrorDetails,
  request?: ResponseErrorRequest
): string {
  const prefix = request ? `${request.method.toUpperCase()} ${request.url}: ` : '';

  switch (details.kind) {
    case HttpResponseErrorKind.FailedResponse:
      return `${prefix}failed response with status ${details.statusCode}`;
    case HttpResponseErrorKind.UnexpectedContentType:
      return `${prefix}unexpected Content-Type ${details.contentType ?? '(none)'}`;
    case HttpResponseErrorKind.UnexpectedNoContent:
      return `${prefix}unexpected 204 No Content`;
    case HttpResponseErrorKind.UnexpectedRedirect: {
      const target = details.location !== undefined ? ` to ${details.location}` : '';
      return `${prefix}unexpected redirect with status ${details.statusCode}${target}`;
    }
    default: {
      const unknown: never = details;
      return `${prefix}unknown response error ${JSON.stringify(unknown)}`;
    }
  }
}

/**
 * Checks whether a value is an HttpResponseError, optionally of a given kind
 * @example
 * ```typescript
 * if (isHttpResponseError(error, HttpResponseErrorKind.FailedResponse)) {
 *   console.log(error.details.statusCode, error.details.bodyJson);
 * }
 * ```
 */
export function isHttpResponseError<K extends HttpResponseErrorKind = HttpResponseErrorKind>(
  value: unknown,
  kind?: K
): value is HttpResponseError & { readonly kind: K; readonly details: Readonly<DetailsOfKind<K>> } {
  if (!(value instanceof HttpResponseError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
}

/**
 * Lists the payload keys present on a classified failure
 */
export function errorPayloadKeys(details: HttpResponseErrorDetails): HttpResponseErrorKey[] {
  return Object.keys(details).filter(isPayloadKey);
}

function isPayloadKey(key: string): key is HttpResponseErrorKey {
  return payloadKeys.has(key);
}
