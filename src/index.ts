export {
  HTTP_RESPONSE_ERROR_DOMAIN,
  HttpResponseError,
  HttpResponseErrorKind,
  HttpResponseErrorKey,
  HttpResponseErrorCode,
  describeHttpResponseError,
  isHttpResponseError,
  errorPayloadKeys,
} from './errors.js';
export type {
  HttpResponseErrorDetails,
  FailedResponseDetails,
  UnexpectedContentTypeDetails,
  UnexpectedNoContentDetails,
  UnexpectedRedirectDetails,
  DetailsOfKind,
  ResponseErrorRequest,
  JsonPrimitive,
  JsonValue,
  JsonObject,
  JsonBodyObject,
} from './errors.js';

export {
  classifyResponse,
  checkResponse,
  decodeJsonBody,
  defaultResponseExpectations,
  getHeader,
  resolveExpectations,
} from './classify.js';
export type { HttpExchange, HeaderSource, ResponseExpectations } from './classify.js';

export { parseMediaType, matchesContentType, isJsonMediaType } from './content-type.js';
export type { MediaType, ContentTypeMatcher } from './content-type.js';

export { responseValidationPlugin, toHttpExchange } from './xior-plugin.js';
export type { FetchFunction, ResponseValidationOptions } from './xior-plugin.js';

export { parseHttpDate, getDateHeader } from './http-date.js';

export { XiorError, isXiorError } from 'xior';
export type { XiorPlugin, XiorResponse } from 'xior';
