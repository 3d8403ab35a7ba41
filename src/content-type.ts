/**
 * A parsed Content-Type value
 */
export interface MediaType {
  /** Top-level type, lower-cased (e.g. "application") */
  type: string;
  /** Subtype including any structured suffix, lower-cased (e.g. "problem+json") */
  subtype: string;
  /** Structured syntax suffix without the "+" (e.g. "json"), if present */
  suffix?: string;
  /** Parameters keyed by lower-cased name, with quotes removed from values */
  parameters: Record<string, string>;
}

/**
 * Describes which Content-Type values a caller accepts.
 * - String: a media range such as "application/json", "text/*" or "*\/*"
 * - Array: several media ranges, any of which may match
 * - Function: custom matching over the parsed media type
 */
export type ContentTypeMatcher = string | readonly string[] | ((mediaType: MediaType) => boolean);

const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/**
 * Splits a header value on ";" outside quoted strings
 */
function splitParameters(value: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (quoted && char === '\\' && i + 1 < value.length) {
      current += char + value[++i];
      continue;
    }
    if (char === '"') {
      quoted = !quoted;
    } else if (char === ';' && !quoted) {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);
  return parts;
}

/**
 * Parses a Content-Type header value
 * @param value - The raw header value
 * @returns The media type, or undefined if the value is empty or malformed
 */
export function parseMediaType(value: string): MediaType | undefined {
  const [essence, ...rawParameters] = splitParameters(value);
  const slash = essence.indexOf('/');
  if (slash === -1) {
    return undefined;
  }

  const type = essence.slice(0, slash).trim().toLowerCase();
  const subtype = essence.slice(slash + 1).trim().toLowerCase();
  if (!TOKEN.test(type) || !TOKEN.test(subtype)) {
    return undefined;
  }

  const parameters: Record<string, string> = {};
  for (const rawParameter of rawParameters) {
    const equals = rawParameter.indexOf('=');
    if (equals === -1) {
      continue;
    }
    const name = rawParameter.slice(0, equals).trim().toLowerCase();
    let parameterValue = rawParameter.slice(equals + 1).trim();
    if (parameterValue.length >= 2 && parameterValue.startsWith('"') && parameterValue.endsWith('"')) {
      parameterValue = parameterValue.slice(1, -1).replace(/\\(.)/g, '$1');
    }
    // First occurrence wins
    if (name && !(name in parameters)) {
      parameters[name] = parameterValue;
    }
  }

  const plus = subtype.lastIndexOf('+');
  const suffix = plus > 0 && plus < subtype.length - 1 ? subtype.slice(plus + 1) : undefined;

  return {
    type,
    subtype,
    ...(suffix !== undefined && { suffix }),
    parameters,
  };
}

/**
 * Checks a parsed media type against a single media range
 */
function matchesMediaRange(mediaType: MediaType, range: string): boolean {
  const [rangeType = '', rangeSubtype = ''] = range.split(';')[0].trim().toLowerCase().split('/');
  if (rangeType === '*') {
    return rangeSubtype === '*';
  }
  if (rangeType !== mediaType.type) {
    return false;
  }
  return rangeSubtype === '*' || rangeSubtype === mediaType.subtype;
}

/**
 * Checks whether a Content-Type header satisfies a matcher.
 * An absent or malformed header never matches.
 * @param header - The raw Content-Type header value
 * @param matcher - The accepted media ranges, or a predicate
 */
export function matchesContentType(
  header: string | undefined,
  matcher: ContentTypeMatcher
): boolean {
  if (header === undefined) {
    return false;
  }
  const mediaType = parseMediaType(header);
  if (!mediaType) {
    return false;
  }

  if (typeof matcher === 'function') {
    return matcher(mediaType);
  }
  const ranges: readonly string[] = typeof matcher === 'string' ? [matcher] : matcher;
  return ranges.some(range => matchesMediaRange(mediaType, range));
}

/**
 * Recognizes "application/json" and any "+json" structured suffix
 * (e.g. "application/problem+json")
 */
export function isJsonMediaType(mediaType: MediaType): boolean {
  if (mediaType.type === 'application' && mediaType.subtype === 'json') {
    return true;
  }
  return mediaType.suffix === 'json';
}
