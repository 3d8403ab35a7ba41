import {
  checkResponse,
  classifyResponse,
  decodeJsonBody,
  defaultResponseExpectations,
  getHeader,
  resolveExpectations,
} from '../src/classify';
import type { HttpExchange } from '../src/classify';
import { HttpResponseError, HttpResponseErrorKind, errorPayloadKeys } from '../src/errors';

// Copied so the bytes share the test realm's Uint8Array
const encode = (text: string) => new Uint8Array(new TextEncoder().encode(text));

function exchange(
  status: number,
  headers: HttpExchange['headers'] = {},
  body?: string | Uint8Array
): HttpExchange {
  return {
    status,
    headers,
    ...(body !== undefined && { body: typeof body === 'string' ? encode(body) : body }),
  };
}

describe('classifyResponse', () => {
  describe('scenarios', () => {
    test('500 JSON body drops null entries from bodyJson', () => {
      const raw = '{"error":"bad","detail":null}';
      const details = classifyResponse(
        exchange(500, { 'Content-Type': 'application/json' }, raw)
      );

      expect(details).toStrictEqual({
        kind: HttpResponseErrorKind.FailedResponse,
        statusCode: 500,
        bodyData: encode(raw),
        bodyJson: { error: 'bad' },
      });
    });

    test('200 text/html where JSON is required is an unexpected content type', () => {
      const details = classifyResponse(
        exchange(200, { 'Content-Type': 'text/html' }, '<p>hello</p>'),
        { requiresContentType: 'application/json' }
      );

      expect(details).toStrictEqual({
        kind: HttpResponseErrorKind.UnexpectedContentType,
        contentType: 'text/html',
        bodyData: encode('<p>hello</p>'),
      });
    });

    test('204 where an entity is required carries no payload', () => {
      const details = classifyResponse(exchange(204), { requiresEntity: true });

      expect(details).toStrictEqual({ kind: HttpResponseErrorKind.UnexpectedNoContent });
      expect(details && errorPayloadKeys(details)).toEqual([]);
    });

    test('302 with a Location while redirects are disallowed', () => {
      const details = classifyResponse(exchange(302, { Location: 'https://example.com/x' }), {
        allowsRedirects: false,
      });

      expect(details).toStrictEqual({
        kind: HttpResponseErrorKind.UnexpectedRedirect,
        statusCode: 302,
        location: 'https://example.com/x',
      });
    });

    test('302 without a Location omits the key', () => {
      const details = classifyResponse(exchange(302), { allowsRedirects: false });

      expect(details).toStrictEqual({ kind: HttpResponseErrorKind.UnexpectedRedirect, statusCode: 302 });
      expect(details).not.toHaveProperty('location');
    });

    test('500 with an empty body carries neither bodyData nor bodyJson', () => {
      const details = classifyResponse(
        exchange(500, { 'content-type': 'application/json' }, new Uint8Array())
      );

      expect(details).toStrictEqual({ kind: HttpResponseErrorKind.FailedResponse, statusCode: 500 });
    });
  });

  describe('rule precedence', () => {
    test('redirect wins over a failing status', () => {
      const details = classifyResponse(exchange(301, { location: '/moved' }, 'moved'), {
        allowsRedirects: false,
      });

      expect(details).toStrictEqual({
        kind: HttpResponseErrorKind.UnexpectedRedirect,
        statusCode: 301,
        location: '/moved',
        bodyData: encode('moved'),
      });
    });

    test('an allowed redirect that fails the success predicate is a failed response', () => {
      expect(classifyResponse(exchange(302, { location: '/next' }))).toStrictEqual({
        kind: HttpResponseErrorKind.FailedResponse,
        statusCode: 302,
      });
    });

    test('a failing 204 is a failed response even when an entity is required', () => {
      expect(
        classifyResponse(exchange(204), {
          requiresEntity: true,
          successStatusPredicate: status => status === 200,
        })
      ).toStrictEqual({ kind: HttpResponseErrorKind.FailedResponse, statusCode: 204 });
    });

    test('a failing status wins over a wrong content type', () => {
      expect(
        classifyResponse(exchange(503, { 'content-type': 'text/html' }, '<h1>down</h1>'), {
          requiresContentType: 'application/json',
        })
      ).toStrictEqual({
        kind: HttpResponseErrorKind.FailedResponse,
        statusCode: 503,
        bodyData: encode('<h1>down</h1>'),
      });
    });

    test('no-content wins over a required content type', () => {
      expect(
        classifyResponse(exchange(204), {
          requiresEntity: true,
          requiresContentType: 'application/json',
        })
      ).toStrictEqual({ kind: HttpResponseErrorKind.UnexpectedNoContent });
    });
  });

  describe('status policies', () => {
    test('accepts 2xx by default', () => {
      expect(classifyResponse(exchange(200))).toBeUndefined();
      expect(classifyResponse(exchange(201, {}, '{}'))).toBeUndefined();
      expect(classifyResponse(exchange(204))).toBeUndefined();
    });

    test('honors a custom success predicate', () => {
      const expectations = { successStatusPredicate: (status: number) => status < 500 };

      expect(classifyResponse(exchange(404), expectations)).toBeUndefined();
      expect(classifyResponse(exchange(500), expectations)).toStrictEqual({
        kind: HttpResponseErrorKind.FailedResponse,
        statusCode: 500,
      });
    });

    test('honors a custom redirect predicate', () => {
      const expectations = {
        allowsRedirects: false,
        redirectStatusPredicate: (status: number) => status >= 300 && status < 400 && status !== 304,
        successStatusPredicate: (status: number) => status < 400,
      };

      expect(classifyResponse(exchange(304), expectations)).toBeUndefined();
      expect(classifyResponse(exchange(307), expectations)).toStrictEqual({
        kind: HttpResponseErrorKind.UnexpectedRedirect,
        statusCode: 307,
      });
    });
  });

  describe('JSON attachment', () => {
    test('skips bodies whose content type is not JSON', () => {
      expect(
        classifyResponse(exchange(400, { 'content-type': 'text/plain' }, '{"error":"bad"}'))
      ).toStrictEqual({
        kind: HttpResponseErrorKind.FailedResponse,
        statusCode: 400,
        bodyData: encode('{"error":"bad"}'),
      });
    });

    test('skips bodies without a content type', () => {
      expect(classifyResponse(exchange(400, {}, '{"error":"bad"}'))).toStrictEqual({
        kind: HttpResponseErrorKind.FailedResponse,
        statusCode: 400,
        bodyData: encode('{"error":"bad"}'),
      });
    });

    test('decodes JSON with parameters and structured suffixes', () => {
      const withCharset = classifyResponse(
        exchange(422, { 'content-type': 'application/json; charset=utf-8' }, '{"field":"name"}')
      );
      const problem = classifyResponse(
        exchange(
          409,
          { 'content-type': 'application/problem+json' },
          '{"title":"Conflict","instance":null}'
        )
      );

      expect(withCharset).toHaveProperty('bodyJson', { field: 'name' });
      expect(problem).toHaveProperty('bodyJson', { title: 'Conflict' });
    });

    test('uses a caller-supplied JSON content type predicate', () => {
      const details = classifyResponse(
        exchange(400, { 'content-type': 'application/vnd.custom' }, '{"code":7}'),
        { isJsonContentType: mediaType => mediaType.subtype === 'vnd.custom' }
      );

      expect(details).toHaveProperty('bodyJson', { code: 7 });
    });

    test.each([
      ['an array', '[{"error":"bad"}]'],
      ['a string', '"bad"'],
      ['a number', '42'],
      ['null', 'null'],
      ['truncated JSON', '{"error":'],
    ])('omits bodyJson when the body is %s', (_label, raw) => {
      expect(
        classifyResponse(exchange(500, { 'content-type': 'application/json' }, raw))
      ).toStrictEqual({
        kind: HttpResponseErrorKind.FailedResponse,
        statusCode: 500,
        bodyData: encode(raw),
      });
    });

    test('omits bodyJson when the body is not UTF-8', () => {
      const raw = new Uint8Array([0x7b, 0xff, 0x7d]);

      expect(
        classifyResponse(exchange(500, { 'content-type': 'application/json' }, raw))
      ).toStrictEqual({
        kind: HttpResponseErrorKind.FailedResponse,
        statusCode: 500,
        bodyData: new Uint8Array([0x7b, 0xff, 0x7d]),
      });
    });

    test('keeps nested nulls', () => {
      const details = classifyResponse(
        exchange(
          500,
          { 'content-type': 'application/json' },
          '{"a":{"b":null},"c":[null,1],"d":null,"e":false,"f":0}'
        )
      );

      expect(details).toHaveProperty('bodyJson', { a: { b: null }, c: [null, 1], e: false, f: 0 });
    });

    test('never attaches bodyJson to other kinds', () => {
      const details = classifyResponse(
        exchange(302, { 'content-type': 'application/json' }, '{"a":1}'),
        { allowsRedirects: false }
      );

      expect(details).not.toHaveProperty('bodyJson');
    });
  });

  describe('headers', () => {
    test('reads a Headers object', () => {
      const headers = new Headers({ 'Content-Type': 'text/csv' });

      expect(
        classifyResponse(exchange(200, headers, 'a,b'), { requiresContentType: 'application/json' })
      ).toStrictEqual({
        kind: HttpResponseErrorKind.UnexpectedContentType,
        contentType: 'text/csv',
        bodyData: encode('a,b'),
      });
    });

    test('omits contentType when the header is absent', () => {
      expect(
        classifyResponse(exchange(200), { requiresContentType: 'application/json' })
      ).toStrictEqual({ kind: HttpResponseErrorKind.UnexpectedContentType });
    });

    test('treats an empty Location as absent', () => {
      expect(
        classifyResponse(exchange(303, { location: '' }), { allowsRedirects: false })
      ).toStrictEqual({ kind: HttpResponseErrorKind.UnexpectedRedirect, statusCode: 303 });
    });

    test('passes a matching content type', () => {
      expect(
        classifyResponse(exchange(200, { 'CONTENT-TYPE': 'application/json' }, '{}'), {
          requiresContentType: ['application/json', 'text/*'],
        })
      ).toBeUndefined();
    });
  });

  describe('body data', () => {
    test('copies the body bytes', () => {
      const raw = encode('oops');
      const details = classifyResponse(exchange(500, {}, raw));
      raw[0] = 0;

      expect(details).toHaveProperty('bodyData', encode('oops'));
    });

    test('is deterministic', () => {
      const input = exchange(500, { 'content-type': 'application/json' }, '{"a":1,"b":null}');

      expect(classifyResponse(input)).toStrictEqual(classifyResponse(input));
    });
  });
});

describe('checkResponse', () => {
  test('returns for acceptable exchanges', () => {
    expect(checkResponse(exchange(200))).toBeUndefined();
  });

  test('throws an HttpResponseError with the request', () => {
    const failing: HttpExchange = {
      ...exchange(503, { 'content-type': 'application/json' }, '{"retry":true}'),
      request: { method: 'POST', url: '/orders' },
    };

    let thrown: unknown;
    try {
      checkResponse(failing);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(HttpResponseError);
    expect(thrown).toMatchObject({
      message: 'POST /orders: failed response with status 503',
      kind: HttpResponseErrorKind.FailedResponse,
      code: 'FAILED_RESPONSE',
      request: { method: 'POST', url: '/orders' },
      details: { statusCode: 503, bodyJson: { retry: true } },
    });
  });
});

describe('resolveExpectations', () => {
  test('fills in defaults', () => {
    const resolved = resolveExpectations();

    expect(resolved.allowsRedirects).toBe(true);
    expect(resolved.requiresEntity).toBe(false);
    expect(resolved.requiresContentType).toBeUndefined();
    expect(resolved.successStatusPredicate(200)).toBe(true);
    expect(resolved.successStatusPredicate(299)).toBe(true);
    expect(resolved.successStatusPredicate(300)).toBe(false);
    expect(resolved.redirectStatusPredicate(301)).toBe(true);
    expect(resolved.redirectStatusPredicate(400)).toBe(false);
    expect(resolved.isJsonContentType).toBe(defaultResponseExpectations.isJsonContentType);
  });

  test('keeps defaults for overrides set to undefined', () => {
    const resolved = resolveExpectations({ allowsRedirects: undefined, requiresEntity: true });

    expect(resolved.allowsRedirects).toBe(true);
    expect(resolved.requiresEntity).toBe(true);
  });
});

describe('getHeader', () => {
  test('looks up record headers case-insensitively', () => {
    expect(getHeader({ 'Content-Type': 'text/plain' }, 'content-type')).toBe('text/plain');
  });

  test('joins array values', () => {
    expect(getHeader({ 'x-tags': ['a', 'b'] }, 'X-Tags')).toBe('a, b');
  });

  test('returns undefined for missing or empty headers', () => {
    expect(getHeader({}, 'location')).toBeUndefined();
    expect(getHeader({ location: undefined }, 'location')).toBeUndefined();
    expect(getHeader(new Headers(), 'location')).toBeUndefined();
  });
});

describe('decodeJsonBody', () => {
  test('keeps __proto__ as an own property', () => {
    const json = decodeJsonBody(encode('{"__proto__":{"polluted":true},"a":1}'));

    expect(json && Object.getPrototypeOf(json)).toBe(Object.prototype);
    expect(json && Object.prototype.hasOwnProperty.call(json, '__proto__')).toBe(true);
    expect(json?.a).toBe(1);
  });

  test('strips a leading byte order mark', () => {
    expect(decodeJsonBody(new Uint8Array([0xef, 0xbb, 0xbf, ...encode('{"a":1}')]))).toEqual({
      a: 1,
    });
  });
});
