/**
 * Unit tests for SearchApiClient
 *
 * The global fetch is replaced by a mock answering with in-memory Responses.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { SearchApiConfig, SearchApiCredentialsMissingError } from '../../config/index.js';
import { Query, exact } from '../../query/index.js';
import { SearchApiError } from './errors.js';
import {
  PAGE_SIZE,
  SearchApiClient,
  parseRetryAfter,
  parseSearchResponse,
  toSearchEntry,
} from './search-api-client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function page(total: number, entries: unknown[] | null, balance = 42): unknown {
  return { balance, entries, success: true, took: '12µs', total };
}

async function captureError(promise: Promise<unknown>): Promise<SearchApiError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SearchApiError) return error;
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

describe('SearchApiClient', () => {
  let fetchMock: Mock<typeof fetch>;
  let client: SearchApiClient;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
    client = new SearchApiClient({
      email: 'analyst@example.com',
      apiKey: 'TEST-KEY',
      pageIntervalMs: 0,
      config: new SearchApiConfig({}),
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    SearchApiClient.resetInstance();
  });

  function requestedUrl(call: number): URL {
    const [input] = fetchMock.mock.calls[call];
    return new URL(String(input));
  }

  describe('Constructor', () => {
    it('should reject a non-HTTPS base URL', () => {
      expect(
        () =>
          new SearchApiClient({
            email: 'analyst@example.com',
            apiKey: 'test-key',
            baseUrl: 'http://localhost:8080/search',
            config: new SearchApiConfig({}),
          })
      ).toThrow('Search API base URL must use HTTPS, got http://localhost:8080');
    });

    it('should require credentials when none are configured', () => {
      expect(() => new SearchApiClient({ config: new SearchApiConfig({}) })).toThrow(
        SearchApiCredentialsMissingError
      );
    });

    it('should fall back to configured credentials', async () => {
      const configured = new SearchApiClient({
        config: new SearchApiConfig({
          SEARCH_API_EMAIL: 'team@example.com',
          SEARCH_API_KEY: 'ABC',
        }),
      });
      fetchMock.mockResolvedValueOnce(jsonResponse(page(0, null)));

      await configured.execute(Query.email('jane@example.com'));

      const [, init] = fetchMock.mock.calls[0];
      const expected = Buffer.from('team@example.com:abc').toString('base64');
      expect(new Headers(init?.headers).get('Authorization')).toBe(`Basic ${expected}`);
    });
  });

  describe('execute()', () => {
    it('should send the query with basic auth and a lower-cased key', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(page(0, null)));

      await client.execute(Query.email(exact('jane@example.com')));

      const url = requestedUrl(0);
      expect(url.origin + url.pathname).toBe('https://api.dehashed.com/search');
      expect(url.searchParams.get('query')).toBe('email:"jane@example.com"');
      expect(url.searchParams.get('size')).toBe(String(PAGE_SIZE));
      expect(url.searchParams.get('page')).toBe('1');

      const [, init] = fetchMock.mock.calls[0];
      const headers = new Headers(init?.headers);
      const expected = Buffer.from('analyst@example.com:test-key').toString('base64');
      expect(headers.get('Authorization')).toBe(`Basic ${expected}`);
      expect(headers.get('Accept')).toBe('application/json');
      expect(init?.redirect).toBe('manual');
    });

    it('should return normalized entries', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(
          page(1, [
            {
              id: '7',
              email: 'jane@example.com',
              username: '',
              password: null,
              ip_address: '10.0.0.1',
              database_name: 'ExampleBreach',
            },
          ])
        )
      );

      const result = await client.execute(Query.email('jane@example.com'));

      expect(result).toEqual({
        total: 1,
        balance: 42,
        entries: [
          { id: 7, email: 'jane@example.com', ipAddress: '10.0.0.1', databaseName: 'ExampleBreach' },
        ],
      });
    });

    it('should return an empty result when nothing matched', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(page(0, null, 10)));

      await expect(client.execute(Query.domain('example.com'))).resolves.toEqual({
        total: 0,
        balance: 10,
        entries: [],
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should follow result pages until the total is covered', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse(page(PAGE_SIZE + 1, [{ id: '1' }], 50)))
        .mockResolvedValueOnce(jsonResponse(page(PAGE_SIZE + 1, [{ id: '2' }], 49)));

      const result = await client.execute(Query.domain('example.com'));

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(requestedUrl(1).searchParams.get('page')).toBe('2');
      expect(result.entries.map((entry) => entry.id)).toEqual([1, 2]);
      expect(result.balance).toBe(49);
      expect(result.total).toBe(PAGE_SIZE + 1);
    });

    it('should space page requests by the page interval', async () => {
      const intervalMs = 20;
      const calledAt: number[] = [];
      const pagedClient = new SearchApiClient({
        email: 'analyst@example.com',
        apiKey: 'test-key',
        pageIntervalMs: intervalMs,
        config: new SearchApiConfig({}),
      });
      fetchMock.mockImplementation(async () => {
        calledAt.push(Date.now());
        return jsonResponse(page(3 * PAGE_SIZE - 1, [{ id: String(calledAt.length) }]));
      });

      const result = await pagedClient.execute(Query.domain('example.com'));

      expect(result.entries.map((entry) => entry.id)).toEqual([1, 2, 3]);
      expect(calledAt).toHaveLength(3);
      expect(calledAt[1] - calledAt[0]).toBeGreaterThanOrEqual(intervalMs);
      expect(calledAt[2] - calledAt[1]).toBeGreaterThanOrEqual(intervalMs);
    });

    it('should stop paging on an empty page', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse(page(3 * PAGE_SIZE, [{ id: '1' }])))
        .mockResolvedValueOnce(jsonResponse(page(3 * PAGE_SIZE, [])));

      const result = await client.execute(Query.domain('example.com'));

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(result.entries).toHaveLength(1);
    });

    it('should validate the query before calling the API', async () => {
      const error = await captureError(client.execute(Query.email('')));

      expect(error.kind).toBe('invalid-input');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('Error mapping', () => {
    it('should report 429 as rate limited with the Retry-After delay', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response(null, { status: 429, headers: { 'Retry-After': '2' } })
      );

      const error = await captureError(client.execute(Query.email('jane@example.com')));

      expect(error.kind).toBe('rate-limit-exceeded');
      expect(error.statusCode).toBe(429);
      expect(error.retryAfterMs).toBe(2000);
    });

    it('should report 400 as rate limited', async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 400 }));

      const error = await captureError(client.execute(Query.email('jane@example.com')));

      expect(error.kind).toBe('rate-limit-exceeded');
      expect(error.retryAfterMs).toBeUndefined();
    });

    it.each([401, 403])('should report %i as unauthorized', async (status) => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status }));

      const error = await captureError(client.execute(Query.email('jane@example.com')));

      expect(error.kind).toBe('unauthorized');
      expect(error.message).toBe('Invalid API credentials');
    });

    it('should report a 302 redirect as an invalid query', async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 302 }));

      const error = await captureError(client.execute(Query.freeText('jane')));

      expect(error.kind).toBe('invalid-input');
      expect(error.message).toBe('Invalid query: the provider rejected the query');
    });

    it('should report other statuses as unknown', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('oops', { status: 500, statusText: 'Internal Server Error' })
      );

      const error = await captureError(client.execute(Query.email('jane@example.com')));

      expect(error.kind).toBe('unknown');
      expect(error.message).toBe('Search API error: 500 Internal Server Error');
      expect(error.statusCode).toBe(500);
    });

    it('should wrap transport failures as network errors', async () => {
      const cause = new TypeError('fetch failed');
      fetchMock.mockRejectedValueOnce(cause);

      const error = await captureError(client.execute(Query.email('jane@example.com')));

      expect(error.kind).toBe('network');
      expect(error.message).toBe('Network failure: fetch failed');
      expect(error.cause).toBe(cause);
    });

    it('should reject a body that is not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('not json', { status: 200 }));

      const error = await captureError(client.execute(Query.email('jane@example.com')));

      expect(error.kind).toBe('malformed-response');
      expect(error.message).toBe('Malformed response: body is not valid JSON');
    });
  });

  describe('startScheduler()', () => {
    it('should apply configured settings with overrides', async () => {
      const scheduler = client.startScheduler({ maxRetries: 1 });

      const stats = scheduler.getStats();
      expect(stats.minRequestIntervalMs).toBe(200);
      expect(stats.maxRetries).toBe(1);

      await scheduler.stop();
    });
  });
});

describe('parseRetryAfter', () => {
  it('should read delay seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
  });

  it('should read an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:05 GMT', now)).toBe(5000);
  });

  it('should ignore missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('  ')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('parseSearchResponse', () => {
  it('should reject unsuccessful bodies with the provider message', () => {
    expect(() => parseSearchResponse({ success: false, message: 'Invalid API credentials.' })).toThrow(
      'Malformed response: request reported failure: Invalid API credentials.'
    );
  });

  it('should reject non-numeric totals', () => {
    expect(() => parseSearchResponse({ success: true, balance: '1', total: 0, entries: [] })).toThrow(
      'Malformed response: balance and total must be numbers'
    );
  });

  it('should reject entries of the wrong shape', () => {
    expect(() => parseSearchResponse(page(1, [{ id: 5 }]))).toThrow(
      'Malformed response: entry 0 has an unexpected shape'
    );
  });

  it('should default a missing took field', () => {
    expect(parseSearchResponse({ success: true, balance: 1, total: 0, entries: null })).toEqual({
      success: true,
      balance: 1,
      total: 0,
      took: '',
      entries: [],
    });
  });
});

describe('toSearchEntry', () => {
  it('should reject a non-numeric id', () => {
    expect(() => toSearchEntry({ id: 'abc' })).toThrow("Malformed response: invalid entry id 'abc'");
  });

  it('should reject an invalid IP address', () => {
    expect(() => toSearchEntry({ id: '3', ip_address: 'nope' })).toThrow(
      "Malformed response: invalid ip address 'nope' in entry 3"
    );
  });

  it('should accept IPv6 addresses', () => {
    expect(toSearchEntry({ id: '3', ip_address: '::1' })).toEqual({ id: 3, ipAddress: '::1' });
  });
});
