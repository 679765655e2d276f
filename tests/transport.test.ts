import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { createTransport, decodeOutcome } from '../src/transport.js';
import { DecodeError, TransportError } from '../src/errors.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

function apiResponse(status: number, body: string) {
  return {
    ok: status < 300,
    status,
    text: () => Promise.resolve(body),
  };
}

function envelope(result: 'success' | 'error', data: string) {
  return apiResponse(200, JSON.stringify({ result, data }));
}

const ADD_PARAMS = {
  cmd: 'dns-add_record',
  record: 'home.example.com',
  type: 'A',
  value: '203.0.113.7',
};

function transportWithSleep() {
  const sleep = vi.fn().mockResolvedValue(undefined);
  const transport = createTransport({ apiKey: 'test-key', sleep });
  return { transport, sleep };
}

describe('createTransport', () => {
  it('throws if apiKey is missing', () => {
    expect(() => createTransport({ apiKey: '' })).toThrow(
      'DreamHost: apiKey is required'
    );
  });

  describe('invoke', () => {
    it('sends params, key and format as a single GET query', async () => {
      mockFetch.mockResolvedValueOnce(envelope('success', 'record_added'));

      const { transport } = transportWithSleep();
      await transport.invoke(ADD_PARAMS);

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch.mock.calls[0]![0]).toBe(
        'https://api.dreamhost.com/?cmd=dns-add_record&record=home.example.com&type=A&value=203.0.113.7&key=test-key&format=json'
      );
    });

    it('encodes comments and honours a custom base URL', async () => {
      mockFetch.mockResolvedValueOnce(envelope('success', 'record_added'));

      const transport = createTransport({
        apiKey: 'test-key',
        baseUrl: 'http://localhost:8080/api/',
      });
      await transport.invoke({ cmd: 'dns-add_record', comment: 'home router' });

      expect(mockFetch.mock.calls[0]![0]).toBe(
        'http://localhost:8080/api/?cmd=dns-add_record&comment=home+router&key=test-key&format=json'
      );
    });

    it('never lets params override the key or format', async () => {
      mockFetch.mockResolvedValueOnce(envelope('success', 'record_added'));

      const { transport } = transportWithSleep();
      await transport.invoke({ cmd: 'dns-add_record', key: 'other', format: 'xml' });

      expect(mockFetch.mock.calls[0]![0]).toBe(
        'https://api.dreamhost.com/?cmd=dns-add_record&key=test-key&format=json'
      );
    });

    it('decodes a success envelope', async () => {
      mockFetch.mockResolvedValueOnce(envelope('success', 'record_added'));

      const { transport } = transportWithSleep();
      await expect(transport.invoke(ADD_PARAMS)).resolves.toEqual({
        status: 'success',
        detail: 'record_added',
      });
    });

    it('returns a provider error as a failure outcome', async () => {
      mockFetch.mockResolvedValueOnce(
        envelope('error', 'record_already_exists_not_editable')
      );

      const { transport } = transportWithSleep();
      await expect(transport.invoke(ADD_PARAMS)).resolves.toEqual({
        status: 'failure',
        detail: 'record_already_exists_not_editable',
      });
    });

    it('wraps a network failure in a TransportError', async () => {
      const cause = new TypeError('fetch failed');
      mockFetch.mockRejectedValueOnce(cause);

      const { transport } = transportWithSleep();
      const err = await transport.invoke(ADD_PARAMS).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect(err).toMatchObject({
        kind: 'transport',
        message: 'DreamHost: request failed: fetch failed',
        cause,
      });
    });

    it('throws a TransportError with the status on HTTP errors', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse(500, 'Internal Server Error'));

      const { transport } = transportWithSleep();
      const err = await transport.invoke(ADD_PARAMS).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect(err).toMatchObject({
        status: 500,
        message: 'DreamHost: API error 500: Internal Server Error',
      });
    });

    it('treats an empty body as a TransportError', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse(200, '  '));

      const { transport } = transportWithSleep();
      await expect(transport.invoke(ADD_PARAMS)).rejects.toThrow(
        'DreamHost: empty response body (status 200)'
      );
    });

    it('throws a DecodeError when the body is not JSON', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse(200, '<html>oops</html>'));

      const { transport } = transportWithSleep();
      const err = await transport.invoke(ADD_PARAMS).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(DecodeError);
      expect(err).toMatchObject({
        kind: 'decode',
        message: 'DreamHost: response is not valid JSON: <html>oops</html>',
      });
    });

    it('throws a DecodeError when the result field is missing', async () => {
      mockFetch.mockResolvedValueOnce(
        apiResponse(200, JSON.stringify({ data: 'record_added' }))
      );

      const { transport } = transportWithSleep();
      await expect(transport.invoke(ADD_PARAMS)).rejects.toThrow(
        'DreamHost: malformed response envelope (result)'
      );
    });

    it('passes a timeout signal to fetch when timeoutMs is set', async () => {
      mockFetch.mockResolvedValueOnce(envelope('success', 'record_added'));

      const transport = createTransport({ apiKey: 'test-key', timeoutMs: 5000 });
      await transport.invoke(ADD_PARAMS);

      const init = mockFetch.mock.calls[0]![1] as RequestInit;
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });
  });

  describe('rate limiting', () => {
    it('waits once for the cool-down and decodes the retried response', async () => {
      mockFetch
        .mockResolvedValueOnce(apiResponse(429, 'Too Many Requests'))
        .mockResolvedValueOnce(envelope('success', 'record_added'));

      const { transport, sleep } = transportWithSleep();
      const outcome = await transport.invoke(ADD_PARAMS);

      expect(outcome).toEqual({ status: 'success', detail: 'record_added' });
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(600_000);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(mockFetch.mock.calls[1]![0]).toBe(mockFetch.mock.calls[0]![0]);
    });

    it('does not make a third attempt when the retry is rate limited too', async () => {
      mockFetch
        .mockResolvedValueOnce(apiResponse(429, 'Too Many Requests'))
        .mockResolvedValueOnce(apiResponse(429, 'Too Many Requests'));

      const { transport, sleep } = transportWithSleep();
      await expect(transport.invoke(ADD_PARAMS)).rejects.toThrow(DecodeError);

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('returns the decoded envelope of a rate-limited retry', async () => {
      mockFetch
        .mockResolvedValueOnce(apiResponse(429, ''))
        .mockResolvedValueOnce(
          apiResponse(429, JSON.stringify({ result: 'error', data: 'rate_limit_exceeded' }))
        );

      const { transport } = transportWithSleep();
      await expect(transport.invoke(ADD_PARAMS)).resolves.toEqual({
        status: 'failure',
        detail: 'rate_limit_exceeded',
      });
    });

    it('uses the configured cool-down', async () => {
      mockFetch
        .mockResolvedValueOnce(apiResponse(429, ''))
        .mockResolvedValueOnce(envelope('success', 'record_added'));

      const sleep = vi.fn().mockResolvedValue(undefined);
      const transport = createTransport({ apiKey: 'test-key', cooldownMs: 1500, sleep });
      await transport.invoke(ADD_PARAMS);

      expect(sleep).toHaveBeenCalledWith(1500);
    });

    it('throws the status of a retry that fails with an HTTP error', async () => {
      mockFetch
        .mockResolvedValueOnce(apiResponse(429, 'Too Many Requests'))
        .mockResolvedValueOnce(apiResponse(500, 'Internal Server Error'));

      const { transport, sleep } = transportWithSleep();
      const err = await transport.invoke(ADD_PARAMS).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect(err).toMatchObject({
        status: 500,
        message: 'DreamHost: API error 500: Internal Server Error',
      });
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('does not retry ordinary HTTP errors', async () => {
      mockFetch.mockResolvedValueOnce(apiResponse(503, 'Service Unavailable'));

      const { transport, sleep } = transportWithSleep();
      await expect(transport.invoke(ADD_PARAMS)).rejects.toThrow(TransportError);

      expect(sleep).not.toHaveBeenCalled();
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('request', () => {
    it('returns the decoded JSON body without checking the envelope', async () => {
      mockFetch.mockResolvedValueOnce(
        apiResponse(200, JSON.stringify({ result: 'success', data: [] }))
      );

      const { transport } = transportWithSleep();
      await expect(transport.request({ cmd: 'dns-list_records' })).resolves.toEqual({
        result: 'success',
        data: [],
      });
    });
  });
});

describe('decodeOutcome', () => {
  it('rejects an unknown result value', () => {
    expect(() => decodeOutcome({ result: 'maybe', data: 'x' })).toThrow(
      'DreamHost: malformed response envelope (result)'
    );
  });

  it('rejects a missing data field', () => {
    expect(() => decodeOutcome({ result: 'success' })).toThrow(
      'DreamHost: malformed response envelope (data)'
    );
  });

  it('rejects a non-object payload', () => {
    expect(() => decodeOutcome('record_added')).toThrow(
      'DreamHost: malformed response envelope ((root))'
    );
  });
});
