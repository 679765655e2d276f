import { z } from 'zod';
import {
  DREAMHOST_API_URL,
  RATE_LIMIT_COOLDOWN_MS,
  RATE_LIMIT_MAX_RETRIES,
  RATE_LIMIT_STATUS,
  RESPONSE_FORMAT,
} from './constants.js';
import { DecodeError, TransportError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import type { CommandOutcome, CommandParameters } from './types.js';

export interface TransportOptions {
  apiKey: string;
  /** Defaults to the public API origin */
  baseUrl?: string;
  /** Wait before retrying a rate-limited request */
  cooldownMs?: number;
  /** Per-request timeout; an elapsed timeout is a `TransportError` */
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** Executes named remote commands against the DreamHost API */
export interface Transport {
  /** Perform a command and return its decoded JSON body */
  request(params: CommandParameters): Promise<unknown>;
  /** Perform a command and decode its `result`/`data` envelope */
  invoke(params: CommandParameters): Promise<CommandOutcome>;
}

interface RawResponse {
  status: number;
  body: string;
}

const commandEnvelopeSchema = z.object({
  result: z.enum(['success', 'error']),
  data: z.string(),
});

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function buildUrl(
  baseUrl: string,
  apiKey: string,
  params: CommandParameters
): string {
  const url = new URL(baseUrl);
  const query = { ...params, key: apiKey, format: RESPONSE_FORMAT };
  for (const [name, value] of Object.entries(query)) {
    url.searchParams.set(name, value);
  }
  return url.toString();
}

function decodeBody(response: RawResponse): unknown {
  if (response.body.trim() === '') {
    throw new TransportError(
      `DreamHost: empty response body (status ${response.status})`,
      { status: response.status }
    );
  }

  try {
    return JSON.parse(response.body);
  } catch (err) {
    throw new DecodeError(
      `DreamHost: response is not valid JSON: ${response.body.slice(0, 200)}`,
      { cause: err }
    );
  }
}

/** Decode a command envelope into an outcome */
export function decodeOutcome(payload: unknown): CommandOutcome {
  const parsed = commandEnvelopeSchema.safeParse(payload);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.') || '(root)');
    throw new DecodeError(
      `DreamHost: malformed response envelope (${fields.join(', ')})`,
      { cause: parsed.error }
    );
  }

  return {
    status: parsed.data.result === 'success' ? 'success' : 'failure',
    detail: parsed.data.data,
  };
}

/**
 * Create a transport for the DreamHost web-panel API.
 *
 * Uses native `fetch` (Node 18+). Every request carries the API key and
 * `format=json`. A 429 answer pauses for `cooldownMs` and the identical
 * request is sent once more; whatever that second attempt returns is
 * decoded, there is no third attempt.
 */
export function createTransport(options: TransportOptions): Transport {
  const {
    apiKey,
    baseUrl = DREAMHOST_API_URL,
    cooldownMs = RATE_LIMIT_COOLDOWN_MS,
    timeoutMs,
    sleep = delay,
    logger = defaultLogger,
  } = options;

  if (!apiKey) {
    throw new Error('DreamHost: apiKey is required');
  }

  async function fetchOnce(url: string): Promise<RawResponse> {
    let res: Response;
    try {
      res = await fetch(url, {
        signal: timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new TransportError(`DreamHost: request failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    try {
      return { status: res.status, body: await res.text() };
    } catch (err) {
      throw new TransportError(
        `DreamHost: could not read response body: ${describeError(err)}`,
        { status: res.status, cause: err }
      );
    }
  }

  async function request(params: CommandParameters): Promise<unknown> {
    // The URL embeds the API key, so only the command name is logged.
    const url = buildUrl(baseUrl, apiKey, params);
    const cmd = params['cmd'];

    let response = await fetchOnce(url);
    for (
      let retries = 0;
      response.status === RATE_LIMIT_STATUS && retries < RATE_LIMIT_MAX_RETRIES;
      retries++
    ) {
      logger.warn({ cmd, cooldownMs }, 'Rate limit hit, pausing before retry');
      await sleep(cooldownMs);
      response = await fetchOnce(url);
    }

    if (response.status > 299 && response.status !== RATE_LIMIT_STATUS) {
      throw new TransportError(
        `DreamHost: API error ${response.status}: ${response.body}`,
        { status: response.status }
      );
    }

    logger.debug({ cmd, status: response.status }, 'DreamHost command completed');
    return decodeBody(response);
  }

  return {
    request,
    async invoke(params: CommandParameters): Promise<CommandOutcome> {
      return decodeOutcome(await request(params));
    },
  };
}
