import http from 'http';
import https from 'https';
import axios, { AxiosInstance } from 'axios';
import {
  FetchError,
  OutputSize,
  RawTimeSeriesResponse,
  Result,
  err,
  isJsonObject,
  isJsonValue,
  ok,
  parseError,
} from '@stockfeed/shared';
import { PipelineConfig } from '../config';
import {
  ALPHA_VANTAGE_INFORMATION_KEY,
  ALPHA_VANTAGE_NOTE_KEY,
  AlphaVantageQueryParams,
} from '../types/alphavantage';
import { computeBackoffDelay } from '../utils/backoff';
import { Clock, systemClock } from '../utils/clock';
import { Logger, createLogger } from '../utils/logger';
import { RateLimiter } from '../utils/rate-limiter';

export type AlphaVantageClientOptions = Pick<PipelineConfig, 'apiKey'> &
  Omit<PipelineConfig['alphaVantage'], 'outputSize'>;

export interface AlphaVantageClientDeps {
  rateLimiter: RateLimiter;
  clock?: Clock;
  logger?: Logger;
  random?: () => number;
}

export interface FetchOptions {
  outputSize?: OutputSize;
  signal?: AbortSignal;
}

type AttemptOutcome =
  | { ok: true; data: RawTimeSeriesResponse }
  | { ok: false; kind: FetchError['kind']; retryable: boolean; message: string; status?: number; cause?: unknown };

const RATE_LIMIT_TEXT = /rate limit|call frequency|requests per (minute|day)|premium plan to remove/i;

/**
 * In-band throttling message carried in a 200 response, if any
 */
export function detectRateLimit(data: unknown): string | null {
  if (!isJsonObject(data)) {
    return null;
  }

  const note = data[ALPHA_VANTAGE_NOTE_KEY];
  if (typeof note === 'string') {
    return note;
  }

  const information = data[ALPHA_VANTAGE_INFORMATION_KEY];
  if (typeof information === 'string' && RATE_LIMIT_TEXT.test(information)) {
    return information;
  }

  return null;
}

export class AlphaVantageClient {
  private api: AxiosInstance;
  private options: AlphaVantageClientOptions;
  private rateLimiter: RateLimiter;
  private clock: Clock;
  private logger: Logger;
  private random: () => number;

  constructor(options: AlphaVantageClientOptions, deps: AlphaVantageClientDeps) {
    this.options = options;
    this.rateLimiter = deps.rateLimiter;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('alphavantage');
    this.random = deps.random ?? Math.random;

    // One instance (and one keep-alive agent pair) per run so sockets are reused
    this.api = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      params: {
        apikey: options.apiKey,
      },
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });
  }

  private logRequest(params: AlphaVantageQueryParams): void {
    if (this.options.logRequests) {
      const query = new URLSearchParams({ ...params, apikey: '***' }).toString();
      this.logger.debug(`[ALPHA VANTAGE] GET ${this.options.baseUrl}/query?${query}`);
    }
  }

  /**
   * Fetch one symbol's daily series, retrying transient failures and in-band
   * throttling with exponential backoff. Never throws.
   */
  async fetchDailyTimeSeries(
    symbol: string,
    options: FetchOptions = {}
  ): Promise<Result<RawTimeSeriesResponse, FetchError>> {
    const params: AlphaVantageQueryParams = {
      function: this.options.function,
      symbol: symbol.trim(),
      outputsize: options.outputSize ?? 'compact',
      datatype: 'json',
    };
    const maxAttempts = Math.max(1, this.options.maxAttempts);
    let last: Extract<AttemptOutcome, { ok: false }> | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (options.signal?.aborted) {
        return err({
          kind: 'Cancelled',
          symbol,
          message: `Fetch for ${symbol} cancelled before attempt ${attempt}`,
          attempts: attempt - 1,
          cause: last?.cause,
        });
      }

      this.logger.debug('Fetching time series', { symbol, attempt, maxAttempts, outputsize: params.outputsize });
      const outcome = await this.attempt(params);

      if (outcome.ok) {
        return ok(outcome.data);
      }

      last = outcome;

      if (!outcome.retryable) {
        this.logger.error('Provider rejected request', { symbol, attempt, status: outcome.status, cause: outcome.message });
        return err({
          kind: outcome.kind,
          symbol,
          message: outcome.message,
          attempts: attempt,
          status: outcome.status,
          cause: outcome.cause,
        });
      }

      if (attempt < maxAttempts) {
        const delayMs = computeBackoffDelay(
          attempt,
          { baseMs: this.options.backoffBaseMs, maxMs: this.options.backoffMaxMs, jitter: this.options.jitter },
          this.random
        );
        this.logger.fetchRetry(symbol, attempt, maxAttempts, delayMs, `${outcome.kind}: ${outcome.message}`);
        await this.clock.sleep(delayMs);
      }
    }

    const kind = last?.kind ?? 'TransientNetworkError';
    const message = last?.message ?? 'no attempt was made';
    this.logger.error('Exhausted retries fetching time series', { symbol, attempts: maxAttempts, kind, cause: message });

    return err({
      kind,
      symbol,
      message: `Gave up on ${symbol} after ${maxAttempts} attempts: ${message}`,
      attempts: maxAttempts,
      status: last?.status,
      cause: last?.cause,
    });
  }

  private async attempt(params: AlphaVantageQueryParams): Promise<AttemptOutcome> {
    try {
      this.logRequest(params);
      const response = await this.rateLimiter.execute(() => this.api.get<unknown>('/query', { params }));
      const data: unknown = response.data;

      const throttled = detectRateLimit(data);
      if (throttled !== null) {
        return { ok: false, kind: 'RateLimited', retryable: true, message: throttled };
      }

      if (!isJsonValue(data)) {
        return { ok: false, kind: 'TransientNetworkError', retryable: true, message: 'Response body is not JSON' };
      }

      return { ok: true, data };
    } catch (error) {
      const appError = parseError(error);

      switch (appError.type) {
        case 'RATE_LIMIT_ERROR':
          return { ok: false, kind: 'RateLimited', retryable: true, message: appError.message, status: appError.status, cause: error };
        case 'SERVER_ERROR':
        case 'NETWORK_ERROR':
        case 'TIMEOUT_ERROR':
        case 'UNKNOWN_ERROR':
          return {
            ok: false,
            kind: 'TransientNetworkError',
            retryable: true,
            message: appError.message,
            status: appError.status,
            cause: error,
          };
        default:
          return {
            ok: false,
            kind: 'ProviderRejected',
            retryable: false,
            message: appError.message,
            status: appError.status,
            cause: error,
          };
      }
    }
  }
}
