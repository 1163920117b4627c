import type { z } from 'zod';

import type { VehicleApi } from '../vehicleApi';
import type { TokenGrant, VehicleSummary, VehicleTelemetry } from '../../models/telemetry';
import {
  AuthError,
  DecodeError,
  RateLimitExceeded,
  TransientAuthError,
  TransientNetworkError,
  UnauthorizedError,
  UpstreamError,
  VehicleUnavailableError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { retry, type RetryOptions } from '../../utils/retry';
import {
  tokenResponseSchema,
  toVehicleSummary,
  toVehicleTelemetry,
  vehicleDataResponseSchema,
  vehicleListResponseSchema,
  vehicleResponseSchema,
} from './tesla.schemas';

const OWNER_API_BASE_URL = 'https://owner-api.teslamotors.com';
const AUTH_URL = 'https://auth.tesla.com/oauth2/v3/token';
const DEFAULT_RETRY_AFTER_MS = 60_000;

export type TeslaApiClientOptions = {
  ownerApiBaseUrl?: string;
  authUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  retry?: Partial<RetryOptions>;
  now?: () => number;
};

type RequestOptions = {
  method?: 'GET' | 'POST';
  accessToken?: string;
  body?: unknown;
  signal?: AbortSignal;
};

const parseRetryAfterMs = (header: string | null, now: number): number => {
  if (!header) {
    return DEFAULT_RETRY_AFTER_MS;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  return Number.isNaN(date) ? DEFAULT_RETRY_AFTER_MS : Math.max(date - now, 0);
};

const isTransient = (error: unknown): boolean => error instanceof TransientNetworkError;

export class TeslaApiClient implements VehicleApi {
  private readonly ownerApiBaseUrl: string;

  private readonly authUrl: string;

  private readonly timeoutMs: number;

  private readonly fetchImpl: typeof fetch;

  private readonly retryOptions: Partial<RetryOptions>;

  private readonly now: () => number;

  constructor(options: TeslaApiClientOptions = {}) {
    this.ownerApiBaseUrl = options.ownerApiBaseUrl ?? OWNER_API_BASE_URL;
    this.authUrl = options.authUrl ?? AUTH_URL;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
    this.retryOptions = options.retry ?? {};
    this.now = options.now ?? Date.now;
  }

  async refreshToken(refreshToken: string, signal?: AbortSignal): Promise<TokenGrant> {
    logger.info('fetching access token');
    const body = {
      grant_type: 'refresh_token',
      scope: 'openid email offline_access',
      client_id: 'ownerapi',
      refresh_token: refreshToken,
    };

    let payload: z.infer<typeof tokenResponseSchema>;
    try {
      payload = await this.withRetry(
        () => this.request(this.authUrl, tokenResponseSchema, { method: 'POST', body, signal }),
        signal,
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }

      const status = error instanceof UpstreamError ? error.status : undefined;
      if (status === 400 || status === 401 || status === 403) {
        throw new AuthError('Refresh token rejected by the token endpoint.', status, {
          cause: error,
        });
      }

      throw new TransientAuthError('Token endpoint unavailable.', status, { cause: error });
    }

    return {
      accessToken: payload.access_token,
      refreshToken: payload.refresh_token ?? null,
      expiresInSeconds: payload.expires_in,
    };
  }

  async listVehicles(accessToken: string, signal?: AbortSignal): Promise<VehicleSummary[]> {
    const payload = await this.withRetry(
      () =>
        this.request(`${this.ownerApiBaseUrl}/api/1/vehicles`, vehicleListResponseSchema, {
          accessToken,
          signal,
        }),
      signal,
    );

    return payload.response.map(toVehicleSummary);
  }

  async getVehicle(
    accessToken: string,
    id: string,
    signal?: AbortSignal,
  ): Promise<VehicleSummary> {
    // Per-vehicle calls make one attempt each: every attempt costs the caller a rate-limit
    // permit, so a retry is a new poll cycle.
    const payload = await this.request(
      `${this.ownerApiBaseUrl}/api/1/vehicles/${encodeURIComponent(id)}`,
      vehicleResponseSchema,
      { accessToken, signal },
    );

    return toVehicleSummary(payload.response);
  }

  async getVehicleData(
    accessToken: string,
    id: string,
    signal?: AbortSignal,
  ): Promise<VehicleTelemetry> {
    const payload = await this.request(
      `${this.ownerApiBaseUrl}/api/1/vehicles/${encodeURIComponent(id)}/vehicle_data`,
      vehicleDataResponseSchema,
      { accessToken, signal },
    );

    return toVehicleTelemetry(payload.response, this.now());
  }

  async wakeUp(accessToken: string, id: string, signal?: AbortSignal): Promise<VehicleSummary> {
    const payload = await this.request(
      `${this.ownerApiBaseUrl}/api/1/vehicles/${encodeURIComponent(id)}/wake_up`,
      vehicleResponseSchema,
      { method: 'POST', accessToken, signal },
    );

    return toVehicleSummary(payload.response);
  }

  private withRetry<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return retry(fn, { ...this.retryOptions, shouldRetry: isTransient, signal });
  }

  private async request<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions,
  ): Promise<T> {
    const method = options.method ?? 'GET';
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.accessToken) {
      headers.Authorization = `Bearer ${options.accessToken}`;
    }
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    logger.debug({ method, url }, 'tesla api request');

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal,
      });
    } catch (error) {
      if (options.signal?.aborted) {
        throw options.signal.reason;
      }

      throw new TransientNetworkError(`Request to ${url} failed.`, undefined, { cause: error });
    }

    const body = await response.text().catch((error: unknown) => {
      throw new TransientNetworkError(`Reading response from ${url} failed.`, response.status, {
        cause: error,
      });
    });

    if (!response.ok) {
      throw this.toStatusError(url, response, body);
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new DecodeError(`Response from ${url} is not valid JSON.`, response.status, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ url, issues: parsed.error.flatten() }, 'tesla api response did not match schema');
      throw new DecodeError(`Response from ${url} has an unexpected shape.`, response.status, {
        cause: parsed.error,
      });
    }

    return parsed.data;
  }

  private toStatusError(url: string, response: Response, body: string): UpstreamError {
    const { status } = response;
    logger.debug({ url, status, body: body.slice(0, 200) }, 'tesla api request rejected');

    if (status === 401) {
      return new UnauthorizedError(`Access token rejected by ${url}.`, status);
    }

    if (status === 408) {
      return new VehicleUnavailableError('Vehicle unavailable (asleep or offline).', status);
    }

    if (status === 429) {
      const now = this.now();
      const retryAt = now + parseRetryAfterMs(response.headers.get('retry-after'), now);
      return new RateLimitExceeded(`Rate limited by ${url}.`, retryAt, status);
    }

    if (status >= 500) {
      return new TransientNetworkError(`Upstream error ${status} from ${url}.`, status);
    }

    return new UpstreamError(`Request to ${url} failed with status ${status}.`, status);
  }
}
