import type { VehicleApi } from '../integrations/vehicleApi';
import { AuthError, TransientAuthError, UpstreamError } from '../utils/errors';
import { logger } from '../utils/logger';

const DEFAULT_SAFETY_MARGIN_MS = 30_000;

export type CredentialState = {
  accessToken: string | null;
  refreshToken: string;
  expiresAt: number;
};

export type CredentialStatus = {
  expiresAt: number | null;
  terminal: boolean;
  lastError: string | null;
  refreshCount: number;
};

export type CredentialManagerOptions = {
  api: Pick<VehicleApi, 'refreshToken'>;
  refreshToken: string;
  accessToken?: string | null;
  expiresAt?: number;
  safetyMarginMs?: number;
  now?: () => number;
};

/**
 * Owns the access/refresh token pair for the configured account.
 *
 * Concurrent callers share a single in-flight refresh. A rejected refresh token is
 * terminal: the `AuthError` is kept and rethrown to every later caller.
 */
export class CredentialManager {
  private readonly api: Pick<VehicleApi, 'refreshToken'>;

  private readonly safetyMarginMs: number;

  private readonly now: () => number;

  private state: CredentialState;

  private inflight: Promise<string> | null = null;

  private terminalError: AuthError | null = null;

  private lastError: string | null = null;

  private refreshCount = 0;

  constructor(options: CredentialManagerOptions) {
    this.api = options.api;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.now = options.now ?? Date.now;
    this.state = {
      accessToken: options.accessToken ?? null,
      refreshToken: options.refreshToken,
      expiresAt: options.expiresAt ?? 0,
    };
  }

  async getValidToken(signal?: AbortSignal): Promise<string> {
    if (this.terminalError) {
      throw this.terminalError;
    }

    const { accessToken, expiresAt } = this.state;
    if (accessToken && expiresAt - this.safetyMarginMs > this.now()) {
      return accessToken;
    }

    if (!this.inflight) {
      logger.debug({ expiresAt }, 'access token expiring; refreshing');
      this.inflight = this.refresh(signal).finally(() => {
        this.inflight = null;
      });
    }

    return this.inflight;
  }

  /** Forces the next `getValidToken` call to refresh, e.g. after an upstream 401. */
  invalidate(): void {
    this.state = { ...this.state, accessToken: null, expiresAt: 0 };
  }

  status(): CredentialStatus {
    return {
      expiresAt: this.state.accessToken ? this.state.expiresAt : null,
      terminal: this.terminalError !== null,
      lastError: this.lastError,
      refreshCount: this.refreshCount,
    };
  }

  private async refresh(signal?: AbortSignal): Promise<string> {
    this.refreshCount += 1;
    try {
      const grant = await this.api.refreshToken(this.state.refreshToken, signal);
      const now = this.now();
      this.state = {
        accessToken: grant.accessToken,
        refreshToken: grant.refreshToken ?? this.state.refreshToken,
        expiresAt: now + grant.expiresInSeconds * 1000,
      };
      this.lastError = null;
      logger.info({ expiresAt: new Date(this.state.expiresAt).toISOString() }, 'access token refreshed');
      return grant.accessToken;
    } catch (error) {
      if (error instanceof AuthError) {
        this.terminalError = error;
        this.lastError = error.message;
        logger.error({ error }, 'refresh token rejected; polling halted until reconfigured');
        throw error;
      }

      if (signal?.aborted) {
        throw error;
      }

      this.lastError = error instanceof Error ? error.message : String(error);
      logger.warn({ error }, 'access token refresh failed');
      if (error instanceof TransientAuthError) {
        throw error;
      }

      throw new TransientAuthError(
        'Access token refresh failed.',
        error instanceof UpstreamError ? error.status : undefined,
        { cause: error },
      );
    }
  }
}
