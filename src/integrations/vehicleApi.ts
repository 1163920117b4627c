import type { TokenGrant, VehicleSummary, VehicleTelemetry } from '../models/telemetry';

/**
 * Upstream contract the polling engine depends on. Implementations map provider
 * failures onto the error classes in `utils/errors`:
 *
 * - `AuthError` when the refresh token is rejected, `TransientAuthError` when the token
 *   endpoint cannot be reached;
 * - `UnauthorizedError` for a rejected access token, `VehicleUnavailableError` when the
 *   vehicle is asleep or offline, `RateLimitExceeded` for throttling;
 * - `TransientNetworkError` for network failures and 5xx, `DecodeError` for payloads that
 *   do not match the expected shape.
 */
export interface VehicleApi {
  refreshToken(refreshToken: string, signal?: AbortSignal): Promise<TokenGrant>;
  listVehicles(accessToken: string, signal?: AbortSignal): Promise<VehicleSummary[]>;
  /** Lightweight presence check. Must not wake the vehicle. */
  getVehicle(accessToken: string, id: string, signal?: AbortSignal): Promise<VehicleSummary>;
  getVehicleData(
    accessToken: string,
    id: string,
    signal?: AbortSignal,
  ): Promise<VehicleTelemetry>;
  wakeUp(accessToken: string, id: string, signal?: AbortSignal): Promise<VehicleSummary>;
}
