import { createDevice, type Device, type DeviceView } from '../models/device';
import { logger } from '../utils/logger';

export type DeviceRegistration = {
  id: string;
  vehicleId?: string | null;
  vin?: string | null;
  displayName?: string | null;
};

/**
 * Device records keyed by upstream id. Records are never removed; rediscovery refreshes
 * only the identity fields and keeps the lifecycle state.
 */
export class DeviceRegistry {
  private readonly devices = new Map<string, Device>();

  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  register(input: DeviceRegistration): { device: DeviceView; created: boolean } {
    const existing = this.devices.get(input.id);
    if (existing) {
      const refreshed: Device = {
        ...existing,
        vehicleId: input.vehicleId ?? existing.vehicleId,
        vin: input.vin ?? existing.vin,
        displayName: input.displayName || existing.displayName,
      };
      this.devices.set(input.id, refreshed);
      return { device: refreshed, created: false };
    }

    const device = createDevice(input, this.now());
    this.devices.set(device.id, device);
    logger.info({ deviceId: device.id, displayName: device.displayName }, 'device registered');
    return { device, created: true };
  }

  get(id: string): DeviceView | undefined {
    return this.devices.get(id);
  }

  list(): DeviceView[] {
    return [...this.devices.values()];
  }

  /** Replaces the record. Only the poller calls this. */
  update(device: Device): void {
    if (!this.devices.has(device.id)) {
      throw new Error(`Unknown device ${device.id}`);
    }

    this.devices.set(device.id, device);
  }
}
