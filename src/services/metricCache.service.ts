import { freezeSnapshot, type MetricSnapshot } from '../models/metrics';

export type CacheEntry = {
  deviceId: string;
  snapshot: Readonly<MetricSnapshot> | null;
  stale: boolean;
  ageMs: number | null;
};

type Slot = {
  snapshot: Readonly<MetricSnapshot> | null;
  forcedStale: boolean;
};

/**
 * Last known good snapshot per device. Snapshots are frozen and swapped whole, so a
 * reader sees either the previous or the next one. Staleness is decided when read.
 */
export class MetricCache {
  private readonly slots = new Map<string, Slot>();

  readonly staleAfterMs: number;

  constructor(staleAfterMs: number) {
    this.staleAfterMs = staleAfterMs;
  }

  register(deviceId: string): void {
    if (!this.slots.has(deviceId)) {
      this.slots.set(deviceId, { snapshot: null, forcedStale: false });
    }
  }

  publish(deviceId: string, snapshot: MetricSnapshot): void {
    this.slots.set(deviceId, { snapshot: freezeSnapshot(snapshot), forcedStale: false });
  }

  markStale(deviceId: string): void {
    const slot = this.slots.get(deviceId);
    if (slot) {
      this.slots.set(deviceId, { ...slot, forcedStale: true });
    }
  }

  get(deviceId: string): Readonly<MetricSnapshot> | null {
    return this.slots.get(deviceId)?.snapshot ?? null;
  }

  read(deviceId: string, now: number): CacheEntry {
    const slot = this.slots.get(deviceId);
    if (!slot?.snapshot) {
      return { deviceId, snapshot: null, stale: false, ageMs: null };
    }

    const ageMs = Math.max(now - slot.snapshot.capturedAt, 0);
    return {
      deviceId,
      snapshot: slot.snapshot,
      stale: slot.forcedStale || ageMs > this.staleAfterMs,
      ageMs,
    };
  }

  readAll(now: number): CacheEntry[] {
    return [...this.slots.keys()].map((deviceId) => this.read(deviceId, now));
  }
}
