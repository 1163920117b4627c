import { Router } from 'express';
import { z } from 'zod';

import { validateQuery } from '../middleware/validation.middleware';
import { DeviceStates, type DeviceView } from '../models/device';
import type { DeviceRegistry } from '../services/deviceRegistry.service';
import { availabilityOf } from '../services/exporter.service';
import type { CacheEntry, MetricCache } from '../services/metricCache.service';
import { notFoundError } from '../utils/errors';

const vehicleQuerySchema = z.object({
  state: z.enum(DeviceStates).optional(),
});

const toIsoString = (timestamp: number | null): string | null =>
  timestamp === null ? null : new Date(timestamp).toISOString();

const toVehicleResource = (device: DeviceView, entry: CacheEntry) => ({
  id: device.id,
  vehicleId: device.vehicleId,
  vin: device.vin,
  displayName: device.displayName,
  state: device.state,
  availability: availabilityOf(device),
  inService: device.inService,
  consecutiveFailures: device.consecutiveFailures,
  lastSuccessfulPollAt: toIsoString(device.lastSuccessfulPollAt),
  snapshot: entry.snapshot
    ? {
        capturedAt: toIsoString(entry.snapshot.capturedAt),
        stale: entry.stale,
        ageSeconds: entry.ageMs === null ? null : entry.ageMs / 1000,
        location: entry.snapshot.location,
        samples: entry.snapshot.samples.length,
      }
    : null,
});

export type VehiclesRouterDeps = {
  registry: Pick<DeviceRegistry, 'list' | 'get'>;
  cache: Pick<MetricCache, 'read'>;
  now?: () => number;
};

export const createVehiclesRouter = ({ registry, cache, now = Date.now }: VehiclesRouterDeps): Router => {
  const vehiclesRouter = Router();

  vehiclesRouter.get(
    '/',
    validateQuery(vehicleQuerySchema, (query, _req, res) => {
      const at = now();
      const data = registry
        .list()
        .filter((device) => !query.state || device.state === query.state)
        .map((device) => toVehicleResource(device, cache.read(device.id, at)));

      res.json({ data });
    }),
  );

  vehiclesRouter.get('/:vehicleId', (req, res, next) => {
    const { vehicleId } = req.params;
    const device = registry.get(vehicleId);
    if (!device) {
      next(notFoundError(`Vehicle ${vehicleId} is not tracked`));
      return;
    }

    res.json({ data: toVehicleResource(device, cache.read(device.id, now())) });
  });

  return vehiclesRouter;
};
