import { Router } from 'express';

import { EXPOSITION_CONTENT_TYPE, type Exporter } from '../services/exporter.service';

export const createMetricsRouter = (exporter: Pick<Exporter, 'render'>, metricsPath: string): Router => {
  const metricsRouter = Router();

  // Scrapes only read the cache; upstream failures show up as metric values, never as 5xx.
  metricsRouter.get(metricsPath, (_req, res, next) => {
    try {
      const body = exporter.render();
      res.setHeader('Content-Type', EXPOSITION_CONTENT_TYPE);
      res.status(200).send(body);
    } catch (error) {
      next(error);
    }
  });

  return metricsRouter;
};
