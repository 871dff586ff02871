import type { RequestHandler } from 'express';

import { plannerContainer } from '../../container';

export interface HealthResponse {
  ok: boolean;
  uptime: number;
  storageDriver: string;
  generationProvider: string;
  cachedEmbeddings: number;
}

export const getHealth: RequestHandler = (_req, res) => {
  const { config, cache } = plannerContainer;
  const response: HealthResponse = {
    ok: true,
    uptime: process.uptime(),
    storageDriver: config.storageDriver,
    generationProvider: config.provider?.kind ?? 'offline',
    cachedEmbeddings: cache.size,
  };

  res.status(200).json(response);
};
