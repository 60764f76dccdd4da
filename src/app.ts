/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express, { Express } from 'express';
import { Server } from 'node:http';
import { Registry } from 'prom-client';
import * as winston from 'winston';

export interface HealthStatus {
  state: string;
  cycles: number;
  lastComparedSequence?: number;
}

export function createMetricsApp({
  registry,
  health,
}: {
  registry: Registry;
  health: () => HealthStatus;
}): Express {
  const app = express();

  app.get('/healthcheck', (_req, res) => {
    res.json({ status: 'ok', ...health() });
  });

  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', registry.contentType);
      res.send(await registry.metrics());
    } catch (error) {
      res.status(500).send(error instanceof Error ? error.message : 'error');
    }
  });

  return app;
}

export async function startMetricsServer({
  log,
  app,
  port,
}: {
  log: winston.Logger;
  app: Express;
  port: number;
}): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info(`Metrics listening on port ${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export async function stopServer(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
