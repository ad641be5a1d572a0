/**
 * Health Check Endpoint Handler
 *
 * Returns server status, registered providers, version and timestamp.
 * When a database probe is supplied, a failing probe turns the response
 * into a 503.
 */

import type { Request, Response } from 'express';

export interface HealthOptions {
  providers: () => string[];
  checkDatabase?: () => Promise<void>;
}

export function createHealthHandler(options: HealthOptions) {
  return async (_req: Request, res: Response): Promise<void> => {
    let database: 'ok' | 'unavailable' | 'unchecked' = 'unchecked';
    if (options.checkDatabase) {
      try {
        await options.checkDatabase();
        database = 'ok';
      } catch (error) {
        console.error('[health] Database check failed:', error instanceof Error ? error.message : String(error));
        database = 'unavailable';
      }
    }

    res.status(database === 'unavailable' ? 503 : 200).json({
      status: database === 'unavailable' ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      database,
      providers: options.providers(),
      version: process.env.npm_package_version ?? 'dev',
    });
  };
}
