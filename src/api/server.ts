/**
 * Express application and HTTP server lifecycle.
 */

import express, { Express } from 'express';
import * as http from 'http';
import { ScanResult } from '../checkin';
import { logger } from '../logging';
import { CheckInApi, CheckInApiDeps, errorHandler } from './check-in-api';
import { HeaderIdentityProvider, IdentityProvider, identityMiddleware } from './identity';

export interface AppOptions extends CheckInApiDeps {
  identityProvider?: IdentityProvider;
}

const SCAN_COUNTERS: Record<ScanResult['outcome'], string> = {
  accepted: 'checkin_scans_accepted_total',
  duplicate: 'checkin_scans_duplicate_total',
  invalid: 'checkin_scans_invalid_total',
};

export function createApp(options: AppOptions): Express {
  const { metrics, protocol } = options;
  const app = express();

  protocol.on('scan', (result: ScanResult) => metrics.incCounter(SCAN_COUNTERS[result.outcome]));
  protocol.on('rejected', () => metrics.incCounter('checkin_scans_rejected_total'));

  app.disable('x-powered-by');
  app.use(express.json({ limit: '64kb' }));
  app.use(metrics.httpMiddleware());
  app.use(identityMiddleware(options.identityProvider ?? new HeaderIdentityProvider()));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', auditRecords: options.audit.size });
  });

  app.get('/metrics', (_req, res) => {
    res.type('text/plain; version=0.0.4').send(metrics.render());
  });

  app.use('/api', new CheckInApi(options).routes());

  app.use((_req, res) => {
    res.status(404).json({ success: false, error: { code: 'NOT_FOUND', message: 'Route not found' } });
  });
  app.use(errorHandler);

  return app;
}

export class CheckInServer {
  private readonly app: Express;
  private httpServer?: http.Server;

  constructor(options: AppOptions) {
    this.app = createApp(options);
  }

  start(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port);
      server.once('error', reject);
      server.once('listening', () => {
        const address = server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        logger.info('CheckInServer', 'HTTP server listening', { port: boundPort });
        resolve(boundPort);
      });
      this.httpServer = server;
    });
  }

  stop(): Promise<void> {
    const server = this.httpServer;
    this.httpServer = undefined;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        logger.info('CheckInServer', 'HTTP server stopped');
        resolve();
      });
    });
  }
}
