import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import rateLimit from 'express-rate-limit';
import http, { type Server } from 'http';
import { z } from 'zod';
import { app_config } from './config/app.config';
import { NotFoundError, ValidationError } from './errors/driftless.errors';
import { logger } from './logger';
import type { SourceWatcher } from './source/source-watcher';
import type { StatusReporter } from './status/status-reporter';

const SourceNotificationSchema = z.object({
  repoURL: z.string().min(1),
  revision: z.string().min(1).optional(),
});

export type HealthCheckServerOptions = {
  port?: number;
  maxRequestsPerSecond?: number;
  maxSimultaneousConnections?: number;
};

/** Health probe, read-only status projection and the source push webhook. */
export class HealthCheckServer {
  private app: Express | null = null;
  private server: Server | null = null;
  private activeConnections = 0;

  private readonly port: number;
  private readonly maxRequestsPerSecond: number;
  private readonly maxSimultaneousConnections: number;

  constructor(
    private readonly statusReporter: StatusReporter,
    private readonly watcher: Pick<SourceWatcher, 'notify'>,
    options: HealthCheckServerOptions = {},
  ) {
    this.port = options.port ?? app_config.healthCheckPort;
    this.maxRequestsPerSecond = options.maxRequestsPerSecond ?? 5;
    this.maxSimultaneousConnections = options.maxSimultaneousConnections ?? 5;
  }

  private initialize = (): Express => {
    if (this.app) return this.app;

    const app = express();
    this.app = app;

    app.use(
      rateLimit({
        windowMs: 1000, // 1 second window
        limit: this.maxRequestsPerSecond,
        message: 'Too many requests, please try again later.',
      }),
    );

    app.use(this.connectionLimiter);
    app.use(express.json());

    app.get('/health', this.healthCheckHandler);
    app.get('/applications/:name/status', this.statusHandler);
    app.post('/webhooks/source', this.sourceWebhookHandler);

    return app;
  };

  private connectionLimiter = (_req: Request, res: Response, next: NextFunction): void => {
    if (this.activeConnections >= this.maxSimultaneousConnections) {
      res.status(503).json({ error: 'Server is busy, please try again later.' });
      return;
    }

    this.activeConnections++;
    res.on('finish', () => {
      this.activeConnections--;
    });

    next();
  };

  private healthCheckHandler = (_req: Request, res: Response): void => {
    res.status(200).json({ status: 'ok' });
  };

  private statusHandler = async (req: Request, res: Response): Promise<void> => {
    try {
      res.status(200).json(await this.statusReporter.getStatus(req.params.name));
    } catch (err) {
      if (err instanceof NotFoundError) {
        res.status(404).json({ error: err.message });
        return;
      }
      if (err instanceof ValidationError) {
        res.status(422).json({ error: err.message, issues: err.issues });
        return;
      }
      logger.error(`Failed to read status of '${req.params.name}': ${err}`);
      res.status(500).json({ error: 'Failed to read status' });
    }
  };

  private sourceWebhookHandler = (req: Request, res: Response): void => {
    const parsed = SourceNotificationSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Expected { repoURL, revision? }', issues: parsed.error.issues.map((i) => i.message) });
      return;
    }
    const woken = this.watcher.notify(parsed.data.repoURL, parsed.data.revision);
    res.status(202).json({ applications: woken });
  };

  /** Resolves with the bound port once the server listens. */
  public start = async (): Promise<number> => {
    if (this.server) {
      return this.boundPort();
    }
    const server = http.createServer(this.initialize());
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, () => {
        server.off('error', reject);
        resolve();
      });
    });
    logger.info(`Health Check Server is running on http://localhost:${this.boundPort()}`);
    return this.boundPort();
  };

  public stop = async (): Promise<void> => {
    const server = this.server;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.server = null;
    logger.info('Health Check Server has been stopped.');
  };

  private boundPort(): number {
    const address = this.server?.address();
    return address !== null && typeof address === 'object' ? address.port : this.port;
  }
}
