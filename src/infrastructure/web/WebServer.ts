import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { JobService, hasProviderAuthError } from '../../application/services/JobService.js';
import type { Job } from '../../core/entities/Job.js';
import type { IJobStore } from '../../core/interfaces/IJobStore.js';
import type { RateLimiter } from '../ratelimit/RateLimiter.js';
import type { Authenticator } from './auth.js';
import { toHttpError } from './httpErrors.js';
import { toBatchSubmission, toClassifySubmission, toSingleSubmission } from './schemas.js';

export interface WebServerOptions {
  port: number;
  version: string;
  maxBodyBytes: number;
}

export type ServerEvent =
  | { type: 'connected'; timestamp: string }
  | { type: 'job_updated'; jobId: string; status: Job['status']; progress: number; timestamp: string }
  | { type: 'jobs_expired'; jobIds: string[]; timestamp: string };

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private jobService: JobService,
    private store: IJobStore,
    private limiter: RateLimiter,
    private authenticate: Authenticator,
    private options: WebServerOptions
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  /**
   * Bound port once started; differs from the configured one when that is 0
   */
  getPort(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: this.options.maxBodyBytes }));
  }

  private setupRoutes(): void {
    this.app.get('/', (req: Request, res: Response) => {
      res.json({ message: 'Document job orchestrator', version: this.options.version });
    });

    this.app.get(
      '/health',
      this.handle(async (req, res) => {
        const database = await this.store.healthCheck();
        res.status(database ? 200 : 503).json({
          status: database ? 'healthy' : 'degraded',
          timestamp: new Date().toISOString(),
          database,
          rateLimiter: this.limiter.stats(),
        });
      })
    );

    this.app.post(
      '/extract/single',
      this.handle(async (req, res) => {
        const ownerKey = this.authenticate(req.headers);
        const receipt = await this.jobService.submitSingle(toSingleSubmission(req.body, ownerKey));
        res.status(202).json(receipt);
      })
    );

    this.app.post(
      '/extract/batch',
      this.handle(async (req, res) => {
        const ownerKey = this.authenticate(req.headers);
        const receipt = await this.jobService.submitBatch(toBatchSubmission(req.body, ownerKey));
        res.status(202).json(receipt);
      })
    );

    this.app.post(
      '/classify',
      this.handle(async (req, res) => {
        const ownerKey = this.authenticate(req.headers);
        const receipt = await this.jobService.submitClassify(toClassifySubmission(req.body, ownerKey));
        res.status(202).json(receipt);
      })
    );

    this.app.get(
      '/jobs/:id',
      this.handle(async (req, res) => {
        this.authenticate(req.headers);
        res.json(await this.jobService.getStatus(req.params.id));
      })
    );

    this.app.get(
      '/jobs/:id/result',
      this.handle(async (req, res) => {
        this.authenticate(req.headers);
        const view = await this.jobService.getResult(req.params.id);
        res.status(hasProviderAuthError(view) ? 401 : 200).json(view);
      })
    );

    // body-parser failures (malformed JSON, oversized body) land here
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const status = bodyParserStatus(error);
      if (status !== null) {
        res.status(status).json({ success: false, error: 'Malformed or oversized request body' });
        return;
      }
      this.sendError(res, error);
    });
  }

  private handle(fn: AsyncHandler) {
    return (req: Request, res: Response): void => {
      fn(req, res).catch((error: unknown) => this.sendError(res, error));
    };
  }

  private sendError(res: Response, error: unknown): void {
    const httpError = toHttpError(error);
    if (httpError.status >= 500) {
      console.error('[WebServer] Unhandled error:', error);
    }
    if (httpError.retryAfterSeconds !== undefined) {
      res.setHeader('Retry-After', String(httpError.retryAfterSeconds));
    }
    res.status(httpError.status).json(httpError.body);
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() } satisfies ServerEvent));
    });

    this.unsubscribe = this.store.subscribe({
      jobUpdated: (job) =>
        this.broadcast({
          type: 'job_updated',
          jobId: job.id,
          status: job.status,
          progress: job.progress,
          timestamp: new Date().toISOString(),
        }),
      jobsDeleted: (jobIds) =>
        this.broadcast({ type: 'jobs_expired', jobIds, timestamp: new Date().toISOString() }),
    });
  }

  public broadcast(message: ServerEvent): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.httpServer = this.app.listen(this.options.port, () => {
          console.error(`[WebServer] API available at http://localhost:${this.getPort() ?? this.options.port}`);
          this.setupWebSocket();
          resolve();
        });

        this.httpServer.on('error', (error) => {
          console.error('[WebServer] Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.unsubscribe) {
        this.unsubscribe();
        this.unsubscribe = null;
      }

      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close(() => {
          console.error('[WebServer] WebSocket server closed');
        });
        this.wss = null;
      }

      if (this.httpServer) {
        this.httpServer.close(() => {
          console.error('[WebServer] HTTP server closed');
          resolve();
        });
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }
}

function bodyParserStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('type' in error) || !('status' in error)) {
    return null;
  }
  const { type, status } = error;
  if (typeof type !== 'string' || !type.startsWith('entity.') || typeof status !== 'number') {
    return null;
  }
  return status;
}
