import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import path from 'path';
import { z } from 'zod';
import type { JobService } from '../../application/services/JobService.js';
import type { IAuditLog } from '../../core/interfaces/IAuditLog.js';
import { JobNotFoundError, ValidationError, describeError } from '../../core/errors.js';

const SubmitBodySchema = z.object({
  type: z.unknown(),
  token: z.unknown(),
  args: z.unknown(),
});

const StatusFilterSchema = z.enum(['queued', 'running', 'succeeded', 'failed']).optional();

const AUDIT_TAIL = 100;

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private jobService: JobService,
    private auditLog: IAuditLog,
    private port: number = 8000
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok' });
    });

    // API: Start an extraction
    this.app.post('/api/extract', (req: Request, res: Response) => {
      const body = SubmitBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        throw new ValidationError('Request body must be a JSON object');
      }
      const jobId = this.jobService.submit(body.data.type, body.data.args ?? {}, body.data.token);
      console.error(`[WebServer] Job ${jobId} accepted`);
      res.status(201).json({ jobId });
    });

    // API: Job status
    this.app.get('/api/status/:jobId', (req: Request, res: Response) => {
      res.json(this.jobService.status(req.params.jobId));
    });

    // API: Get all jobs
    this.app.get('/api/jobs', (req: Request, res: Response) => {
      const status = StatusFilterSchema.safeParse(req.query.status);
      if (!status.success) {
        throw new ValidationError('Unknown status filter', ['status: expected queued, running, succeeded or failed']);
      }
      res.json({ jobs: this.jobService.list(status.data), statistics: this.jobService.statistics() });
    });

    this.app.get('/api/outputs/:jobId', (req: Request, res: Response) => {
      res.json({ jobId: req.params.jobId, outputs: this.jobService.outputs(req.params.jobId) });
    });

    // API: Download one output file
    this.app.get('/api/download/:jobId/:filename', (req: Request, res: Response, next: NextFunction) => {
      const filePath = this.jobService.resolveOutput(req.params.jobId, req.params.filename);
      if (!filePath) {
        res.status(404).json({ error: 'File not found' });
        return;
      }
      res.download(filePath, path.basename(filePath), (error) => {
        if (error) next(error);
      });
    });

    // API: Recent audit records
    this.app.get('/api/audit', (_req: Request, res: Response, next: NextFunction) => {
      this.auditLog
        .tail(AUDIT_TAIL)
        .then((entries) => res.json({ entries }))
        .catch(next);
    });
  }

  private setupErrorHandler(): void {
    this.app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      if (error instanceof JobNotFoundError) {
        res.status(404).json({ error: error.message });
        return;
      }
      // express.json() rejects unparseable bodies with status 400
      if (error instanceof Error && 'status' in error && error.status === 400) {
        res.status(400).json({ error: error.message });
        return;
      }
      console.error('[WebServer] Request failed:', error);
      res.status(500).json({ error: describeError(error) });
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer = this.app.listen(this.port, () => {
        console.error(`[WebServer] API available at http://localhost:${this.port}`);
        resolve();
      });

      this.httpServer.on('error', (error) => {
        console.error('[WebServer] Server error:', error);
        reject(error);
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.httpServer) {
        this.httpServer.close(() => {
          console.error('[WebServer] HTTP server closed');
          this.httpServer = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  public isRunning(): boolean {
    return this.httpServer !== null;
  }
}
