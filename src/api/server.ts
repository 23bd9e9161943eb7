import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { readFile } from 'fs/promises';
import type { Logger } from 'winston';
import { ZodError } from 'zod';
import { ReportSchema, type ReportFile } from '../schemas/report.js';
import { DomainListQuerySchema, DomainParamsSchema } from '../schemas/api.js';
import { ScanSetupError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

export interface ReportServerOptions {
  reportPath: string;
  port?: number;
  logLevel?: string | undefined;
}

/** Read-only JSON API over the last scan report. The file is re-read on every request. */
export class ReportServer {
  private readonly app: Application;
  private readonly port: number;
  private readonly reportPath: string;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(options: ReportServerOptions) {
    this.app = express();
    this.port = options.port ?? 8090;
    this.reportPath = options.reportPath;
    this.logger = createLogger({ name: 'report-api', level: options.logLevel });

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors());

    this.app.use((req: Request, _res: Response, next) => {
      this.logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/api/report', async (_req: Request, res: Response): Promise<void> => {
      try {
        res.json(await this.loadReport());
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.get('/api/summary', async (_req: Request, res: Response): Promise<void> => {
      try {
        const { generatedAt, totalDomains, workerCount, summary } = await this.loadReport();
        res.json({ generatedAt, totalDomains, workerCount, summary });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.get('/api/domains', async (req: Request, res: Response): Promise<void> => {
      try {
        const query = DomainListQuerySchema.parse(req.query);
        const report = await this.loadReport();

        const matching = report.results.filter(
          (record) =>
            (query.status === undefined || record.status === query.status) &&
            (query.minScore === undefined || record.score >= query.minScore) &&
            (query.year === undefined || record.years.includes(query.year))
        );

        res.json({
          total: matching.length,
          results: matching.slice(query.offset, query.offset + query.limit),
        });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.get('/api/domains/:domain', async (req: Request, res: Response): Promise<void> => {
      try {
        const { domain } = DomainParamsSchema.parse(req.params);
        const report = await this.loadReport();
        const record = report.results.find((item) => item.domain === domain);

        if (!record) {
          res.status(404).json({ error: `Domain ${domain} is not in the report` });
          return;
        }

        res.json(record);
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });
  }

  private async loadReport(): Promise<ReportFile> {
    let raw: string;
    try {
      raw = await readFile(this.reportPath, 'utf8');
    } catch (error) {
      throw new ScanSetupError('REPORT_UNREADABLE', `Cannot read report ${this.reportPath}`, { cause: error });
    }

    try {
      return ReportSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new ScanSetupError('REPORT_UNREADABLE', `Report ${this.reportPath} is not a valid scan report`, { cause: error });
    }
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof ZodError) {
      res.status(400).json({ error: 'Invalid request', issues: error.issues.map((issue) => issue.message) });
      return;
    }

    if (error instanceof ScanSetupError) {
      this.logger.warn(error.message);
      res.status(503).json({ error: error.message });
      return;
    }

    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    this.logger.error('Request failed', { error: errorMessage });
    res.status(500).json({ error: errorMessage });
  }

  /** Resolves to the bound port, which differs from the configured one when that is 0. */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger.info(`Report API running on http://localhost:${port}`);
        this.logger.info(`Serving ${this.reportPath}`);
        resolve(port);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
