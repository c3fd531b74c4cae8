import express, { Request, Response, NextFunction, type Express } from 'express';
import { ZodError } from 'zod';
import type { Settings } from './config/settings';
import { HttpError, LengthMismatchError, PreconditionError, badRequest, notFound } from './errors';
import type { JobStore } from './jobs/jobStore';
import { createJobQueue, ingestionRequestSchema } from './jobs/processors';
import { createUploadMiddleware } from './middleware/upload';
import { StagingIngestion } from './pipeline/stagingIngestion';
import type { SqlRunner } from './types/ingestion';

export interface AppContext {
  db: SqlRunner;
  settings: Settings;
  jobs: JobStore;
}

function queryString(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw badRequest(`Query parameter "${name}" is required`);
  }
  return value;
}

/**
 * Build the HTTP app. Starts the job queue but not the listener.
 */
export function createApp({ db, settings, jobs }: AppContext): Express {
  const jobQueue = createJobQueue({ db, settings }, jobs);
  const uploadMiddleware = createUploadMiddleware(settings.storageDir);

  const app = express();
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      staging: `${settings.staging.schema}.${settings.staging.table}`,
      queue: {
        length: jobQueue.length(),
        running: jobQueue.running(),
        idle: jobQueue.idle(),
      },
    });
  });

  /**
   * API: Upload a delimited file and append its lines to the staging table
   */
  app.post('/api/staging', uploadMiddleware, (req: Request, res: Response, next: NextFunction): void => {
    const file = req.file;
    if (!file) {
      next(badRequest('No file uploaded'));
      return;
    }

    const job = jobs.create('staging');
    console.log(`[API] File uploaded: ${file.path} (${file.originalname}), job ${job.id}`);

    void jobQueue.push({ kind: 'staging', jobId: job.id, filePath: file.path, originalName: file.originalname });

    res.status(202).json({
      success: true,
      jobId: job.id,
      status: job.status,
      statusUrl: `/api/status/${job.id}`,
    });
  });

  /**
   * API: Preview the inferred columns and both generated statements without running them
   */
  app.get('/api/tables/statements', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const namespace = queryString(req.query.namespace, 'namespace');
      const table = queryString(req.query.table, 'table');
      const ingestion = new StagingIngestion(db, settings.staging);

      res.json({
        success: true,
        columns: await ingestion.inferColumns(),
        schemaStatement: await ingestion.buildSchemaStatement(namespace, table),
        loadStatement: await ingestion.buildLoadStatement(namespace, table),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * API: Create and load a destination table from the staging rows
   */
  app.post('/api/tables', (req: Request, res: Response, next: NextFunction): void => {
    const parsed = ingestionRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      next(parsed.error);
      return;
    }

    const job = jobs.create('ingestion');
    console.log(`[API] Ingestion into ${parsed.data.namespace}.${parsed.data.table} queued as ${job.id}`);

    void jobQueue.push({ kind: 'ingestion', jobId: job.id, request: parsed.data });

    res.status(202).json({
      success: true,
      jobId: job.id,
      status: job.status,
      statusUrl: `/api/status/${job.id}`,
    });
  });

  /**
   * API: Check job status
   */
  app.get('/api/status/:jobId', (req: Request, res: Response, next: NextFunction): void => {
    const job = jobs.get(req.params.jobId);
    if (!job) {
      next(notFound('Job not found or expired'));
      return;
    }
    res.json({ success: true, job });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      res.status(400).json({ success: false, error: 'validation_failed', issues: err.issues });
      return;
    }
    if (err instanceof HttpError) {
      res.status(err.statusCode).json({ success: false, error: err.message, details: err.details });
      return;
    }
    if (err instanceof PreconditionError || err instanceof LengthMismatchError) {
      res.status(422).json({ success: false, error: err.message });
      return;
    }

    console.error('Error:', err);
    res.status(500).json({ success: false, error: err instanceof Error ? err.message : 'Internal server error' });
  });

  return app;
}
