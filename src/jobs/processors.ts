import { queue as asyncQueue, type QueueObject } from 'async';
import * as fs from 'fs';
import { z } from 'zod';
import type { Settings } from '../config/settings';
import { addPrimaryKey, addUniqueIndex, removeHeaderRow } from '../db/postLoad';
import { ensureStagingTable, stageRows } from '../db/staging';
import { readRawRows } from '../parsers/lineReader';
import { StagingIngestion } from '../pipeline/stagingIngestion';
import { sanitizeIdentifier } from '../sql/identifiers';
import type { SqlRunner, TableTarget } from '../types/ingestion';
import type { JobStore } from './jobStore';

export const ingestionRequestSchema = z.object({
  namespace: z.string().trim().min(1),
  table: z.string().trim().min(1),
  removeHeader: z.boolean().default(false),
  primaryKey: z.string().trim().min(1).optional(),
  uniqueColumns: z.array(z.string().trim().min(1)).default([]),
});

export type IngestionRequest = z.infer<typeof ingestionRequestSchema>;

export interface StagingJob {
  kind: 'staging';
  jobId: string;
  filePath: string;
  originalName: string;
}

export interface IngestionJob {
  kind: 'ingestion';
  jobId: string;
  request: IngestionRequest;
}

export type PipelineJob = StagingJob | IngestionJob;

export interface JobContext {
  db: SqlRunner;
  settings: Settings;
}

export interface StagingJobResult {
  file: string;
  lineCount: number;
  stagedRows: number;
}

export interface IngestionJobResult {
  target: TableTarget;
  columns: string[];
  rowCount: number;
  headerRowsRemoved: number;
  primaryKey?: string;
  uniqueColumns: string[];
}

/**
 * Copy an uploaded file into the staging table, line by line. The uploaded
 * file is deleted afterwards whether or not staging succeeded.
 */
export async function processStagingJob(job: StagingJob, context: JobContext): Promise<StagingJobResult> {
  const { db, settings } = context;
  console.log(`[Staging] Processing file: ${job.filePath} (${job.originalName})`);

  try {
    await ensureStagingTable(db, settings.staging);

    let stagedRows = 0;
    const { lineCount } = await readRawRows(
      fs.createReadStream(job.filePath),
      async (lines) => {
        stagedRows += await stageRows(db, settings.staging, lines);
      },
      { batchSize: settings.stagingBatchSize }
    );

    console.log(`[Staging] Staged ${stagedRows.toLocaleString()} of ${lineCount.toLocaleString()} line(s)`);
    return { file: job.originalName, lineCount, stagedRows };
  } finally {
    if (fs.existsSync(job.filePath)) {
      fs.unlinkSync(job.filePath);
      console.log(`[Cleanup] Deleted temporary file: ${job.filePath}`);
    }
  }
}

/**
 * Create and load the destination table, then apply whichever post-load
 * steps the request names, in order: header removal, primary key, unique
 * indexes. Any failure stops the job where it happened; earlier steps are
 * not undone.
 */
export async function processIngestionJob(job: IngestionJob, context: JobContext): Promise<IngestionJobResult> {
  const { db, settings } = context;
  const { namespace, table, removeHeader, primaryKey, uniqueColumns } = job.request;
  const target: TableTarget = { namespace, table };
  const ingestion = new StagingIngestion(db, settings.staging);

  const header = await ingestion.readHeaderFragments();
  const columns = header.map(sanitizeIdentifier);
  const { rowCount } = await ingestion.run(namespace, table);

  let headerRowsRemoved = 0;
  if (removeHeader) {
    headerRowsRemoved = await removeHeaderRow(db, target, columns, header);
  }
  if (primaryKey) {
    await addPrimaryKey(db, target, primaryKey);
  }
  for (const column of uniqueColumns) {
    await addUniqueIndex(db, target, column);
  }

  return { target, columns, rowCount, headerRowsRemoved, primaryKey, uniqueColumns };
}

/**
 * Queue that runs one job at a time and records each outcome in `store`.
 */
export function createJobQueue(context: JobContext, store: JobStore): QueueObject<PipelineJob> {
  const jobQueue: QueueObject<PipelineJob> = asyncQueue(async (job: PipelineJob) => {
    console.log(`[Queue] Starting ${job.kind} job ${job.jobId} (queue length: ${jobQueue.length()})`);
    store.update(job.jobId, { status: 'processing' });

    try {
      const result =
        job.kind === 'staging'
          ? await processStagingJob(job, context)
          : await processIngestionJob(job, context);
      store.update(job.jobId, { status: 'completed', result });
      console.log(`[Queue] Finished ${job.kind} job ${job.jobId}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      store.update(job.jobId, { status: 'failed', error: message });
      throw error;
    }
  }, 1); // concurrency = 1 (one job at a time)

  jobQueue.error((err, job) => {
    console.error(`[Queue] Job ${job.jobId} failed with error:`, err);
  });

  jobQueue.drain(() => {
    console.log('[Queue] All jobs processed, queue is now empty');
  });

  return jobQueue;
}
