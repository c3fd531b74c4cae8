export type JobKind = 'staging' | 'ingestion';

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface JobRecord {
  id: string;
  kind: JobKind;
  status: JobStatus;
  createdAt: string;
  updatedAt?: string;
  result?: unknown;
  error?: string;
}

const JOB_RESULT_TTL = 3600000; // Keep results for 1 hour

/**
 * In-memory job results for status polling (in production, use Redis)
 */
export class JobStore {
  private readonly jobs = new Map<string, JobRecord>();

  constructor(private readonly ttlMs: number = JOB_RESULT_TTL) {}

  create(kind: JobKind): JobRecord {
    const id = `job-${Date.now()}-${Math.round(Math.random() * 1e9)}`;
    const record: JobRecord = {
      id,
      kind,
      status: 'queued',
      createdAt: new Date().toISOString(),
    };
    this.jobs.set(id, record);

    const timer = setTimeout(() => {
      this.jobs.delete(id);
      console.log(`[API] Cleaned up job result: ${id}`);
    }, this.ttlMs);
    timer.unref();

    return record;
  }

  get(id: string): JobRecord | undefined {
    return this.jobs.get(id);
  }

  update(id: string, updates: Partial<Omit<JobRecord, 'id' | 'kind' | 'createdAt'>>): void {
    const current = this.jobs.get(id);
    if (!current) return;
    this.jobs.set(id, { ...current, ...updates, updatedAt: new Date().toISOString() });
  }
}
