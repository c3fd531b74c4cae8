/**
 * Types shared by the staging loader, the statement generators and the
 * ingestion pipeline.
 */

/**
 * Where the raw rows live: a single-column relation of delimiter-joined
 * lines, header line first.
 */
export interface StagingSource {
  /** Namespace of the staging relation (default: 'public') */
  schema: string;
  /** Name of the staging relation (default: 'tsv_rows') */
  table: string;
  /** The one text column holding each raw line (default: 'data_row') */
  column: string;
  /** Field delimiter, fixed for the whole run (default: tab) */
  delimiter: string;
}

/**
 * Destination of an ingestion run. Both parts are caller-supplied.
 */
export interface TableTarget {
  namespace: string;
  table: string;
}

/**
 * Minimal slice of the pg-promise database protocol the pipeline needs.
 * A pg-promise `IDatabase` or task context satisfies it. Rows come back
 * untyped and are checked where they are read.
 */
export interface SqlRunner {
  any(query: string, values?: unknown): Promise<unknown[]>;
  none(query: string, values?: unknown): Promise<null>;
  result(query: string, values?: unknown): Promise<{ rowCount: number }>;
}

export interface IngestionSummary {
  target: TableTarget;
  rowCount: number;
}

export interface FrequencyEntry<T> {
  element: T;
  count: number;
}
