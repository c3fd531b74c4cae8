import { sanitizeIdentifier, qualifiedName } from '../sql/identifiers';
import { buildHeaderQuery, buildLoadStatement, buildSchemaStatement } from '../sql/statements';
import type { IngestionSummary, SqlRunner, StagingSource } from '../types/ingestion';

function headerValue(row: unknown): string | null {
  if (typeof row === 'object' && row !== null && 'header_row' in row) {
    return typeof row.header_row === 'string' ? row.header_row : null;
  }
  return null;
}

/**
 * Builds and fills a destination table from the rows of one staging relation.
 *
 * Each public operation re-reads the staging header; generated statements
 * are not cached. `createTable` and `loadData` run as separate statements
 * with no surrounding transaction: if loading fails, the created table stays.
 * Errors from the database are passed through untouched.
 */
export class StagingIngestion {
  constructor(
    private readonly db: SqlRunner,
    private readonly source: StagingSource
  ) {}

  /**
   * Raw fields of the first staging row, split on the delimiter.
   * Empty when there is no row, or the row is NULL or empty.
   */
  async readHeaderFragments(): Promise<string[]> {
    const rows = await this.db.any(buildHeaderQuery(this.source));
    const header = rows.length > 0 ? headerValue(rows[0]) : null;

    if (header === null || header === '') {
      return [];
    }
    return header.split(this.source.delimiter);
  }

  async inferColumns(): Promise<string[]> {
    const fragments = await this.readHeaderFragments();
    return fragments.map(sanitizeIdentifier);
  }

  async buildSchemaStatement(namespace: string, table: string): Promise<string> {
    const columns = await this.inferColumns();
    return buildSchemaStatement(columns, { namespace, table });
  }

  async createTable(namespace: string, table: string): Promise<void> {
    const columns = await this.inferColumns();
    await this.db.none(buildSchemaStatement(columns, { namespace, table }));
    console.log(`[Ingest] Created table ${qualifiedName(namespace, table)} (${columns.length} columns)`);
  }

  async buildLoadStatement(namespace: string, table: string): Promise<string> {
    const columns = await this.inferColumns();
    return buildLoadStatement(columns, { namespace, table }, this.source);
  }

  /**
   * Copy every staging row, header included, into the table. Returns the
   * number of rows inserted.
   */
  async loadData(namespace: string, table: string): Promise<number> {
    const columns = await this.inferColumns();
    const result = await this.db.result(buildLoadStatement(columns, { namespace, table }, this.source));
    console.log(
      `[Ingest] Loaded ${result.rowCount.toLocaleString()} row(s) into ${qualifiedName(namespace, table)} (${columns.length} columns)`
    );
    return result.rowCount;
  }

  /**
   * Create, then load. A failure while creating means nothing is loaded.
   */
  async run(namespace: string, table: string): Promise<IngestionSummary> {
    console.log(
      `[Ingest] Starting ingestion from ${qualifiedName(this.source.schema, this.source.table)} into ${qualifiedName(namespace, table)}`
    );
    await this.createTable(namespace, table);
    const rowCount = await this.loadData(namespace, table);
    return { target: { namespace, table }, rowCount };
  }
}
