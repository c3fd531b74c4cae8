import { qualifiedName, sanitizeIdentifier } from '../sql/identifiers';
import type { SqlRunner, StagingSource } from '../types/ingestion';
import { pgp } from './postgres';

/**
 * Staging relation: one TEXT column of raw delimiter-joined lines.
 * Rows are written verbatim and never split, trimmed or updated here.
 */

export function buildStagingTableStatement(source: StagingSource): string {
  return `CREATE TABLE IF NOT EXISTS ${qualifiedName(source.schema, source.table)} (\n  ${sanitizeIdentifier(source.column)} TEXT\n)`;
}

/**
 * Ensure the staging table exists (idempotent)
 */
export async function ensureStagingTable(db: SqlRunner, source: StagingSource): Promise<void> {
  await db.none(buildStagingTableStatement(source));
}

/**
 * Column set for batch inserts into the staging table using pgp.helpers.
 * Only used to render VALUES tuples; the target name is rendered by
 * `qualifiedName` so it matches the CREATE TABLE above.
 */
const stagingColumns = new pgp.helpers.ColumnSet(['line']);

export function buildStageRowsStatement(source: StagingSource, rows: readonly string[]): string {
  const values = pgp.helpers.values(
    rows.map((line) => ({ line })),
    stagingColumns
  );
  return `INSERT INTO ${qualifiedName(source.schema, source.table)} (${sanitizeIdentifier(source.column)}) VALUES ${values}`;
}

/**
 * Insert a batch of raw lines into the staging table, in order.
 */
export async function stageRows(db: SqlRunner, source: StagingSource, rows: readonly string[]): Promise<number> {
  if (rows.length === 0) return 0;

  const result = await db.result(buildStageRowsStatement(source, rows));

  console.log(`[DB] Staged ${result.rowCount} row(s)`);
  return result.rowCount;
}
