import { pgp } from '../db/postgres';
import { PreconditionError } from '../errors';
import type { StagingSource, TableTarget } from '../types/ingestion';
import { qualifiedName, sanitizeIdentifier } from './identifiers';

/**
 * Statement text builders. Every identifier placed in the output has been
 * through `sanitizeIdentifier`, and the delimiter is emitted as a quoted
 * literal, so no raw header or caller text lands in the SQL unescaped.
 *
 * `columns` are expected to be sanitized already (see `StagingIngestion.inferColumns`).
 */

function requireColumns(columns: readonly string[], target: TableTarget, statement: string): void {
  if (columns.length === 0) {
    throw new PreconditionError(
      `Cannot build ${statement} for ${qualifiedName(target.namespace, target.table)}: no columns were inferred from the staging data`
    );
  }
}

/**
 * `CREATE TABLE ns.table (...)` with one TEXT column per identifier, one per line.
 */
export function buildSchemaStatement(columns: readonly string[], target: TableTarget): string {
  requireColumns(columns, target, 'CREATE TABLE');

  const definitions = columns.map((column) => `  ${column} TEXT`);
  return `CREATE TABLE ${qualifiedName(target.namespace, target.table)} (\n${definitions.join(',\n')}\n)`;
}

/**
 * Expression yielding the fragment at `ordinal` (1-based) of a staging row.
 * Past the end of a short row it evaluates to NULL.
 */
export function extractionExpression(source: StagingSource, ordinal: number): string {
  const column = sanitizeIdentifier(source.column);
  return `(STRING_TO_ARRAY(${column}, ${pgp.as.text(source.delimiter)}))[${ordinal}]`;
}

/**
 * `INSERT INTO ns.table (...) SELECT ... FROM staging` with one extraction
 * per column, the Nth reading ordinal N. All staging rows are selected,
 * the header included.
 */
export function buildLoadStatement(
  columns: readonly string[],
  target: TableTarget,
  source: StagingSource
): string {
  requireColumns(columns, target, 'INSERT ... SELECT');

  const insertPart = `INSERT INTO ${qualifiedName(target.namespace, target.table)} (${columns.join(', ')})`;
  const projections = columns.map((_, index) => `  ${extractionExpression(source, index + 1)}`);
  const selectPart = `SELECT\n${projections.join(',\n')}\nFROM ${qualifiedName(source.schema, source.table)}`;

  return `${insertPart}\n${selectPart}`;
}

/**
 * `SELECT <column> AS header_row FROM staging LIMIT 1`. No ORDER BY: a
 * freshly loaded, never-updated staging table returns its first row first.
 */
export function buildHeaderQuery(source: StagingSource): string {
  return `SELECT ${sanitizeIdentifier(source.column)} AS header_row FROM ${qualifiedName(source.schema, source.table)} LIMIT 1`;
}
