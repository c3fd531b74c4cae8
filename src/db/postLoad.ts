import { LengthMismatchError, PreconditionError } from '../errors';
import { qualifiedName, sanitizeIdentifier } from '../sql/identifiers';
import type { SqlRunner, TableTarget } from '../types/ingestion';
import { pgp } from './postgres';

/**
 * Optional clean-up after a load. The loaded table still holds the header
 * line as an ordinary row and has no keys; none of this runs unless the
 * caller asks for it.
 */

/**
 * `DELETE FROM ns.table WHERE c1 = 'h1' AND c2 = 'h2' ...` matching the row
 * whose values are the raw header fragments.
 */
export function buildHeaderDeleteStatement(
  columns: readonly string[],
  headerFragments: readonly string[],
  target: TableTarget
): string {
  if (columns.length !== headerFragments.length) {
    throw new LengthMismatchError(
      columns.length,
      headerFragments.length,
      `Header has ${headerFragments.length} field(s) but ${columns.length} column(s) were given`
    );
  }
  if (columns.length === 0) {
    throw new PreconditionError('Cannot match a header row without columns');
  }

  const conditions = columns.map((column, index) => `${column} = ${pgp.as.text(headerFragments[index])}`);
  return `DELETE FROM ${qualifiedName(target.namespace, target.table)} WHERE ${conditions.join(' AND ')}`;
}

export async function removeHeaderRow(
  db: SqlRunner,
  target: TableTarget,
  columns: readonly string[],
  headerFragments: readonly string[]
): Promise<number> {
  const result = await db.result(buildHeaderDeleteStatement(columns, headerFragments, target));
  console.log(`[Ingest] Removed ${result.rowCount} header row(s) from ${qualifiedName(target.namespace, target.table)}`);
  return result.rowCount;
}

export function buildPrimaryKeyStatement(target: TableTarget, column: string): string {
  const constraint = sanitizeIdentifier(`${target.table.trim()}_pk`);
  return `ALTER TABLE ${qualifiedName(target.namespace, target.table)} ADD CONSTRAINT ${constraint} PRIMARY KEY (${sanitizeIdentifier(column)})`;
}

export async function addPrimaryKey(db: SqlRunner, target: TableTarget, column: string): Promise<void> {
  await db.none(buildPrimaryKeyStatement(target, column));
  console.log(`[Ingest] Added primary key on ${sanitizeIdentifier(column)}`);
}

export function buildUniqueIndexStatement(target: TableTarget, column: string): string {
  const index = sanitizeIdentifier(`${target.table.trim()}_${column.trim()}_idx`);
  return `CREATE UNIQUE INDEX ${index} ON ${qualifiedName(target.namespace, target.table)} (${sanitizeIdentifier(column)})`;
}

export async function addUniqueIndex(db: SqlRunner, target: TableTarget, column: string): Promise<void> {
  await db.none(buildUniqueIndexStatement(target, column));
  console.log(`[Ingest] Added unique index on ${sanitizeIdentifier(column)}`);
}
