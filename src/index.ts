export { createApp } from './app';
export type { AppContext } from './app';
export { loadSettings, parseDelimiter } from './config/settings';
export type { Settings, DatabaseSettings } from './config/settings';
export { getDb, closeDb, pgp } from './db/postgres';
export { ensureStagingTable, stageRows, buildStagingTableStatement, buildStageRowsStatement } from './db/staging';
export {
  addPrimaryKey,
  addUniqueIndex,
  removeHeaderRow,
  buildHeaderDeleteStatement,
  buildPrimaryKeyStatement,
  buildUniqueIndexStatement,
} from './db/postLoad';
export { PreconditionError, LengthMismatchError, HttpError } from './errors';
export { readRawRows } from './parsers/lineReader';
export { StagingIngestion } from './pipeline/stagingIngestion';
export { sanitizeIdentifier, qualifiedName } from './sql/identifiers';
export { buildSchemaStatement, buildLoadStatement, buildHeaderQuery, extractionExpression } from './sql/statements';
export { frequencyCount, pairwiseMap } from './utils/arrays';
export type { StagingSource, TableTarget, SqlRunner, IngestionSummary, FrequencyEntry } from './types/ingestion';
