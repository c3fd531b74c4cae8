import { describe, expect, it } from 'vitest';
import { buildStageRowsStatement, buildStagingTableStatement, ensureStagingTable, stageRows } from '../db/staging';
import type { StagingSource } from '../types/ingestion';
import { InMemoryStore } from './helpers/inMemoryStore';

const source: StagingSource = { schema: 'public', table: 'tsv_rows', column: 'data_row', delimiter: '\t' };

describe('staging table', () => {
  it('is a single TEXT column', () => {
    expect(buildStagingTableStatement(source)).toBe('CREATE TABLE IF NOT EXISTS public.tsv_rows (\n  data_row TEXT\n)');
  });

  it('is created idempotently', async () => {
    const store = new InMemoryStore();

    await ensureStagingTable(store, source);
    await ensureStagingTable(store, source);

    expect(store.statements).toHaveLength(2);
  });
});

describe('stageRows', () => {
  it('renders raw lines as literal VALUES tuples', () => {
    expect(buildStageRowsStatement(source, ['a\tb', "it's"])).toBe(
      "INSERT INTO public.tsv_rows (data_row) VALUES ('a\tb'),('it''s')"
    );
  });

  it('appends lines in order without altering them', async () => {
    const store = new InMemoryStore(['h1\th2']);

    const count = await stageRows(store, source, [' v1\tv2 ', "o'k\t"]);

    expect(count).toBe(2);
    expect(store.stagingRows).toEqual(['h1\th2', ' v1\tv2 ', "o'k\t"]);
  });

  it('does nothing for an empty batch', async () => {
    const store = new InMemoryStore();

    await expect(stageRows(store, source, [])).resolves.toBe(0);
    expect(store.statements).toEqual([]);
  });
});
