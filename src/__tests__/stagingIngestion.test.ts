import { describe, expect, it, vi } from 'vitest';
import { PreconditionError } from '../errors';
import { addPrimaryKey, removeHeaderRow } from '../db/postLoad';
import { StagingIngestion } from '../pipeline/stagingIngestion';
import type { StagingSource } from '../types/ingestion';
import { InMemoryStore } from './helpers/inMemoryStore';

const source: StagingSource = { schema: 'public', table: 'tsv_rows', column: 'data_row', delimiter: '\t' };

function setup(rows: (string | null)[]) {
  const store = new InMemoryStore(rows);
  return { store, ingestion: new StagingIngestion(store, source) };
}

describe('StagingIngestion', () => {
  describe('inferColumns', () => {
    it('sanitizes each header field in order', async () => {
      const { ingestion } = setup(['a\tb c\t_d9', 'x\ty\tz']);

      await expect(ingestion.inferColumns()).resolves.toEqual(['a', '"b c"', '_d9']);
    });

    it('returns no columns for empty staging data', async () => {
      const { ingestion } = setup([]);

      await expect(ingestion.inferColumns()).resolves.toEqual([]);
    });

    it('returns no columns when the first row is NULL or empty', async () => {
      await expect(setup([null, 'a\tb']).ingestion.inferColumns()).resolves.toEqual([]);
      await expect(setup(['', 'a\tb']).ingestion.inferColumns()).resolves.toEqual([]);
    });

    it('keeps the raw fragments available for header matching', async () => {
      const { ingestion } = setup([' id \tb c']);

      await expect(ingestion.readHeaderFragments()).resolves.toEqual([' id ', 'b c']);
    });
  });

  describe('buildSchemaStatement', () => {
    it('follows the inferred column order', async () => {
      const { ingestion } = setup(['a\tb c\t_d9']);

      await expect(ingestion.buildSchemaStatement('public', 't')).resolves.toBe(
        'CREATE TABLE public.t (\n  a TEXT,\n  "b c" TEXT,\n  _d9 TEXT\n)'
      );
    });
  });

  describe('buildLoadStatement', () => {
    it('emits one extraction per inferred column', async () => {
      const { ingestion } = setup(['a\tb\tc\td']);

      const statement = await ingestion.buildLoadStatement('public', 't');

      expect(statement.split('\n')[0]).toBe('INSERT INTO public.t (a, b, c, d)');
      expect(statement.match(/STRING_TO_ARRAY/g)).toHaveLength(4);
    });
  });

  describe('run', () => {
    it('copies every row positionally, header included', async () => {
      const { store, ingestion } = setup(['a\tb c\t_d9', 'x1\ty1\tz1', 'x2\ty2\tz2']);

      const summary = await ingestion.run('public', 't');

      expect(summary).toEqual({ target: { namespace: 'public', table: 't' }, rowCount: 3 });
      expect(store.tables.get('public.t')?.columns).toEqual(['a', '"b c"', '_d9']);
      expect(store.rowsOf('public.t')).toEqual([
        ['a', 'b c', '_d9'],
        ['x1', 'y1', 'z1'],
        ['x2', 'y2', 'z2'],
      ]);
    });

    it('fills missing trailing fields of a short row with NULL', async () => {
      const { store, ingestion } = setup(['a\tb\tc', 'only\tsome', 'x\ty\tz\textra']);

      await ingestion.run('public', 't');

      expect(store.rowsOf('public.t')).toEqual([
        ['a', 'b', 'c'],
        ['only', 'some', null],
        ['x', 'y', 'z'],
      ]);
    });

    it('aborts before generating any statement when staging is empty', async () => {
      const { store, ingestion } = setup([]);

      await expect(ingestion.run('public', 't')).rejects.toThrow(PreconditionError);
      expect(store.statements).toEqual(['SELECT data_row AS header_row FROM public.tsv_rows LIMIT 1']);
      expect(store.tables.size).toBe(0);
    });

    it('fails on a second run because the table already exists', async () => {
      const { store, ingestion } = setup(['a\tb', '1\t2']);

      await ingestion.run('public', 't');
      await expect(ingestion.run('public', 't')).rejects.toThrow('relation "public.t" already exists');
      expect(store.rowsOf('public.t')).toHaveLength(2);
    });

    it('logs each phase with its column count', async () => {
      const { ingestion } = setup(['a\tb c\t_d9', 'x1\ty1\tz1', 'x2\ty2\tz2']);
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      try {
        await ingestion.run('public', 't');

        expect(log).toHaveBeenCalledWith('[Ingest] Created table public.t (3 columns)');
        expect(log).toHaveBeenCalledWith('[Ingest] Loaded 3 row(s) into public.t (3 columns)');
      } finally {
        log.mockRestore();
      }
    });

    it('leaves the created table in place when loading fails', async () => {
      const { store, ingestion } = setup(['a\tb', '1\t2']);
      vi.spyOn(store, 'result').mockRejectedValueOnce(new Error('canceling statement due to statement timeout'));

      await expect(ingestion.run('public', 't')).rejects.toThrow('canceling statement due to statement timeout');
      expect(store.rowsOf('public.t')).toEqual([]);
    });
  });

  describe('loadData', () => {
    // Into a plain table a repeated load just appends; it fails once the caller has keyed the table
    it('fails when repeated against a keyed table', async () => {
      const { store, ingestion } = setup(['id\tname', '1\tone', '2\ttwo']);
      const target = { namespace: 'public', table: 't' };

      await ingestion.run('public', 't');
      await removeHeaderRow(store, target, ['id', 'name'], ['id', 'name']);
      await addPrimaryKey(store, target, 'id');

      await expect(ingestion.loadData('public', 't')).rejects.toThrow(
        'duplicate key value violates unique constraint "t_pk"'
      );
      expect(store.rowsOf('public.t')).toEqual([
        ['1', 'one'],
        ['2', 'two'],
      ]);
    });

    it('fails when the table was never created', async () => {
      const { ingestion } = setup(['a\tb']);

      await expect(ingestion.loadData('public', 'missing')).rejects.toThrow('relation "public.missing" does not exist');
    });
  });
});
