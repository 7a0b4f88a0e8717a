import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import * as schema from '../src/db/schema/index.js';
import { applyMigrations, MIGRATIONS_FOLDER, splitStatements } from '../src/index.js';

let client: PGlite;

beforeAll(() => {
  client = new PGlite();
});

afterAll(async () => {
  await client.close();
});

describe('splitStatements', () => {
  it('splits on statement breakpoints and drops blank chunks', () => {
    const source = 'select 1;\n--> statement-breakpoint\n\n--> statement-breakpoint\nselect 2;\n';
    expect(splitStatements(source)).toEqual(['select 1;', 'select 2;']);
  });

  it('finds every statement of the bundled migration', async () => {
    const source = await readFile(join(MIGRATIONS_FOLDER, '0000_education_sessions.sql'), 'utf8');
    expect(splitStatements(source)).toHaveLength(6);
  });
});

describe('applyMigrations', () => {
  it('can be applied repeatedly', async () => {
    const db = drizzle(client, { schema });

    await expect(applyMigrations(db)).resolves.toEqual(['0000_education_sessions.sql']);
    await expect(applyMigrations(db)).resolves.toEqual(['0000_education_sessions.sql']);
  });

  it('creates the lookup indexes', async () => {
    const { rows } = await client.query<{ indexname: string }>(
      `select indexname from pg_indexes where tablename = 'education_sessions' order by indexname`,
    );
    expect(rows.map((row) => row.indexname)).toEqual([
      'education_sessions_pkey',
      'idx_education_sessions_updated',
      'idx_education_sessions_user',
    ]);
  });

  it('orders the updated_at index newest first', async () => {
    const { rows } = await client.query<{ indexdef: string }>(
      `select indexdef from pg_indexes where indexname = 'idx_education_sessions_updated'`,
    );
    expect(rows).toHaveLength(1);
    expect(rows[0]?.indexdef).toContain('(updated_at DESC)');
  });

  it('installs exactly one updated_at trigger', async () => {
    const { rows } = await client.query<{ tgname: string }>(
      `select tgname from pg_trigger
       where tgrelid = 'education_sessions'::regclass and not tgisinternal`,
    );
    expect(rows.map((row) => row.tgname)).toEqual(['trg_education_sessions_updated_at']);
  });
});
