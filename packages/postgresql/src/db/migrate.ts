import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { createSilentLogger } from '@edu-sessions/core';
import { sql } from 'drizzle-orm';
import type { Logger } from 'pino';

import type { EducationDatabase } from './database.js';

export const MIGRATIONS_FOLDER = fileURLToPath(new URL('./migrations/', import.meta.url));

/** Separator between statements of a migration file, as written by drizzle-kit */
export const STATEMENT_BREAKPOINT = '--> statement-breakpoint';

export interface MigrationOptions {
  /** Directory of `.sql` files (defaults to the bundled migrations) */
  migrationsFolder?: string;
  logger?: Logger;
}

/**
 * Splits a migration file into individually executable statements.
 */
export function splitStatements(source: string): string[] {
  return source
    .split(STATEMENT_BREAKPOINT)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

/**
 * Applies every `.sql` file of the migrations folder in file-name order,
 * one transaction per file. Statements are guarded (`if not exists`,
 * `or replace`, `if exists`), so applying them again is a no-op.
 *
 * @returns Names of the applied files
 */
export async function applyMigrations(
  db: EducationDatabase,
  options: MigrationOptions = {},
): Promise<string[]> {
  const logger = options.logger ?? createSilentLogger();
  const folder = options.migrationsFolder ?? MIGRATIONS_FOLDER;

  const files = (await readdir(folder)).filter((file) => file.endsWith('.sql')).sort();
  logger.debug({ folder, files }, 'applying migrations');

  for (const file of files) {
    const statements = splitStatements(await readFile(join(folder, file), 'utf8'));

    await db.transaction(async (tx) => {
      for (const statement of statements) {
        await tx.execute(sql.raw(statement));
      }
    });

    logger.info({ file, statements: statements.length }, 'migration applied');
  }

  return files;
}
