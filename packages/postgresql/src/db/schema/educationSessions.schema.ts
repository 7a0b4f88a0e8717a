import type { JsonValue } from '@edu-sessions/core';
import { index, integer, jsonb, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';

// updated_at has no $onUpdate: the trg_education_sessions_updated_at trigger owns it
export const educationSessionsTable = pgTable(
  'education_sessions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: text('user_id').notNull(),
    topic: text('topic').notNull(),
    processType: text('process_type').notNull(),
    steps: jsonb('steps').$type<JsonValue[]>().notNull().default([]),
    currentIndex: integer('current_index').notNull().default(0),
    history: jsonb('history').$type<JsonValue[]>().notNull().default([]),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_education_sessions_user').on(table.userId),
    index('idx_education_sessions_updated').on(table.updatedAt.desc()),
  ],
);
