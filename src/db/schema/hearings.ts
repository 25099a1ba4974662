import { pgTable, uuid, text, boolean, timestamp } from 'drizzle-orm/pg-core';
import { HEARING_TYPES } from '../../shared/constants';
import { cases } from './cases';
import { users } from './users';

export const hearings = pgTable('hearings', {
  id: uuid('id').primaryKey().defaultRandom(),
  caseId: uuid('case_id')
    .notNull()
    .references(() => cases.id, { onDelete: 'cascade' }),
  hearingType: text('hearing_type', { enum: HEARING_TYPES }).notNull(),
  scheduledAt: timestamp('scheduled_at', { withTimezone: true }).notNull(),
  courtroom: text('courtroom').notNull(),
  judgeId: uuid('judge_id')
    .notNull()
    .references(() => users.id),
  clerkId: uuid('clerk_id').references(() => users.id),
  createdById: uuid('created_by_id').references(() => users.id),
  notes: text('notes'),
  outcome: text('outcome'),
  isCompleted: boolean('is_completed').notNull().default(false),
  completedById: uuid('completed_by_id').references(() => users.id, { onDelete: 'set null' }),
  completedAt: timestamp('completed_at', { withTimezone: true }),
  isCancelled: boolean('is_cancelled').notNull().default(false),
  cancellationReason: text('cancellation_reason'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
