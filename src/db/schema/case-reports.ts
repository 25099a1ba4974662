import { pgTable, uuid, text, boolean, timestamp } from 'drizzle-orm/pg-core';
import { CASE_REPORT_TYPES, REPORT_PRIORITIES } from '../../shared/constants';
import { cases } from './cases';
import { users } from './users';

export const caseReports = pgTable('case_reports', {
  id: uuid('id').primaryKey().defaultRandom(),
  caseId: uuid('case_id')
    .notNull()
    .references(() => cases.id, { onDelete: 'cascade' }),
  reportType: text('report_type', { enum: CASE_REPORT_TYPES }).notNull().default('final'),
  title: text('title').notNull(),
  content: text('content').notNull(),
  recommendations: text('recommendations'),
  priority: text('priority', { enum: REPORT_PRIORITIES }).notNull().default('medium'),
  submittedById: uuid('submitted_by_id')
    .notNull()
    .references(() => users.id),
  submittedAt: timestamp('submitted_at', { withTimezone: true }).notNull().defaultNow(),
  isApproved: boolean('is_approved').notNull().default(false),
  approvedById: uuid('approved_by_id').references(() => users.id, { onDelete: 'set null' }),
  approvedAt: timestamp('approved_at', { withTimezone: true }),
});
