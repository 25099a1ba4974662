import { pgTable, uuid, text, date, boolean, timestamp } from 'drizzle-orm/pg-core';
import { EVIDENCE_TYPES } from '../../shared/constants';
import { cases } from './cases';
import { users } from './users';

export const evidence = pgTable('evidence', {
  id: uuid('id').primaryKey().defaultRandom(),
  caseId: uuid('case_id')
    .notNull()
    .references(() => cases.id, { onDelete: 'cascade' }),
  evidenceType: text('evidence_type', { enum: EVIDENCE_TYPES }).notNull(),
  title: text('title').notNull(),
  description: text('description').notNull(),
  submittedBy: text('submitted_by'),
  recordedById: uuid('recorded_by_id')
    .notNull()
    .references(() => users.id),
  submissionDate: date('submission_date').notNull(),
  notes: text('notes'),
  isAdmissible: boolean('is_admissible').notNull().default(true),
  // null = pending, true = approved, false = rejected
  isApproved: boolean('is_approved'),
  reviewedById: uuid('reviewed_by_id').references(() => users.id, { onDelete: 'set null' }),
  reviewedDate: date('reviewed_date'),
  reviewNotes: text('review_notes'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
