import { pgTable, uuid, text, date, numeric, timestamp } from 'drizzle-orm/pg-core';
import {
  CASE_PRIORITIES,
  CASE_STATUSES,
  CASE_TYPES,
  SENTENCE_TYPES,
} from '../../shared/constants';
import { users } from './users';

export const cases = pgTable('cases', {
  id: uuid('id').primaryKey().defaultRandom(),
  caseNumber: text('case_number').notNull().unique(),
  title: text('title').notNull(),
  caseType: text('case_type', { enum: CASE_TYPES }).notNull(),
  description: text('description').notNull().default(''),
  status: text('status', { enum: CASE_STATUSES }).notNull().default('pending'),
  priority: text('priority', { enum: CASE_PRIORITIES }).notNull().default('medium'),
  plaintiffName: text('plaintiff_name'),
  defendantName: text('defendant_name'),
  plaintiffLawyer: text('plaintiff_lawyer'),
  defendantLawyer: text('defendant_lawyer'),
  createdById: uuid('created_by_id')
    .notNull()
    .references(() => users.id),
  assignedJudgeId: uuid('assigned_judge_id').references(() => users.id, {
    onDelete: 'set null',
  }),
  filingDate: date('filing_date').notNull(),
  assignmentDate: date('assignment_date'),
  assignmentNotes: text('assignment_notes'),
  verdict: text('verdict'),
  sentenceType: text('sentence_type', { enum: SENTENCE_TYPES }),
  sentenceDuration: text('sentence_duration'),
  fineAmount: numeric('fine_amount', { precision: 10, scale: 2 }),
  sentenceNotes: text('sentence_notes'),
  decisionDate: date('decision_date'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
