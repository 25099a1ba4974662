import { pgTable, uuid, text, date, boolean, timestamp } from 'drizzle-orm/pg-core';
import {
  INMATE_REPORT_STATUSES,
  INMATE_REPORT_TYPES,
  REPORT_PRIORITIES,
} from '../../shared/constants';
import { inmates } from './inmates';
import { users } from './users';

export const inmateReports = pgTable('inmate_reports', {
  id: uuid('id').primaryKey().defaultRandom(),
  inmateId: uuid('inmate_id')
    .notNull()
    .references(() => inmates.id, { onDelete: 'cascade' }),
  reportType: text('report_type', { enum: INMATE_REPORT_TYPES }).notNull(),
  title: text('title').notNull(),
  content: text('content').notNull(),
  recommendations: text('recommendations'),
  priority: text('priority', { enum: REPORT_PRIORITIES }).notNull().default('medium'),
  submittedById: uuid('submitted_by_id')
    .notNull()
    .references(() => users.id),
  submittedAt: timestamp('submitted_at', { withTimezone: true }).notNull().defaultNow(),
  incidentDate: date('incident_date'),
  status: text('status', { enum: INMATE_REPORT_STATUSES }).notNull().default('pending'),
  isReviewed: boolean('is_reviewed').notNull().default(false),
  reviewedById: uuid('reviewed_by_id').references(() => users.id, { onDelete: 'set null' }),
  reviewedAt: timestamp('reviewed_at', { withTimezone: true }),
  reviewNotes: text('review_notes'),
  actionRequired: boolean('action_required').notNull().default(false),
  actionTaken: text('action_taken'),
  actionDate: timestamp('action_date', { withTimezone: true }),
  followUpDate: date('follow_up_date'),
});
