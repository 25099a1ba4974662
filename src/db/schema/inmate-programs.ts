import { pgTable, uuid, text, date, integer, boolean, timestamp } from 'drizzle-orm/pg-core';
import { PROGRAM_STATUSES, PROGRAM_TYPES } from '../../shared/constants';
import { inmates } from './inmates';

export const inmatePrograms = pgTable('inmate_programs', {
  id: uuid('id').primaryKey().defaultRandom(),
  inmateId: uuid('inmate_id')
    .notNull()
    .references(() => inmates.id, { onDelete: 'cascade' }),
  programName: text('program_name').notNull(),
  programType: text('program_type', { enum: PROGRAM_TYPES }).notNull(),
  description: text('description').notNull(),
  startDate: date('start_date').notNull(),
  expectedEndDate: date('expected_end_date').notNull(),
  actualEndDate: date('actual_end_date'),
  status: text('status', { enum: PROGRAM_STATUSES }).notNull().default('upcoming'),
  progressPercentage: integer('progress_percentage').notNull().default(0),
  instructor: text('instructor'),
  gradeOrScore: text('grade_or_score'),
  certificateEarned: boolean('certificate_earned').notNull().default(false),
  notes: text('notes'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
