import { pgTable, uuid, text, integer, boolean, timestamp } from 'drizzle-orm/pg-core';
import { VISIT_TYPES, VISITOR_RELATIONSHIPS } from '../../shared/constants';
import { inmates } from './inmates';
import { users } from './users';

export const visitorLogs = pgTable('visitor_logs', {
  id: uuid('id').primaryKey().defaultRandom(),
  inmateId: uuid('inmate_id')
    .notNull()
    .references(() => inmates.id, { onDelete: 'cascade' }),
  visitorName: text('visitor_name').notNull(),
  visitorIdNumber: text('visitor_id_number'),
  visitorPhone: text('visitor_phone'),
  relationship: text('relationship', { enum: VISITOR_RELATIONSHIPS }).notNull(),
  visitType: text('visit_type', { enum: VISIT_TYPES }).notNull(),
  visitAt: timestamp('visit_at', { withTimezone: true }).notNull(),
  durationMinutes: integer('duration_minutes').notNull(),
  purpose: text('purpose').notNull(),
  notes: text('notes'),
  authorizedById: uuid('authorized_by_id')
    .notNull()
    .references(() => users.id),
  isApproved: boolean('is_approved').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
