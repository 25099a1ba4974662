import { pgTable, uuid, text, timestamp } from 'drizzle-orm/pg-core';
import { AUDIT_ACTIONS } from '../../shared/constants';
import { users } from './users';

// Append-only. Nothing in the workflow layer updates or deletes rows here.
export const auditLogs = pgTable('audit_logs', {
  id: uuid('id').primaryKey().defaultRandom(),
  userId: uuid('user_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  action: text('action', { enum: AUDIT_ACTIONS }).notNull(),
  modelName: text('model_name').notNull(),
  objectId: text('object_id'),
  description: text('description').notNull(),
  ipAddress: text('ip_address'),
  userAgent: text('user_agent').notNull().default(''),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
