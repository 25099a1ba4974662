import { pgTable, uuid, text, boolean, timestamp } from 'drizzle-orm/pg-core';
import { NOTIFICATION_TYPES, REPORT_PRIORITIES } from '../../shared/constants';
import { users } from './users';

export const notifications = pgTable('notifications', {
  id: uuid('id').primaryKey().defaultRandom(),
  recipientId: uuid('recipient_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  senderId: uuid('sender_id').references(() => users.id, { onDelete: 'set null' }),
  title: text('title').notNull(),
  message: text('message').notNull(),
  notificationType: text('notification_type', { enum: NOTIFICATION_TYPES }).notNull(),
  priority: text('priority', { enum: REPORT_PRIORITIES }).notNull().default('medium'),
  isRead: boolean('is_read').notNull().default(false),
  readAt: timestamp('read_at', { withTimezone: true }),
  caseId: uuid('case_id'),
  reportId: uuid('report_id'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
