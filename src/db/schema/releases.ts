import { pgTable, uuid, text, date, timestamp } from 'drizzle-orm/pg-core';
import { RELEASE_TYPES } from '../../shared/constants';
import { inmates } from './inmates';
import { users } from './users';

export const releases = pgTable('releases', {
  id: uuid('id').primaryKey().defaultRandom(),
  inmateId: uuid('inmate_id')
    .notNull()
    .references(() => inmates.id, { onDelete: 'cascade' }),
  releaseDate: date('release_date').notNull(),
  releaseType: text('release_type', { enum: RELEASE_TYPES }).notNull(),
  releaseNotes: text('release_notes'),
  authorizedById: uuid('authorized_by_id')
    .notNull()
    .references(() => users.id),
  processedById: uuid('processed_by_id')
    .notNull()
    .references(() => users.id),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
