import { pgTable, uuid, text, date, boolean, timestamp } from 'drizzle-orm/pg-core';
import { BEHAVIOR_RATINGS, GENDERS, INMATE_STATUSES } from '../../shared/constants';
import { users } from './users';

export const inmates = pgTable('inmates', {
  id: uuid('id').primaryKey().defaultRandom(),
  inmateNumber: text('inmate_number').notNull().unique(),
  identificationNumber: text('identification_number').notNull().unique(),
  firstName: text('first_name').notNull(),
  lastName: text('last_name').notNull(),
  dateOfBirth: date('date_of_birth').notNull(),
  gender: text('gender', { enum: GENDERS }).notNull(),
  nationality: text('nationality'),
  emergencyContactName: text('emergency_contact_name'),
  emergencyContactPhone: text('emergency_contact_phone'),
  emergencyContactRelationship: text('emergency_contact_relationship'),
  caseNumber: text('case_number'),
  crimeDescription: text('crime_description'),
  sentenceLength: text('sentence_length'),
  admissionDate: date('admission_date').notNull(),
  expectedReleaseDate: date('expected_release_date'),
  actualReleaseDate: date('actual_release_date'),
  cellNumber: text('cell_number'),
  block: text('block'),
  status: text('status', { enum: INMATE_STATUSES }).notNull().default('active'),
  assignedOfficerId: uuid('assigned_officer_id').references(() => users.id, {
    onDelete: 'set null',
  }),
  assignmentDate: date('assignment_date'),
  assignmentReason: text('assignment_reason'),
  assignmentType: text('assignment_type'),
  specialInstructions: text('special_instructions'),
  behaviorRating: text('behavior_rating', { enum: BEHAVIOR_RATINGS }).notNull().default('good'),
  medicalConditions: text('medical_conditions'),
  medicalAttentionRequired: boolean('medical_attention_required').notNull().default(false),
  disciplinaryIssues: boolean('disciplinary_issues').notNull().default(false),
  protectiveCustody: boolean('protective_custody').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
