import { z } from 'zod';
import {
  BEHAVIOR_RATINGS,
  CASE_PRIORITIES,
  CASE_REPORT_TYPES,
  CASE_TYPES,
  EVIDENCE_REVIEW_ACTIONS,
  EVIDENCE_TYPES,
  GENDERS,
  HEARING_TYPES,
  INMATE_REPORT_TYPES,
  PROGRAM_STATUSES,
  PROGRAM_TYPES,
  RELEASE_TYPES,
  REPORT_PRIORITIES,
  SENTENCE_TYPES,
  VISIT_DURATION_MINUTES,
  VISIT_TYPES,
  VISITOR_RELATIONSHIPS,
} from '@shared/constants';
import type { FieldError } from '@shared/types';
import { ADMINISTRATIVE_CASE_ACTIONS } from './case-machine';
import { STATUS_CHANGE_ACTIONS } from './inmate-machine';
import { isIsoDate, parseIsoDateTime } from './dates';
import { invalid } from './result';
import type { WorkflowFailure } from './result';

// ---------------------------------------------------------------------------
// Field builders
// ---------------------------------------------------------------------------

const DATE_FORMAT_MESSAGE = 'Invalid date format. Use YYYY-MM-DD.';
const DATE_TIME_FORMAT_MESSAGE = 'Invalid date-time format. Use YYYY-MM-DDTHH:MM.';

function requiredText(label: string) {
  return z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`);
}

const optionalText = z.string().trim().optional();
const nullableText = z.string().trim().nullable().optional();

function isoDate(label: string) {
  return z
    .string({ required_error: `${label} is required` })
    .refine(isIsoDate, DATE_FORMAT_MESSAGE);
}

const optionalIsoDate = z.string().refine(isIsoDate, DATE_FORMAT_MESSAGE).optional();
const nullableIsoDate = z.string().refine(isIsoDate, DATE_FORMAT_MESSAGE).nullable().optional();

function isoDateTime(label: string) {
  return z
    .string({ required_error: `${label} is required` })
    .transform((value, ctx) => {
      const parsed = parseIsoDateTime(value);
      if (!parsed) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: DATE_TIME_FORMAT_MESSAGE });
        return z.NEVER;
      }
      return parsed;
    });
}

function userRef(requiredMessage: string) {
  return z.string({ required_error: requiredMessage }).uuid('Invalid user id');
}

export const idSchema = z.string().uuid();

export function isUuid(value: string): boolean {
  return idSchema.safeParse(value).success;
}

// ---------------------------------------------------------------------------
// Court
// ---------------------------------------------------------------------------

export const createCaseInput = z.object({
  caseNumber: requiredText('Case number'),
  title: requiredText('Title'),
  caseType: z.enum(CASE_TYPES, { required_error: 'Case type is required' }),
  priority: z.enum(CASE_PRIORITIES, { required_error: 'Priority is required' }),
  filingDate: isoDate('Filing date'),
  description: z.string().trim().default(''),
  plaintiffName: requiredText('Plaintiff name'),
  defendantName: requiredText('Defendant name'),
  plaintiffLawyer: optionalText,
  defendantLawyer: optionalText,
  assignedJudgeId: userRef('Judge is required').optional(),
});

export const assignCaseInput = z.object({
  judgeId: userRef('Please select a judge to assign.'),
  notes: optionalText,
});

export const sentenceCaseInput = z.object({
  sentenceType: z.enum(SENTENCE_TYPES, { required_error: 'Please specify the sentence type.' }),
  sentenceDuration: optionalText,
  fineAmount: z.number().nonnegative().max(99_999_999.99).optional(),
  verdict: optionalText,
  sentenceNotes: optionalText,
  decisionDate: optionalIsoDate,
});

export const editCaseInput = z
  .object({
    title: requiredText('Title').optional(),
    description: z.string().trim().optional(),
    caseType: z.enum(CASE_TYPES).optional(),
    priority: z.enum(CASE_PRIORITIES).optional(),
    plaintiffName: requiredText('Plaintiff name').optional(),
    defendantName: requiredText('Defendant name').optional(),
    plaintiffLawyer: nullableText,
    defendantLawyer: nullableText,
    assignedJudgeId: userRef('Judge is required').optional(),
    assignmentNotes: optionalText,
  })
  .strict();

export const transitionCaseInput = z.object({
  action: z.enum(ADMINISTRATIVE_CASE_ACTIONS, { required_error: 'Action is required' }),
});

export const addEvidenceInput = z.object({
  evidenceType: z.enum(EVIDENCE_TYPES, { required_error: 'Evidence type is required' }),
  title: requiredText('Title'),
  description: requiredText('Description'),
  submissionDate: isoDate('Submission date'),
  submittedBy: optionalText,
  notes: optionalText,
  isAdmissible: z.boolean().default(true),
});

export const reviewEvidenceInput = z.object({
  action: z.enum(EVIDENCE_REVIEW_ACTIONS, { errorMap: () => ({ message: 'Invalid action' }) }),
  reviewNotes: optionalText,
});

export const scheduleHearingInput = z.object({
  caseId: z.string({ required_error: 'Case is required' }).uuid('Invalid case id'),
  hearingType: z.enum(HEARING_TYPES, { required_error: 'Hearing type is required' }),
  scheduledAt: isoDateTime('Scheduled time'),
  courtroom: requiredText('Courtroom'),
  judgeId: userRef('Judge is required').optional(),
  notes: optionalText,
});

export const editHearingInput = z
  .object({
    hearingType: z.enum(HEARING_TYPES).optional(),
    scheduledAt: isoDateTime('Scheduled time').optional(),
    courtroom: requiredText('Courtroom').optional(),
    notes: nullableText,
    outcome: nullableText,
    judgeId: userRef('Judge is required').optional(),
  })
  .strict();

export const cancelHearingInput = z.object({
  reason: optionalText,
});

export const submitCaseReportInput = z.object({
  reportType: z.enum(CASE_REPORT_TYPES, { required_error: 'Report type is required' }),
  title: requiredText('Title'),
  content: requiredText('Content'),
  recommendations: optionalText,
  priority: z.enum(REPORT_PRIORITIES).default('medium'),
});

// ---------------------------------------------------------------------------
// Prison
// ---------------------------------------------------------------------------

export const createInmateInput = z.object({
  inmateNumber: requiredText('Inmate ID'),
  identificationNumber: requiredText('Identification number'),
  firstName: requiredText('First name'),
  lastName: requiredText('Last name'),
  dateOfBirth: isoDate('Date of birth'),
  gender: z.enum(GENDERS, { required_error: 'Gender is required' }),
  admissionDate: isoDate('Admission date'),
  expectedReleaseDate: optionalIsoDate,
  nationality: optionalText,
  caseNumber: optionalText,
  crimeDescription: optionalText,
  sentenceLength: optionalText,
  cellNumber: optionalText,
  block: optionalText,
  emergencyContactName: optionalText,
  emergencyContactPhone: optionalText,
  emergencyContactRelationship: optionalText,
  medicalConditions: optionalText,
  medicalAttentionRequired: z.boolean().default(false),
  disciplinaryIssues: z.boolean().default(false),
  protectiveCustody: z.boolean().default(false),
});

export const updateInmateInput = z
  .object({
    firstName: requiredText('First name').optional(),
    lastName: requiredText('Last name').optional(),
    nationality: nullableText,
    cellNumber: nullableText,
    block: nullableText,
    expectedReleaseDate: nullableIsoDate,
    behaviorRating: z.enum(BEHAVIOR_RATINGS).optional(),
    medicalConditions: nullableText,
    emergencyContactName: nullableText,
    emergencyContactPhone: nullableText,
    emergencyContactRelationship: nullableText,
    medicalAttentionRequired: z.boolean().optional(),
    disciplinaryIssues: z.boolean().optional(),
    protectiveCustody: z.boolean().optional(),
  })
  .strict();

export const assignInmateInput = z.object({
  officerId: userRef('Please select an officer to assign.'),
  reason: optionalText,
  assignmentType: optionalText,
  instructions: optionalText,
});

export const changeInmateStatusInput = z.object({
  action: z.enum(STATUS_CHANGE_ACTIONS, { required_error: 'Action is required' }),
});

export const RELEASE_BEFORE_ADMISSION_MESSAGE = 'Release date cannot be before the admission date.';

export const releaseInmateInput = z.object({
  releaseDate: isoDate('Release date'),
  releaseType: z.enum(RELEASE_TYPES, { required_error: 'Release type is required' }),
  releaseNotes: optionalText,
  authorizedById: userRef('Authorizing user is required'),
});

export const createInmateReportInput = z.object({
  reportType: z.enum(INMATE_REPORT_TYPES, { required_error: 'Report type is required' }),
  title: requiredText('Title'),
  content: requiredText('Content'),
  recommendations: optionalText,
  priority: z.enum(REPORT_PRIORITIES).default('medium'),
  incidentDate: optionalIsoDate,
});

export const reviewInmateReportInput = z.object({
  status: z.enum(['reviewed', 'approved', 'rejected'], {
    required_error: 'Please select a review status.',
  }),
  reviewNotes: optionalText,
  actionRequired: z.boolean().default(false),
  actionTaken: optionalText,
  followUpDate: optionalIsoDate,
});

const durationMessage = `Duration must be between ${VISIT_DURATION_MINUTES.min} and ${VISIT_DURATION_MINUTES.max} minutes.`;

export const logVisitInput = z.object({
  visitorName: requiredText('Visitor name'),
  visitorIdNumber: optionalText,
  visitorPhone: optionalText,
  relationship: z.enum(VISITOR_RELATIONSHIPS, { required_error: 'Relationship is required' }),
  visitType: z.enum(VISIT_TYPES, { required_error: 'Visit type is required' }),
  visitAt: isoDateTime('Visit time'),
  durationMinutes: z
    .number({ required_error: 'Duration is required' })
    .int(durationMessage)
    .min(VISIT_DURATION_MINUTES.min, durationMessage)
    .max(VISIT_DURATION_MINUTES.max, durationMessage),
  purpose: requiredText('Purpose'),
  notes: optionalText,
  authorizedById: userRef('Authorizing user is required'),
  isApproved: z.boolean().default(true),
});

export const PROGRAM_ORDER_MESSAGE = 'Start date must be before expected end date.';

export const createProgramInput = z
  .object({
    programName: requiredText('Program name'),
    programType: z.enum(PROGRAM_TYPES, { required_error: 'Program type is required' }),
    description: requiredText('Description'),
    startDate: isoDate('Start date'),
    expectedEndDate: isoDate('Expected end date'),
    instructor: optionalText,
    notes: optionalText,
  })
  .refine((p) => p.startDate < p.expectedEndDate, {
    message: PROGRAM_ORDER_MESSAGE,
    path: ['expectedEndDate'],
  });

export const updateProgramInput = z
  .object({
    programName: requiredText('Program name').optional(),
    programType: z.enum(PROGRAM_TYPES).optional(),
    description: requiredText('Description').optional(),
    startDate: optionalIsoDate,
    expectedEndDate: optionalIsoDate,
    status: z.enum(PROGRAM_STATUSES).optional(),
    progressPercentage: z
      .number()
      .int('Progress must be a whole number.')
      .min(0, 'Progress must be between 0 and 100.')
      .max(100, 'Progress must be between 0 and 100.')
      .optional(),
    instructor: nullableText,
    gradeOrScore: nullableText,
    certificateEarned: z.boolean().optional(),
    notes: nullableText,
  })
  .strict();

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

export const listUsersQuery = z.object({
  role: z.enum(['judge', 'prison_officer'], {
    errorMap: () => ({ message: "role must be 'judge' or 'prison_officer'" }),
  }),
});

export const updateProfileInput = z
  .object({
    firstName: z.string().trim().optional(),
    lastName: z.string().trim().optional(),
    email: z.string().trim().email('Enter a valid email address.').optional(),
    phoneNumber: nullableText,
    department: nullableText,
  })
  .strict();

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export type CreateCaseInput = z.infer<typeof createCaseInput>;
export type SentenceCaseInput = z.infer<typeof sentenceCaseInput>;
export type EditCaseInput = z.infer<typeof editCaseInput>;
export type CreateInmateInput = z.infer<typeof createInmateInput>;
export type UpdateProgramInput = z.infer<typeof updateProgramInput>;

export function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    message: issue.message,
  }));
}

/**
 * Parses raw input against a schema. Failures carry one field error per zod
 * issue and use the first issue as the summary message.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
): { ok: true; data: z.output<T> } | WorkflowFailure {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const fieldErrors = toFieldErrors(result.error);
    return invalid(fieldErrors[0]?.message ?? 'Invalid input', fieldErrors);
  }
  return { ok: true, data: result.data };
}
