import type {
  AUDIT_ACTIONS,
  BEHAVIOR_RATINGS,
  CASE_ACTIONS,
  CASE_PRIORITIES,
  CASE_REPORT_TYPES,
  CASE_STATUSES,
  CASE_TYPES,
  EVIDENCE_REVIEW_ACTIONS,
  EVIDENCE_TYPES,
  GENDERS,
  HEARING_TYPES,
  INMATE_ACTIONS,
  INMATE_REPORT_STATUSES,
  INMATE_REPORT_TYPES,
  INMATE_STATUSES,
  NOTIFICATION_TYPES,
  PROGRAM_STATUSES,
  PROGRAM_TYPES,
  RELEASE_TYPES,
  REPORT_PRIORITIES,
  ROLES,
  SENTENCE_TYPES,
  VISIT_TYPES,
  VISITOR_RELATIONSHIPS,
  WS_EVENTS,
} from './constants';

export type Role = (typeof ROLES)[number];

export type CaseStatus = (typeof CASE_STATUSES)[number];
export type CaseAction = (typeof CASE_ACTIONS)[number];
export type CaseType = (typeof CASE_TYPES)[number];
export type CasePriority = (typeof CASE_PRIORITIES)[number];
export type SentenceType = (typeof SENTENCE_TYPES)[number];
export type EvidenceType = (typeof EVIDENCE_TYPES)[number];
export type EvidenceReviewAction = (typeof EVIDENCE_REVIEW_ACTIONS)[number];
export type HearingType = (typeof HEARING_TYPES)[number];
export type CaseReportType = (typeof CASE_REPORT_TYPES)[number];
export type ReportPriority = (typeof REPORT_PRIORITIES)[number];

export type InmateStatus = (typeof INMATE_STATUSES)[number];
export type InmateAction = (typeof INMATE_ACTIONS)[number];
export type Gender = (typeof GENDERS)[number];
export type BehaviorRating = (typeof BEHAVIOR_RATINGS)[number];
export type InmateReportType = (typeof INMATE_REPORT_TYPES)[number];
export type InmateReportStatus = (typeof INMATE_REPORT_STATUSES)[number];
export type VisitType = (typeof VISIT_TYPES)[number];
export type VisitorRelationship = (typeof VISITOR_RELATIONSHIPS)[number];
export type ProgramType = (typeof PROGRAM_TYPES)[number];
export type ProgramStatus = (typeof PROGRAM_STATUSES)[number];
export type ReleaseType = (typeof RELEASE_TYPES)[number];

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

/** Tri-state review outcome: null while pending. */
export type ReviewOutcome = boolean | null;

export interface WsMessage {
  event: (typeof WS_EVENTS)[keyof typeof WS_EVENTS];
  data: unknown;
  timestamp: string;
}

export interface FieldError {
  field: string;
  message: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  kind?: string;
  message?: string;
  redirectTo?: string;
  fieldErrors?: FieldError[];
}

export interface NotificationSummary {
  id: string;
  title: string;
  message: string;
  type: NotificationType;
  priority: ReportPriority;
  isRead: boolean;
  createdAt: string;
}

export interface NotificationFeed {
  notifications: NotificationSummary[];
  unreadCount: number;
  count: number;
}

export interface UserOption {
  id: string;
  name: string;
}

/** Flat key -> count bundle served to dashboards. */
export type DashboardStats = Record<string, number>;
