import { ATTENTION_THRESHOLD_DAYS } from '@shared/constants';
import type {
  CasePriority,
  CaseStatus,
  DashboardStats,
  InmateReportStatus,
  InmateStatus,
  ProgramStatus,
  ReportPriority,
  ReviewOutcome,
} from '@shared/types';
import { addDays, dayWindow, isWithin, startOfDay, startOfMonth, toIsoDate } from './dates';

// ---------------------------------------------------------------------------
// Row shapes (structural; database rows satisfy them directly)
// ---------------------------------------------------------------------------

export interface CaseFacts {
  status: CaseStatus;
  priority: CasePriority;
  filingDate: string;
  assignmentDate: string | null;
  decisionDate: string | null;
}

export interface HearingFacts {
  scheduledAt: Date;
  createdAt: Date;
  isCompleted: boolean;
  isCancelled: boolean;
}

export interface EvidenceFacts {
  isApproved: ReviewOutcome;
  reviewedDate: string | null;
}

export interface CaseReportFacts {
  submittedAt: Date;
}

export interface InmateFacts {
  status: InmateStatus;
  admissionDate: string;
  expectedReleaseDate: string | null;
  actualReleaseDate: string | null;
  medicalAttentionRequired: boolean;
  disciplinaryIssues: boolean;
  protectiveCustody: boolean;
}

export interface InmateReportFacts {
  priority: ReportPriority;
  status: InmateReportStatus;
  isReviewed: boolean;
  submittedAt: Date;
}

export interface ProgramFacts {
  status: ProgramStatus;
  updatedAt: Date;
}

export interface VisitFacts {
  visitAt: Date;
}

function count<T>(rows: readonly T[], predicate: (row: T) => boolean): number {
  return rows.reduce((n, row) => (predicate(row) ? n + 1 : n), 0);
}

// ---------------------------------------------------------------------------
// Clerk
// ---------------------------------------------------------------------------

export interface ClerkDashboardInput {
  cases: readonly CaseFacts[];
  hearings: readonly HearingFacts[];
  caseReports: readonly CaseReportFacts[];
  inmates: readonly InmateFacts[];
  inmateReports: readonly InmateReportFacts[];
}

/**
 * Court-wide counters. Cases "needing attention" are still pending
 * ATTENTION_THRESHOLD_DAYS or more days after filing.
 */
export function computeClerkStats(input: ClerkDashboardInput, now: Date): DashboardStats {
  const { cases, hearings, caseReports, inmates, inmateReports } = input;
  const today = dayWindow(now);
  const todayIso = toIsoDate(now);
  const weekAgo = toIsoDate(addDays(today.start, -7));
  const monthAgo = toIsoDate(addDays(today.start, -30));
  const attentionCutoff = toIsoDate(addDays(today.start, -ATTENTION_THRESHOLD_DAYS));

  const openHearing = (h: HearingFacts) => !h.isCompleted && !h.isCancelled;

  return {
    total_cases: cases.length,
    pending_cases: count(cases, (c) => c.status === 'pending'),
    assigned_cases: count(cases, (c) => c.status === 'assigned'),
    in_progress_cases: count(cases, (c) => c.status === 'in_progress'),
    decided_cases: count(cases, (c) => c.status === 'decided'),
    closed_cases: count(cases, (c) => c.status === 'closed'),
    cases_filed_week: count(cases, (c) => c.filingDate >= weekAgo && c.filingDate <= todayIso),
    cases_filed_month: count(cases, (c) => c.filingDate >= monthAgo && c.filingDate <= todayIso),
    cases_needing_attention: count(
      cases,
      (c) => c.status === 'pending' && c.filingDate <= attentionCutoff,
    ),
    upcoming_hearings: count(hearings, (h) => openHearing(h) && h.scheduledAt >= today.start),
    hearings_today: count(hearings, (h) => !h.isCancelled && isWithin(h.scheduledAt, today)),
    total_inmates: count(inmates, (i) => i.status === 'active'),
    urgent_reports: count(inmateReports, (r) => r.priority === 'urgent' && !r.isReviewed),
    cases_filed_today: count(cases, (c) => c.filingDate === todayIso),
    cases_assigned_today: count(cases, (c) => c.assignmentDate === todayIso),
    hearings_scheduled_today: count(hearings, (h) => isWithin(h.createdAt, today)),
    reports_submitted_today: count(caseReports, (r) => isWithin(r.submittedAt, today)),
  };
}

// ---------------------------------------------------------------------------
// Judge
// ---------------------------------------------------------------------------

export interface JudgeDashboardInput {
  /** Cases assigned to the judge. */
  cases: readonly CaseFacts[];
  /** Hearings the judge presides over. */
  hearings: readonly HearingFacts[];
  /** Evidence attached to the judge's cases. */
  evidence: readonly EvidenceFacts[];
  /** Case reports the judge submitted. */
  caseReports: readonly CaseReportFacts[];
}

export function computeJudgeStats(input: JudgeDashboardInput, now: Date): DashboardStats {
  const { cases, hearings, evidence, caseReports } = input;
  const today = dayWindow(now);
  const todayIso = toIsoDate(now);
  const monthStart = startOfMonth(now);
  const monthStartIso = toIsoDate(monthStart);

  return {
    assigned_cases: cases.length,
    pending_decisions: count(cases, (c) => c.status === 'in_progress'),
    decided_cases: count(cases, (c) => c.status === 'decided'),
    closed_cases: count(cases, (c) => c.status === 'closed'),
    pending_evidence: count(evidence, (e) => e.isApproved === null),
    upcoming_hearings: count(
      hearings,
      (h) => !h.isCompleted && !h.isCancelled && h.scheduledAt >= today.start,
    ),
    hearings_today: count(
      hearings,
      (h) => !h.isCompleted && !h.isCancelled && isWithin(h.scheduledAt, today),
    ),
    high_priority: count(cases, (c) => c.priority === 'high'),
    medium_priority: count(cases, (c) => c.priority === 'medium'),
    low_priority: count(cases, (c) => c.priority === 'low'),
    evidence_reviewed_today: count(evidence, (e) => e.reviewedDate === todayIso),
    sentences_passed_today: count(
      cases,
      (c) => c.status === 'decided' && c.decisionDate === todayIso,
    ),
    cases_completed_month: count(
      cases,
      (c) =>
        c.status === 'decided' &&
        c.decisionDate !== null &&
        c.decisionDate >= monthStartIso &&
        c.decisionDate <= todayIso,
    ),
    hearings_conducted_month: count(
      hearings,
      (h) => h.isCompleted && h.scheduledAt >= monthStart && h.scheduledAt < today.end,
    ),
    reports_submitted_month: count(
      caseReports,
      (r) => r.submittedAt >= monthStart && r.submittedAt < today.end,
    ),
  };
}

// ---------------------------------------------------------------------------
// Prison officer
// ---------------------------------------------------------------------------

export interface OfficerDashboardInput {
  /** Inmates assigned to the officer, any status. */
  inmates: readonly InmateFacts[];
  /** Reports, programs and visits of those inmates. */
  reports: readonly InmateReportFacts[];
  programs: readonly ProgramFacts[];
  visits: readonly VisitFacts[];
}

export function computeOfficerStats(input: OfficerDashboardInput, now: Date): DashboardStats {
  const { inmates, reports, programs, visits } = input;
  const today = dayWindow(now);
  const todayIso = toIsoDate(now);
  const inAWeek = toIsoDate(addDays(startOfDay(now), 7));
  const weekAgo = toIsoDate(addDays(startOfDay(now), -7));
  const monthAgo = toIsoDate(addDays(startOfDay(now), -30));

  const active = inmates.filter((i) => i.status === 'active');

  return {
    active_inmates: active.length,
    medical_cases: count(active, (i) => i.medicalAttentionRequired),
    disciplinary_cases: count(active, (i) => i.disciplinaryIssues),
    protective_custody: count(active, (i) => i.protectiveCustody),
    reports_unreviewed: count(reports, (r) => !r.isReviewed),
    urgent_reports: count(reports, (r) => r.priority === 'urgent' && !r.isReviewed),
    pending_reports: count(reports, (r) => r.status === 'pending'),
    reviewed_reports: count(reports, (r) => r.status === 'reviewed'),
    approved_reports: count(reports, (r) => r.status === 'approved'),
    rejected_reports: count(reports, (r) => r.status === 'rejected'),
    upcoming_releases: count(
      active,
      (i) =>
        i.expectedReleaseDate !== null &&
        i.expectedReleaseDate >= todayIso &&
        i.expectedReleaseDate <= inAWeek,
    ),
    active_programs: count(programs, (p) => p.status === 'active'),
    visitors_today: count(visits, (v) => isWithin(v.visitAt, today)),
    programs_updated_today: count(programs, (p) => isWithin(p.updatedAt, today)),
    reports_submitted_today: count(reports, (r) => isWithin(r.submittedAt, today)),
    new_inmates_week: count(inmates, (i) => i.admissionDate >= weekAgo && i.admissionDate <= todayIso),
    releases_last_month: count(
      inmates,
      (i) =>
        i.status === 'released' &&
        i.actualReleaseDate !== null &&
        i.actualReleaseDate >= monthAgo &&
        i.actualReleaseDate <= todayIso,
    ),
  };
}
