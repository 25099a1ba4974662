import { describe, it, expect } from 'vitest';
import {
  computeClerkStats,
  computeJudgeStats,
  computeOfficerStats,
  type CaseFacts,
  type HearingFacts,
  type InmateFacts,
  type InmateReportFacts,
} from '@core/dashboard';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date(2026, 9, 18, 12, 0, 0);

function at(day: number, hour = 10, month = 9): Date {
  return new Date(2026, month, day, hour, 0, 0);
}

function makeCase(overrides: Partial<CaseFacts> = {}): CaseFacts {
  return {
    status: 'pending',
    priority: 'medium',
    filingDate: '2026-10-18',
    assignmentDate: null,
    decisionDate: null,
    ...overrides,
  };
}

function makeHearing(overrides: Partial<HearingFacts> = {}): HearingFacts {
  return {
    scheduledAt: at(20),
    createdAt: at(1),
    isCompleted: false,
    isCancelled: false,
    ...overrides,
  };
}

function makeInmate(overrides: Partial<InmateFacts> = {}): InmateFacts {
  return {
    status: 'active',
    admissionDate: '2026-01-10',
    expectedReleaseDate: null,
    actualReleaseDate: null,
    medicalAttentionRequired: false,
    disciplinaryIssues: false,
    protectiveCustody: false,
    ...overrides,
  };
}

function makeReport(overrides: Partial<InmateReportFacts> = {}): InmateReportFacts {
  return {
    priority: 'medium',
    status: 'pending',
    isReviewed: false,
    submittedAt: at(1),
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Clerk
// ---------------------------------------------------------------------------

describe('computeClerkStats', () => {
  it('counts cases by status', () => {
    const stats = computeClerkStats(
      {
        cases: [
          makeCase(),
          makeCase({ status: 'assigned', assignmentDate: '2026-10-18' }),
          makeCase({ status: 'decided' }),
          makeCase({ status: 'closed' }),
        ],
        hearings: [],
        caseReports: [],
        inmates: [],
        inmateReports: [],
      },
      NOW,
    );
    expect(stats.total_cases).toBe(4);
    expect(stats.pending_cases).toBe(1);
    expect(stats.assigned_cases).toBe(1);
    expect(stats.decided_cases).toBe(1);
    expect(stats.closed_cases).toBe(1);
    expect(stats.cases_filed_today).toBe(4);
    expect(stats.cases_assigned_today).toBe(1);
  });

  it('flags pending cases filed thirty or more days ago', () => {
    const stats = computeClerkStats(
      {
        cases: [
          makeCase({ filingDate: '2026-09-18' }),
          makeCase({ filingDate: '2026-09-19' }),
          makeCase({ filingDate: '2026-08-01', status: 'assigned' }),
        ],
        hearings: [],
        caseReports: [],
        inmates: [],
        inmateReports: [],
      },
      NOW,
    );
    expect(stats.cases_needing_attention).toBe(1);
    expect(stats.cases_filed_week).toBe(0);
    expect(stats.cases_filed_month).toBe(2);
  });

  it('separates upcoming hearings from those held today', () => {
    const stats = computeClerkStats(
      {
        cases: [],
        hearings: [
          makeHearing({ scheduledAt: at(18, 9), createdAt: at(18, 8) }),
          makeHearing({ scheduledAt: at(18, 15), isCancelled: true }),
          makeHearing({ scheduledAt: at(25) }),
          makeHearing({ scheduledAt: at(10), isCompleted: true }),
        ],
        caseReports: [{ submittedAt: at(18, 11) }, { submittedAt: at(17, 23) }],
        inmates: [makeInmate(), makeInmate({ status: 'released' })],
        inmateReports: [
          makeReport({ priority: 'urgent' }),
          makeReport({ priority: 'urgent', isReviewed: true }),
        ],
      },
      NOW,
    );
    expect(stats.upcoming_hearings).toBe(2);
    expect(stats.hearings_today).toBe(1);
    expect(stats.hearings_scheduled_today).toBe(1);
    expect(stats.reports_submitted_today).toBe(1);
    expect(stats.total_inmates).toBe(1);
    expect(stats.urgent_reports).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Judge
// ---------------------------------------------------------------------------

describe('computeJudgeStats', () => {
  it('counts decisions and workload, crediting only cases still decided', () => {
    const stats = computeJudgeStats(
      {
        cases: [
          makeCase({ status: 'in_progress', priority: 'high' }),
          makeCase({ status: 'decided', priority: 'low', decisionDate: '2026-10-18' }),
          makeCase({ status: 'closed', decisionDate: '2026-09-30' }),
          makeCase({ status: 'decided', decisionDate: '2026-10-02' }),
          makeCase({ status: 'closed', decisionDate: '2026-10-18' }),
          makeCase({ status: 'appealed', decisionDate: '2026-10-05' }),
        ],
        hearings: [
          makeHearing({ scheduledAt: at(18, 14) }),
          makeHearing({ scheduledAt: at(5), isCompleted: true }),
          makeHearing({ scheduledAt: at(28, 10, 8), isCompleted: true }),
        ],
        evidence: [
          { isApproved: null, reviewedDate: null },
          { isApproved: true, reviewedDate: '2026-10-18' },
          { isApproved: false, reviewedDate: '2026-10-11' },
        ],
        caseReports: [{ submittedAt: at(2) }, { submittedAt: at(30, 10, 8) }],
      },
      NOW,
    );
    expect(stats).toEqual({
      assigned_cases: 6,
      pending_decisions: 1,
      decided_cases: 2,
      closed_cases: 2,
      pending_evidence: 1,
      upcoming_hearings: 1,
      hearings_today: 1,
      high_priority: 1,
      medium_priority: 4,
      low_priority: 1,
      evidence_reviewed_today: 1,
      sentences_passed_today: 1,
      cases_completed_month: 2,
      hearings_conducted_month: 1,
      reports_submitted_month: 1,
    });
  });
});

// ---------------------------------------------------------------------------
// Prison officer
// ---------------------------------------------------------------------------

describe('computeOfficerStats', () => {
  it('counts only active inmates for flags and upcoming releases', () => {
    const stats = computeOfficerStats(
      {
        inmates: [
          makeInmate({ medicalAttentionRequired: true, expectedReleaseDate: '2026-10-25' }),
          makeInmate({ protectiveCustody: true, expectedReleaseDate: '2026-10-26' }),
          makeInmate({ admissionDate: '2026-10-15', disciplinaryIssues: true }),
          makeInmate({
            status: 'released',
            medicalAttentionRequired: true,
            actualReleaseDate: '2026-10-01',
          }),
          makeInmate({ status: 'released', actualReleaseDate: '2026-08-01' }),
        ],
        reports: [
          makeReport({ priority: 'urgent' }),
          makeReport({ status: 'approved', isReviewed: true, submittedAt: at(18, 9) }),
          makeReport({ status: 'rejected', isReviewed: true }),
        ],
        programs: [
          { status: 'active', updatedAt: at(18, 8) },
          { status: 'completed', updatedAt: at(3) },
        ],
        visits: [{ visitAt: at(18, 10) }, { visitAt: at(19, 10) }],
      },
      NOW,
    );
    expect(stats).toEqual({
      active_inmates: 3,
      medical_cases: 1,
      disciplinary_cases: 1,
      protective_custody: 1,
      reports_unreviewed: 1,
      urgent_reports: 1,
      pending_reports: 1,
      reviewed_reports: 0,
      approved_reports: 1,
      rejected_reports: 1,
      upcoming_releases: 1,
      active_programs: 1,
      visitors_today: 1,
      programs_updated_today: 1,
      reports_submitted_today: 1,
      new_inmates_week: 1,
      releases_last_month: 1,
    });
  });
});
