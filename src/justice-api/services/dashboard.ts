import { eq, inArray } from 'drizzle-orm';
import type { Database } from '@db/connection';
import { cases } from '@db/schema/cases';
import { evidence } from '@db/schema/evidence';
import { hearings } from '@db/schema/hearings';
import { caseReports } from '@db/schema/case-reports';
import { inmates } from '@db/schema/inmates';
import { inmateReports } from '@db/schema/inmate-reports';
import { inmatePrograms } from '@db/schema/inmate-programs';
import { visitorLogs } from '@db/schema/visitor-logs';
import { gate, landingPageFor } from '@core/access';
import { computeClerkStats, computeJudgeStats, computeOfficerStats } from '@core/dashboard';
import { succeed, unexpected } from '@core/result';
import type { WorkflowResult } from '@core/result';
import type { DashboardStats, Role } from '@shared/types';
import { atBoundary } from './context';
import type { WorkflowContext } from './context';

const caseFacts = {
  status: cases.status,
  priority: cases.priority,
  filingDate: cases.filingDate,
  assignmentDate: cases.assignmentDate,
  decisionDate: cases.decisionDate,
};

const hearingFacts = {
  scheduledAt: hearings.scheduledAt,
  createdAt: hearings.createdAt,
  isCompleted: hearings.isCompleted,
  isCancelled: hearings.isCancelled,
};

const inmateFacts = {
  id: inmates.id,
  status: inmates.status,
  admissionDate: inmates.admissionDate,
  expectedReleaseDate: inmates.expectedReleaseDate,
  actualReleaseDate: inmates.actualReleaseDate,
  medicalAttentionRequired: inmates.medicalAttentionRequired,
  disciplinaryIssues: inmates.disciplinaryIssues,
  protectiveCustody: inmates.protectiveCustody,
};

const inmateReportFacts = {
  priority: inmateReports.priority,
  status: inmateReports.status,
  isReviewed: inmateReports.isReviewed,
  submittedAt: inmateReports.submittedAt,
};

async function clerkStats(db: Database, now: Date): Promise<DashboardStats> {
  const [caseRows, hearingRows, reportRows, inmateRows, inmateReportRows] = await Promise.all([
    db.select(caseFacts).from(cases),
    db.select(hearingFacts).from(hearings),
    db.select({ submittedAt: caseReports.submittedAt }).from(caseReports),
    db.select(inmateFacts).from(inmates),
    db.select(inmateReportFacts).from(inmateReports),
  ]);
  return computeClerkStats(
    {
      cases: caseRows,
      hearings: hearingRows,
      caseReports: reportRows,
      inmates: inmateRows,
      inmateReports: inmateReportRows,
    },
    now,
  );
}

async function judgeStats(db: Database, judgeId: string, now: Date): Promise<DashboardStats> {
  const [caseRows, hearingRows, evidenceRows, reportRows] = await Promise.all([
    db.select(caseFacts).from(cases).where(eq(cases.assignedJudgeId, judgeId)),
    db.select(hearingFacts).from(hearings).where(eq(hearings.judgeId, judgeId)),
    db
      .select({ isApproved: evidence.isApproved, reviewedDate: evidence.reviewedDate })
      .from(evidence)
      .innerJoin(cases, eq(cases.id, evidence.caseId))
      .where(eq(cases.assignedJudgeId, judgeId)),
    db
      .select({ submittedAt: caseReports.submittedAt })
      .from(caseReports)
      .where(eq(caseReports.submittedById, judgeId)),
  ]);
  return computeJudgeStats(
    { cases: caseRows, hearings: hearingRows, evidence: evidenceRows, caseReports: reportRows },
    now,
  );
}

async function officerStats(db: Database, officerId: string, now: Date): Promise<DashboardStats> {
  const inmateRows = await db
    .select(inmateFacts)
    .from(inmates)
    .where(eq(inmates.assignedOfficerId, officerId));
  const ids = inmateRows.map((i) => i.id);

  if (ids.length === 0) {
    return computeOfficerStats({ inmates: [], reports: [], programs: [], visits: [] }, now);
  }

  const [reportRows, programRows, visitRows] = await Promise.all([
    db.select(inmateReportFacts).from(inmateReports).where(inArray(inmateReports.inmateId, ids)),
    db
      .select({ status: inmatePrograms.status, updatedAt: inmatePrograms.updatedAt })
      .from(inmatePrograms)
      .where(inArray(inmatePrograms.inmateId, ids)),
    db
      .select({ visitAt: visitorLogs.visitAt })
      .from(visitorLogs)
      .where(inArray(visitorLogs.inmateId, ids)),
  ]);
  return computeOfficerStats(
    { inmates: inmateRows, reports: reportRows, programs: programRows, visits: visitRows },
    now,
  );
}

function statsFor(role: Role, ctx: WorkflowContext): Promise<DashboardStats> {
  switch (role) {
    case 'clerk':
      return clerkStats(ctx.db, ctx.now);
    case 'judge':
      return judgeStats(ctx.db, ctx.actor.id, ctx.now);
    case 'prison_officer':
      return officerStats(ctx.db, ctx.actor.id, ctx.now);
  }
}

export interface DashboardView {
  role: Role;
  stats: DashboardStats;
}

export async function getDashboardStats(
  ctx: WorkflowContext,
): Promise<WorkflowResult<DashboardView>> {
  const denied = gate(ctx.actor, 'view_dashboard');
  if (denied) return denied;
  const role = ctx.actor.role;
  if (role === null) return unexpected('Dashboard requested without a role');

  return atBoundary('view_dashboard', async () => {
    const stats = await statsFor(role, ctx);
    return succeed({ role, stats }, 'Dashboard statistics', landingPageFor(role));
  });
}
