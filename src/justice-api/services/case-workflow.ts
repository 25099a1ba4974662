import { asc, desc, eq } from 'drizzle-orm';
import type { Database } from '@db/connection';
import { cases } from '@db/schema/cases';
import { evidence } from '@db/schema/evidence';
import { hearings } from '@db/schema/hearings';
import { caseReports } from '@db/schema/case-reports';
import { gate, landingPageFor, requireOwnership } from '@core/access';
import { allowedCaseActions, applyCaseAction, checkCaseGuards } from '@core/case-machine';
import type { CaseSnapshot } from '@core/case-machine';
import { daysBetween } from '@core/dates';
import {
  addEvidenceInput,
  assignCaseInput,
  cancelHearingInput,
  createCaseInput,
  editCaseInput,
  editHearingInput,
  isUuid,
  parseInput,
  reviewEvidenceInput,
  scheduleHearingInput,
  sentenceCaseInput,
  submitCaseReportInput,
  transitionCaseInput,
} from '@core/inputs';
import { accessDenied, invalid, notFound, succeed } from '@core/result';
import type { WorkflowResult } from '@core/result';
import type { CaseAction, CaseStatus } from '@shared/types';
import { notify, publishNotifications, recordAudit } from './audit';
import type { NotificationRow } from './audit';
import { atBoundary, todayOf } from './context';
import type { WorkflowContext } from './context';
import { displayName, findUserWithRole } from './users';
import type { UserRow } from './users';

export type CaseRow = typeof cases.$inferSelect;
type CaseInsert = typeof cases.$inferInsert;
export type EvidenceRow = typeof evidence.$inferSelect;
export type HearingRow = typeof hearings.$inferSelect;
export type CaseReportRow = typeof caseReports.$inferSelect;

// ---------------------------------------------------------------------------
// Loaders
// ---------------------------------------------------------------------------

async function loadCase(db: Database, id: string): Promise<CaseRow | undefined> {
  if (!isUuid(id)) return undefined;
  const [row] = await db.select().from(cases).where(eq(cases.id, id));
  return row;
}

async function loadEvidence(db: Database, id: string): Promise<EvidenceRow | undefined> {
  if (!isUuid(id)) return undefined;
  const [row] = await db.select().from(evidence).where(eq(evidence.id, id));
  return row;
}

async function loadHearing(db: Database, id: string): Promise<HearingRow | undefined> {
  if (!isUuid(id)) return undefined;
  const [row] = await db.select().from(hearings).where(eq(hearings.id, id));
  return row;
}

async function loadCaseReport(db: Database, id: string): Promise<CaseReportRow | undefined> {
  if (!isUuid(id)) return undefined;
  const [row] = await db.select().from(caseReports).where(eq(caseReports.id, id));
  return row;
}

function snapshotOf(row: CaseRow): CaseSnapshot {
  return {
    status: row.status,
    assignedJudgeId: row.assignedJudgeId,
    sentenceType: row.sentenceType,
    decisionDate: row.decisionDate,
  };
}

function caseOwnership(row: CaseRow) {
  return { kind: 'case' as const, assignedJudgeId: row.assignedJudgeId };
}

const caseUrl = (id: string) => `/cases/${id}`;

// ---------------------------------------------------------------------------
// Case lifecycle
// ---------------------------------------------------------------------------

export async function createCase(
  ctx: WorkflowContext,
  raw: unknown,
): Promise<WorkflowResult<CaseRow>> {
  const denied = gate(ctx.actor, 'create_case');
  if (denied) return denied;

  const parsed = parseInput(createCaseInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('create_case', async () => {
    const [existing] = await ctx.db
      .select({ id: cases.id })
      .from(cases)
      .where(eq(cases.caseNumber, input.caseNumber));
    if (existing) {
      return invalid('Case number already exists.', [
        { field: 'caseNumber', message: 'Case number already exists.' },
      ]);
    }

    const judge = input.assignedJudgeId
      ? await findUserWithRole(ctx.db, input.assignedJudgeId, 'judge')
      : undefined;
    if (input.assignedJudgeId && !judge) return notFound('Judge');

    const status: CaseStatus = judge ? 'assigned' : 'pending';
    const today = todayOf(ctx);

    const { row, sent } = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(cases)
        .values({
          caseNumber: input.caseNumber,
          title: input.title,
          caseType: input.caseType,
          priority: input.priority,
          description: input.description,
          plaintiffName: input.plaintiffName,
          defendantName: input.defendantName,
          plaintiffLawyer: input.plaintiffLawyer ?? null,
          defendantLawyer: input.defendantLawyer ?? null,
          filingDate: input.filingDate,
          status,
          createdById: ctx.actor.id,
          assignedJudgeId: judge?.id ?? null,
          assignmentDate: judge ? today : null,
          createdAt: ctx.now,
          updatedAt: ctx.now,
        })
        .returning();

      await recordAudit(tx, ctx, {
        action: 'create',
        modelName: 'Case',
        objectId: row.id,
        description: `Created case ${row.caseNumber}`,
      });

      const sent: NotificationRow[] = [];
      if (judge) {
        sent.push(
          await notify(tx, {
            recipientId: judge.id,
            senderId: ctx.actor.id,
            title: 'New Case Assigned',
            message: `Case ${row.caseNumber} - ${row.title} has been assigned to you.`,
            type: 'case_assigned',
            priority: row.priority,
            caseId: row.id,
          }),
        );
      }
      return { row, sent };
    });

    publishNotifications(sent);
    return succeed(row, `Case ${row.caseNumber} created successfully.`, caseUrl(row.id));
  });
}

export async function assignCase(
  ctx: WorkflowContext,
  caseId: string,
  raw: unknown,
): Promise<WorkflowResult<CaseRow>> {
  const denied = gate(ctx.actor, 'assign_case');
  if (denied) return denied;

  const parsed = parseInput(assignCaseInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('assign_case', async () => {
    const current = await loadCase(ctx.db, caseId);
    if (!current) return notFound('Case');
    const forbidden = requireOwnership(ctx.actor, caseOwnership(current));
    if (forbidden) return forbidden;

    const judge = await findUserWithRole(ctx.db, input.judgeId, 'judge');
    if (!judge) return notFound('Judge');

    const moved = applyCaseAction(snapshotOf(current), 'assign', { assignedJudgeId: judge.id });
    if (!moved.ok) return invalid(moved.error);

    const { row, sent } = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(cases)
        .set({
          status: moved.next.status,
          assignedJudgeId: judge.id,
          assignmentDate: todayOf(ctx),
          assignmentNotes: input.notes ?? null,
          updatedAt: ctx.now,
        })
        .where(eq(cases.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'assign',
        modelName: 'Case',
        objectId: row.id,
        description: `Assigned case ${row.caseNumber} to Judge ${displayName(judge)}`,
      });

      const sent = [
        await notify(tx, {
          recipientId: judge.id,
          senderId: ctx.actor.id,
          title: 'New Case Assigned',
          message: `Case ${row.caseNumber} - ${row.title} has been assigned to you.`,
          type: 'case_assigned',
          priority: row.priority,
          caseId: row.id,
        }),
      ];
      return { row, sent };
    });

    publishNotifications(sent);
    return succeed(
      row,
      `Case ${row.caseNumber} has been assigned to Judge ${displayName(judge)}.`,
      caseUrl(row.id),
    );
  });
}

export async function sentenceCase(
  ctx: WorkflowContext,
  caseId: string,
  raw: unknown,
): Promise<WorkflowResult<CaseRow>> {
  const denied = gate(ctx.actor, 'sentence_case');
  if (denied) return denied;

  const parsed = parseInput(sentenceCaseInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('sentence_case', async () => {
    const current = await loadCase(ctx.db, caseId);
    if (!current) return notFound('Case');
    const forbidden = requireOwnership(ctx.actor, caseOwnership(current));
    if (forbidden) return forbidden;

    const decisionDate = input.decisionDate ?? todayOf(ctx);
    const moved = applyCaseAction(snapshotOf(current), 'sentence', {
      sentenceType: input.sentenceType,
      decisionDate,
    });
    if (!moved.ok) return invalid(moved.error);

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(cases)
        .set({
          status: moved.next.status,
          decisionDate,
          sentenceType: input.sentenceType,
          sentenceDuration: input.sentenceDuration ?? null,
          fineAmount: input.fineAmount !== undefined ? input.fineAmount.toFixed(2) : null,
          verdict: input.verdict ?? null,
          sentenceNotes: input.sentenceNotes ?? null,
          updatedAt: ctx.now,
        })
        .where(eq(cases.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'Case',
        objectId: row.id,
        description: `Passed sentence on case ${row.caseNumber}: ${input.sentenceType}`,
      });
      return row;
    });

    return succeed(row, `Sentence passed for case ${row.caseNumber}.`, caseUrl(row.id));
  });
}

export async function editCase(
  ctx: WorkflowContext,
  caseId: string,
  raw: unknown,
): Promise<WorkflowResult<CaseRow>> {
  const denied = gate(ctx.actor, 'edit_case');
  if (denied) return denied;

  const parsed = parseInput(editCaseInput, raw);
  if (!parsed.ok) return parsed;
  const { assignedJudgeId, assignmentNotes, ...fields } = parsed.data;

  return atBoundary('edit_case', async () => {
    const current = await loadCase(ctx.db, caseId);
    if (!current) return notFound('Case');
    const forbidden = requireOwnership(ctx.actor, caseOwnership(current));
    if (forbidden) return forbidden;

    if (
      (assignedJudgeId !== undefined || assignmentNotes !== undefined) &&
      ctx.actor.role !== 'clerk'
    ) {
      return accessDenied('Only clerks can reassign cases.', landingPageFor(ctx.actor.role));
    }

    let judge: UserRow | undefined;
    let assignment: Partial<CaseInsert> = {};
    if (assignedJudgeId !== undefined && assignedJudgeId !== current.assignedJudgeId) {
      judge = await findUserWithRole(ctx.db, assignedJudgeId, 'judge');
      if (!judge) return notFound('Judge');
      const moved = applyCaseAction(snapshotOf(current), 'assign', { assignedJudgeId: judge.id });
      if (!moved.ok) return invalid(moved.error);
      assignment = {
        status: moved.next.status,
        assignedJudgeId: judge.id,
        assignmentDate: todayOf(ctx),
        assignmentNotes: assignmentNotes ?? null,
      };
    } else if (assignmentNotes !== undefined) {
      assignment = { assignmentNotes };
    }
    const newJudge = judge;

    const { row, sent } = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(cases)
        .set({ ...fields, ...assignment, updatedAt: ctx.now })
        .where(eq(cases.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'Case',
        objectId: row.id,
        description: `Updated case ${row.caseNumber}`,
      });

      const sent: NotificationRow[] = [];
      if (newJudge) {
        sent.push(
          await notify(tx, {
            recipientId: newJudge.id,
            senderId: ctx.actor.id,
            title: 'New Case Assigned',
            message: `Case ${row.caseNumber} - ${row.title} has been assigned to you.`,
            type: 'case_assigned',
            priority: row.priority,
            caseId: row.id,
          }),
        );
      }
      return { row, sent };
    });

    publishNotifications(sent);
    return succeed(row, `Case ${row.caseNumber} updated successfully.`, caseUrl(row.id));
  });
}

export async function transitionCase(
  ctx: WorkflowContext,
  caseId: string,
  raw: unknown,
): Promise<WorkflowResult<CaseRow>> {
  const denied = gate(ctx.actor, 'transition_case');
  if (denied) return denied;

  const parsed = parseInput(transitionCaseInput, raw);
  if (!parsed.ok) return parsed;
  const action: CaseAction = parsed.data.action;

  return atBoundary('transition_case', async () => {
    const current = await loadCase(ctx.db, caseId);
    if (!current) return notFound('Case');
    const forbidden = requireOwnership(ctx.actor, caseOwnership(current));
    if (forbidden) return forbidden;

    const moved = applyCaseAction(snapshotOf(current), action);
    if (!moved.ok) return invalid(moved.error);

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(cases)
        .set({ status: moved.next.status, updatedAt: ctx.now })
        .where(eq(cases.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'Case',
        objectId: row.id,
        description: `Case ${row.caseNumber}: ${current.status} -> ${row.status}`,
      });
      return row;
    });

    return succeed(row, `Case ${row.caseNumber} is now ${row.status}.`, caseUrl(row.id));
  });
}

// ---------------------------------------------------------------------------
// Evidence
// ---------------------------------------------------------------------------

export async function addEvidence(
  ctx: WorkflowContext,
  caseId: string,
  raw: unknown,
): Promise<WorkflowResult<EvidenceRow>> {
  const denied = gate(ctx.actor, 'add_evidence');
  if (denied) return denied;

  const parsed = parseInput(addEvidenceInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('add_evidence', async () => {
    const parent = await loadCase(ctx.db, caseId);
    if (!parent) return notFound('Case');
    const forbidden = requireOwnership(ctx.actor, caseOwnership(parent));
    if (forbidden) return forbidden;

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(evidence)
        .values({
          caseId: parent.id,
          evidenceType: input.evidenceType,
          title: input.title,
          description: input.description,
          submittedBy: input.submittedBy ?? null,
          recordedById: ctx.actor.id,
          submissionDate: input.submissionDate,
          notes: input.notes ?? null,
          isAdmissible: input.isAdmissible,
          createdAt: ctx.now,
        })
        .returning();

      await recordAudit(tx, ctx, {
        action: 'create',
        modelName: 'Evidence',
        objectId: row.id,
        description: `Added evidence "${row.title}" to case ${parent.caseNumber}`,
      });
      return row;
    });

    return succeed(row, 'Evidence added successfully.', caseUrl(parent.id));
  });
}

/**
 * Records the assigned judge's ruling on a piece of evidence. A later review
 * replaces every review field of an earlier one.
 */
export async function reviewEvidence(
  ctx: WorkflowContext,
  evidenceId: string,
  raw: unknown,
): Promise<WorkflowResult<EvidenceRow>> {
  const denied = gate(ctx.actor, 'review_evidence');
  if (denied) return denied;

  const parsed = parseInput(reviewEvidenceInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('review_evidence', async () => {
    const item = await loadEvidence(ctx.db, evidenceId);
    if (!item) return notFound('Evidence');
    const parent = await loadCase(ctx.db, item.caseId);
    if (!parent) return notFound('Case');
    const forbidden = requireOwnership(ctx.actor, caseOwnership(parent));
    if (forbidden) return forbidden;

    const approved = input.action === 'approve';

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(evidence)
        .set({
          isApproved: approved,
          reviewedById: ctx.actor.id,
          reviewedDate: todayOf(ctx),
          reviewNotes: input.reviewNotes ?? null,
        })
        .where(eq(evidence.id, item.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: approved ? 'approve' : 'reject',
        modelName: 'Evidence',
        objectId: row.id,
        description: `${approved ? 'Approved' : 'Rejected'} evidence "${row.title}" on case ${parent.caseNumber}`,
      });
      return row;
    });

    return succeed(
      row,
      `Evidence ${approved ? 'approved' : 'rejected'} successfully.`,
      caseUrl(parent.id),
    );
  });
}

// ---------------------------------------------------------------------------
// Hearings
// ---------------------------------------------------------------------------

export async function scheduleHearing(
  ctx: WorkflowContext,
  raw: unknown,
): Promise<WorkflowResult<HearingRow>> {
  const denied = gate(ctx.actor, 'schedule_hearing');
  if (denied) return denied;

  const parsed = parseInput(scheduleHearingInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('schedule_hearing', async () => {
    const parent = await loadCase(ctx.db, input.caseId);
    if (!parent) return notFound('Case');
    const forbidden = requireOwnership(ctx.actor, caseOwnership(parent));
    if (forbidden) return forbidden;

    let judgeId = parent.assignedJudgeId;
    if (input.judgeId) {
      const judge = await findUserWithRole(ctx.db, input.judgeId, 'judge');
      if (!judge) return notFound('Judge');
      judgeId = judge.id;
    }
    if (!judgeId) {
      return invalid('A judge must be selected for the hearing.', [
        { field: 'judgeId', message: 'A judge must be selected for the hearing.' },
      ]);
    }
    const presidingJudgeId = judgeId;

    const { row, sent } = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(hearings)
        .values({
          caseId: parent.id,
          hearingType: input.hearingType,
          scheduledAt: input.scheduledAt,
          courtroom: input.courtroom,
          judgeId: presidingJudgeId,
          clerkId: ctx.actor.role === 'clerk' ? ctx.actor.id : null,
          createdById: ctx.actor.id,
          notes: input.notes ?? null,
          createdAt: ctx.now,
          updatedAt: ctx.now,
        })
        .returning();

      await recordAudit(tx, ctx, {
        action: 'create',
        modelName: 'Hearing',
        objectId: row.id,
        description: `Scheduled ${row.hearingType} hearing for case ${parent.caseNumber}`,
      });

      const sent: NotificationRow[] = [];
      if (presidingJudgeId !== ctx.actor.id) {
        sent.push(
          await notify(tx, {
            recipientId: presidingJudgeId,
            senderId: ctx.actor.id,
            title: 'Hearing Scheduled',
            message: `A ${row.hearingType} hearing for case ${parent.caseNumber} is scheduled in courtroom ${row.courtroom}.`,
            type: 'case_update',
            caseId: parent.id,
          }),
        );
      }
      return { row, sent };
    });

    publishNotifications(sent);
    return succeed(row, 'Hearing scheduled successfully.', caseUrl(parent.id));
  });
}

export async function editHearing(
  ctx: WorkflowContext,
  hearingId: string,
  raw: unknown,
): Promise<WorkflowResult<HearingRow>> {
  const denied = gate(ctx.actor, 'edit_hearing');
  if (denied) return denied;

  const parsed = parseInput(editHearingInput, raw);
  if (!parsed.ok) return parsed;
  const { judgeId, ...fields } = parsed.data;

  return atBoundary('edit_hearing', async () => {
    const current = await loadHearing(ctx.db, hearingId);
    if (!current) return notFound('Hearing');
    const forbidden = requireOwnership(ctx.actor, { kind: 'hearing', judgeId: current.judgeId });
    if (forbidden) return forbidden;

    let newJudgeId: string | undefined;
    if (judgeId !== undefined && judgeId !== current.judgeId) {
      if (ctx.actor.role !== 'clerk') {
        return accessDenied('Only clerks can change the presiding judge.', landingPageFor(ctx.actor.role));
      }
      const judge = await findUserWithRole(ctx.db, judgeId, 'judge');
      if (!judge) return notFound('Judge');
      newJudgeId = judge.id;
    }
    const judgeChange = newJudgeId !== undefined ? { judgeId: newJudgeId } : {};

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(hearings)
        .set({ ...fields, ...judgeChange, updatedAt: ctx.now })
        .where(eq(hearings.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'Hearing',
        objectId: row.id,
        description: `Updated ${row.hearingType} hearing`,
      });
      return row;
    });

    return succeed(row, 'Hearing updated successfully.', caseUrl(row.caseId));
  });
}

export async function completeHearing(
  ctx: WorkflowContext,
  hearingId: string,
): Promise<WorkflowResult<HearingRow>> {
  const denied = gate(ctx.actor, 'complete_hearing');
  if (denied) return denied;

  return atBoundary('complete_hearing', async () => {
    const current = await loadHearing(ctx.db, hearingId);
    if (!current) return notFound('Hearing');
    const forbidden = requireOwnership(ctx.actor, { kind: 'hearing', judgeId: current.judgeId });
    if (forbidden) return forbidden;

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(hearings)
        .set({
          isCompleted: true,
          completedById: ctx.actor.id,
          completedAt: ctx.now,
          updatedAt: ctx.now,
        })
        .where(eq(hearings.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'Hearing',
        objectId: row.id,
        description: `Completed ${row.hearingType} hearing`,
      });
      return row;
    });

    return succeed(row, 'Hearing marked as completed.', caseUrl(row.caseId));
  });
}

export async function cancelHearing(
  ctx: WorkflowContext,
  hearingId: string,
  raw: unknown,
): Promise<WorkflowResult<HearingRow>> {
  const denied = gate(ctx.actor, 'cancel_hearing');
  if (denied) return denied;

  const parsed = parseInput(cancelHearingInput, raw ?? {});
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('cancel_hearing', async () => {
    const current = await loadHearing(ctx.db, hearingId);
    if (!current) return notFound('Hearing');
    const forbidden = requireOwnership(ctx.actor, { kind: 'hearing', judgeId: current.judgeId });
    if (forbidden) return forbidden;

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(hearings)
        .set({
          isCancelled: true,
          cancellationReason: input.reason ?? null,
          updatedAt: ctx.now,
        })
        .where(eq(hearings.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'Hearing',
        objectId: row.id,
        description: `Cancelled ${row.hearingType} hearing`,
      });
      return row;
    });

    return succeed(row, 'Hearing cancelled.', caseUrl(row.caseId));
  });
}

// ---------------------------------------------------------------------------
// Case reports
// ---------------------------------------------------------------------------

export async function submitCaseReport(
  ctx: WorkflowContext,
  caseId: string,
  raw: unknown,
): Promise<WorkflowResult<CaseReportRow>> {
  const denied = gate(ctx.actor, 'submit_case_report');
  if (denied) return denied;

  const parsed = parseInput(submitCaseReportInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('submit_case_report', async () => {
    const parent = await loadCase(ctx.db, caseId);
    if (!parent) return notFound('Case');
    const forbidden = requireOwnership(ctx.actor, caseOwnership(parent));
    if (forbidden) return forbidden;

    const { row, sent } = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(caseReports)
        .values({
          caseId: parent.id,
          reportType: input.reportType,
          title: input.title,
          content: input.content,
          recommendations: input.recommendations ?? null,
          priority: input.priority,
          submittedById: ctx.actor.id,
          submittedAt: ctx.now,
        })
        .returning();

      await recordAudit(tx, ctx, {
        action: 'submit',
        modelName: 'CaseReport',
        objectId: row.id,
        description: `Submitted ${row.reportType} report for case ${parent.caseNumber}`,
      });

      const sent: NotificationRow[] = [];
      if (parent.createdById !== ctx.actor.id) {
        sent.push(
          await notify(tx, {
            recipientId: parent.createdById,
            senderId: ctx.actor.id,
            title: 'Case Report Submitted',
            message: `A ${row.reportType} report "${row.title}" was submitted for case ${parent.caseNumber}.`,
            type: 'report_submitted',
            priority: row.priority,
            caseId: parent.id,
            reportId: row.id,
          }),
        );
      }
      return { row, sent };
    });

    publishNotifications(sent);
    return succeed(row, 'Case report submitted successfully.', caseUrl(parent.id));
  });
}

export async function approveCaseReport(
  ctx: WorkflowContext,
  reportId: string,
): Promise<WorkflowResult<CaseReportRow>> {
  const denied = gate(ctx.actor, 'approve_case_report');
  if (denied) return denied;

  return atBoundary('approve_case_report', async () => {
    const current = await loadCaseReport(ctx.db, reportId);
    if (!current) return notFound('Case report');

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(caseReports)
        .set({ isApproved: true, approvedById: ctx.actor.id, approvedAt: ctx.now })
        .where(eq(caseReports.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'approve',
        modelName: 'CaseReport',
        objectId: row.id,
        description: `Approved report "${row.title}"`,
      });
      return row;
    });

    return succeed(row, 'Case report approved.', caseUrl(row.caseId));
  });
}

// ---------------------------------------------------------------------------
// Detail
// ---------------------------------------------------------------------------

export interface CaseStatistics {
  evidenceTotal: number;
  evidencePending: number;
  hearingsTotal: number;
  hearingsCompleted: number;
  hearingsUpcoming: number;
  reportsTotal: number;
  daysSinceFiling: number;
}

export interface CaseDetail {
  case: CaseRow;
  evidence: EvidenceRow[];
  hearings: HearingRow[];
  reports: CaseReportRow[];
  allowedActions: CaseAction[];
  statistics: CaseStatistics;
}

export async function getCaseDetail(
  ctx: WorkflowContext,
  caseId: string,
): Promise<WorkflowResult<CaseDetail>> {
  const denied = gate(ctx.actor, 'view_case');
  if (denied) return denied;

  return atBoundary('view_case', async () => {
    const row = await loadCase(ctx.db, caseId);
    if (!row) return notFound('Case');
    const forbidden = requireOwnership(ctx.actor, caseOwnership(row));
    if (forbidden) return forbidden;

    const [evidenceRows, hearingRows, reportRows] = await Promise.all([
      ctx.db
        .select()
        .from(evidence)
        .where(eq(evidence.caseId, row.id))
        .orderBy(desc(evidence.submissionDate)),
      ctx.db
        .select()
        .from(hearings)
        .where(eq(hearings.caseId, row.id))
        .orderBy(asc(hearings.scheduledAt)),
      ctx.db
        .select()
        .from(caseReports)
        .where(eq(caseReports.caseId, row.id))
        .orderBy(desc(caseReports.submittedAt)),
    ]);

    const statistics: CaseStatistics = {
      evidenceTotal: evidenceRows.length,
      evidencePending: evidenceRows.filter((e) => e.isApproved === null).length,
      hearingsTotal: hearingRows.length,
      hearingsCompleted: hearingRows.filter((h) => h.isCompleted).length,
      hearingsUpcoming: hearingRows.filter(
        (h) => !h.isCompleted && !h.isCancelled && h.scheduledAt >= ctx.now,
      ).length,
      reportsTotal: reportRows.length,
      daysSinceFiling: daysBetween(row.filingDate, todayOf(ctx)),
    };

    const guardsHold = checkCaseGuards(snapshotOf(row)).every((g) => g.passed);
    if (!guardsHold) {
      console.warn(`[WORKFLOW] Case ${row.caseNumber} violates a status invariant`);
    }

    return succeed(
      {
        case: row,
        evidence: evidenceRows,
        hearings: hearingRows,
        reports: reportRows,
        allowedActions: allowedCaseActions(row.status),
        statistics,
      },
      `Case ${row.caseNumber}`,
      caseUrl(row.id),
    );
  });
}
