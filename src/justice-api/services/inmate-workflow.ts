import { desc, eq, or } from 'drizzle-orm';
import type { Database } from '@db/connection';
import { inmates } from '@db/schema/inmates';
import { inmateReports } from '@db/schema/inmate-reports';
import { visitorLogs } from '@db/schema/visitor-logs';
import { inmatePrograms } from '@db/schema/inmate-programs';
import { releases } from '@db/schema/releases';
import { gate, requireOwnership } from '@core/access';
import { daysBetween } from '@core/dates';
import {
  applyInmateAction,
  initialProgramStatus,
  isProgramScheduleOrdered,
  resolveActualEndDate,
} from '@core/inmate-machine';
import {
  PROGRAM_ORDER_MESSAGE,
  RELEASE_BEFORE_ADMISSION_MESSAGE,
  assignInmateInput,
  changeInmateStatusInput,
  createInmateInput,
  createInmateReportInput,
  createProgramInput,
  isUuid,
  logVisitInput,
  parseInput,
  releaseInmateInput,
  reviewInmateReportInput,
  updateInmateInput,
  updateProgramInput,
} from '@core/inputs';
import { invalid, notFound, succeed } from '@core/result';
import type { WorkflowResult } from '@core/result';
import type { AuditAction, FieldError } from '@shared/types';
import { notify, publishNotifications, recordAudit } from './audit';
import type { NotificationRow } from './audit';
import { atBoundary, todayOf } from './context';
import type { WorkflowContext } from './context';
import { displayName, findUser, findUserWithRole } from './users';

export type InmateRow = typeof inmates.$inferSelect;
export type InmateReportRow = typeof inmateReports.$inferSelect;
export type VisitorLogRow = typeof visitorLogs.$inferSelect;
export type ProgramRow = typeof inmatePrograms.$inferSelect;
export type ReleaseRow = typeof releases.$inferSelect;

const RECENT_LIMIT = 10;

// ---------------------------------------------------------------------------
// Loaders
// ---------------------------------------------------------------------------

async function loadInmate(db: Database, id: string): Promise<InmateRow | undefined> {
  if (!isUuid(id)) return undefined;
  const [row] = await db.select().from(inmates).where(eq(inmates.id, id));
  return row;
}

async function loadInmateReport(db: Database, id: string): Promise<InmateReportRow | undefined> {
  if (!isUuid(id)) return undefined;
  const [row] = await db.select().from(inmateReports).where(eq(inmateReports.id, id));
  return row;
}

async function loadProgram(db: Database, id: string): Promise<ProgramRow | undefined> {
  if (!isUuid(id)) return undefined;
  const [row] = await db.select().from(inmatePrograms).where(eq(inmatePrograms.id, id));
  return row;
}

function inmateOwnership(row: InmateRow) {
  return { kind: 'inmate' as const, assignedOfficerId: row.assignedOfficerId };
}

const inmateUrl = (id: string) => `/inmates/${id}`;
const inmateName = (row: InmateRow) => `${row.firstName} ${row.lastName}`;

// ---------------------------------------------------------------------------
// Inmate record
// ---------------------------------------------------------------------------

export async function createInmate(
  ctx: WorkflowContext,
  raw: unknown,
): Promise<WorkflowResult<InmateRow>> {
  const denied = gate(ctx.actor, 'create_inmate');
  if (denied) return denied;

  const parsed = parseInput(createInmateInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('create_inmate', async () => {
    const clashes = await ctx.db
      .select({ inmateNumber: inmates.inmateNumber, identificationNumber: inmates.identificationNumber })
      .from(inmates)
      .where(
        or(
          eq(inmates.inmateNumber, input.inmateNumber),
          eq(inmates.identificationNumber, input.identificationNumber),
        ),
      );
    const fieldErrors: FieldError[] = [];
    if (clashes.some((c) => c.inmateNumber === input.inmateNumber)) {
      fieldErrors.push({ field: 'inmateNumber', message: 'Inmate ID already exists.' });
    }
    if (clashes.some((c) => c.identificationNumber === input.identificationNumber)) {
      fieldErrors.push({
        field: 'identificationNumber',
        message: 'Identification number already exists.',
      });
    }
    if (fieldErrors.length > 0) return invalid(fieldErrors[0].message, fieldErrors);

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(inmates)
        .values({
          ...input,
          status: 'active',
          assignedOfficerId: ctx.actor.id,
          assignmentDate: todayOf(ctx),
          createdAt: ctx.now,
          updatedAt: ctx.now,
        })
        .returning();

      await recordAudit(tx, ctx, {
        action: 'create',
        modelName: 'Inmate',
        objectId: row.id,
        description: `Registered inmate ${row.inmateNumber} (${inmateName(row)})`,
      });
      return row;
    });

    return succeed(row, `Inmate ${inmateName(row)} registered successfully.`, inmateUrl(row.id));
  });
}

export async function updateInmate(
  ctx: WorkflowContext,
  inmateId: string,
  raw: unknown,
): Promise<WorkflowResult<InmateRow>> {
  const denied = gate(ctx.actor, 'update_inmate');
  if (denied) return denied;

  const parsed = parseInput(updateInmateInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('update_inmate', async () => {
    const current = await loadInmate(ctx.db, inmateId);
    if (!current) return notFound('Inmate');
    const forbidden = requireOwnership(ctx.actor, inmateOwnership(current));
    if (forbidden) return forbidden;

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(inmates)
        .set({ ...input, updatedAt: ctx.now })
        .where(eq(inmates.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'Inmate',
        objectId: row.id,
        description: `Updated inmate ${row.inmateNumber}`,
      });
      return row;
    });

    return succeed(row, `Inmate ${inmateName(row)} updated successfully.`, inmateUrl(row.id));
  });
}

/**
 * Hands an inmate over to another officer. Any prison officer may do so,
 * including for an inmate whose officer account was removed.
 */
export async function assignInmate(
  ctx: WorkflowContext,
  inmateId: string,
  raw: unknown,
): Promise<WorkflowResult<InmateRow>> {
  const denied = gate(ctx.actor, 'assign_inmate');
  if (denied) return denied;

  const parsed = parseInput(assignInmateInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('assign_inmate', async () => {
    const current = await loadInmate(ctx.db, inmateId);
    if (!current) return notFound('Inmate');

    const officer = await findUserWithRole(ctx.db, input.officerId, 'prison_officer');
    if (!officer) return notFound('Officer');

    const { row, sent } = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(inmates)
        .set({
          assignedOfficerId: officer.id,
          assignmentDate: todayOf(ctx),
          assignmentReason: input.reason ?? null,
          assignmentType: input.assignmentType ?? null,
          specialInstructions: input.instructions ?? null,
          updatedAt: ctx.now,
        })
        .where(eq(inmates.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'assign',
        modelName: 'Inmate',
        objectId: row.id,
        description: `Assigned inmate ${row.inmateNumber} to Officer ${displayName(officer)}`,
      });

      const sent: NotificationRow[] = [];
      if (officer.id !== ctx.actor.id) {
        sent.push(
          await notify(tx, {
            recipientId: officer.id,
            senderId: ctx.actor.id,
            title: 'Inmate Assigned',
            message: `Inmate ${row.inmateNumber} (${inmateName(row)}) has been assigned to you.`,
            type: 'system',
          }),
        );
      }
      return { row, sent };
    });

    publishNotifications(sent);
    return succeed(
      row,
      `Inmate ${inmateName(row)} assigned to Officer ${displayName(officer)}.`,
      inmateUrl(row.id),
    );
  });
}

export async function changeInmateStatus(
  ctx: WorkflowContext,
  inmateId: string,
  raw: unknown,
): Promise<WorkflowResult<InmateRow>> {
  const denied = gate(ctx.actor, 'change_inmate_status');
  if (denied) return denied;

  const parsed = parseInput(changeInmateStatusInput, raw);
  if (!parsed.ok) return parsed;
  const { action } = parsed.data;

  return atBoundary('change_inmate_status', async () => {
    const current = await loadInmate(ctx.db, inmateId);
    if (!current) return notFound('Inmate');
    const forbidden = requireOwnership(ctx.actor, inmateOwnership(current));
    if (forbidden) return forbidden;

    const moved = applyInmateAction(current.status, action);
    if (!moved.ok) return invalid(moved.error);

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(inmates)
        .set({ status: moved.newStatus, updatedAt: ctx.now })
        .where(eq(inmates.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'Inmate',
        objectId: row.id,
        description: `Inmate ${row.inmateNumber}: ${current.status} -> ${row.status}`,
      });
      return row;
    });

    return succeed(row, `Inmate ${inmateName(row)} is now ${row.status}.`, inmateUrl(row.id));
  });
}

export interface ReleaseOutcome {
  inmate: InmateRow;
  release: ReleaseRow;
}

export async function releaseInmate(
  ctx: WorkflowContext,
  inmateId: string,
  raw: unknown,
): Promise<WorkflowResult<ReleaseOutcome>> {
  const denied = gate(ctx.actor, 'release_inmate');
  if (denied) return denied;

  const parsed = parseInput(releaseInmateInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('release_inmate', async () => {
    const current = await loadInmate(ctx.db, inmateId);
    if (!current) return notFound('Inmate');
    const forbidden = requireOwnership(ctx.actor, inmateOwnership(current));
    if (forbidden) return forbidden;

    const authorizer = await findUser(ctx.db, input.authorizedById);
    if (!authorizer) return notFound('Authorizing user');

    const moved = applyInmateAction(current.status, 'release');
    if (!moved.ok) return invalid(moved.error);
    if (input.releaseDate < current.admissionDate) {
      return invalid(RELEASE_BEFORE_ADMISSION_MESSAGE, [
        { field: 'releaseDate', message: RELEASE_BEFORE_ADMISSION_MESSAGE },
      ]);
    }

    const outcome = await ctx.db.transaction(async (tx) => {
      const [inmate] = await tx
        .update(inmates)
        .set({
          status: moved.newStatus,
          actualReleaseDate: input.releaseDate,
          updatedAt: ctx.now,
        })
        .where(eq(inmates.id, current.id))
        .returning();

      const [release] = await tx
        .insert(releases)
        .values({
          inmateId: inmate.id,
          releaseDate: input.releaseDate,
          releaseType: input.releaseType,
          releaseNotes: input.releaseNotes ?? null,
          authorizedById: authorizer.id,
          processedById: ctx.actor.id,
          createdAt: ctx.now,
        })
        .returning();

      await recordAudit(tx, ctx, {
        action: 'release',
        modelName: 'Inmate',
        objectId: inmate.id,
        description: `Released inmate ${inmate.inmateNumber} (${input.releaseType})`,
      });
      return { inmate, release };
    });

    return succeed(
      outcome,
      `Inmate ${inmateName(outcome.inmate)} released.`,
      inmateUrl(outcome.inmate.id),
    );
  });
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export async function createInmateReport(
  ctx: WorkflowContext,
  inmateId: string,
  raw: unknown,
): Promise<WorkflowResult<InmateReportRow>> {
  const denied = gate(ctx.actor, 'create_inmate_report');
  if (denied) return denied;

  const parsed = parseInput(createInmateReportInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('create_inmate_report', async () => {
    const parent = await loadInmate(ctx.db, inmateId);
    if (!parent) return notFound('Inmate');
    const forbidden = requireOwnership(ctx.actor, inmateOwnership(parent));
    if (forbidden) return forbidden;

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(inmateReports)
        .values({
          inmateId: parent.id,
          reportType: input.reportType,
          title: input.title,
          content: input.content,
          recommendations: input.recommendations ?? null,
          priority: input.priority,
          incidentDate: input.incidentDate ?? null,
          submittedById: ctx.actor.id,
          submittedAt: ctx.now,
          status: 'pending',
        })
        .returning();

      await recordAudit(tx, ctx, {
        action: 'submit',
        modelName: 'InmateReport',
        objectId: row.id,
        description: `Submitted ${row.reportType} report for inmate ${parent.inmateNumber}`,
      });
      return row;
    });

    return succeed(row, 'Report submitted successfully.', inmateUrl(parent.id));
  });
}

const REVIEW_AUDIT_ACTIONS: Record<'reviewed' | 'approved' | 'rejected', AuditAction> = {
  reviewed: 'update',
  approved: 'approve',
  rejected: 'reject',
};

export async function reviewInmateReport(
  ctx: WorkflowContext,
  reportId: string,
  raw: unknown,
): Promise<WorkflowResult<InmateReportRow>> {
  const denied = gate(ctx.actor, 'review_inmate_report');
  if (denied) return denied;

  const parsed = parseInput(reviewInmateReportInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('review_inmate_report', async () => {
    const report = await loadInmateReport(ctx.db, reportId);
    if (!report) return notFound('Report');
    const parent = await loadInmate(ctx.db, report.inmateId);
    if (!parent) return notFound('Inmate');
    const forbidden = requireOwnership(ctx.actor, inmateOwnership(parent));
    if (forbidden) return forbidden;

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(inmateReports)
        .set({
          status: input.status,
          isReviewed: true,
          reviewedById: ctx.actor.id,
          reviewedAt: ctx.now,
          reviewNotes: input.reviewNotes ?? null,
          actionRequired: input.actionRequired,
          actionTaken: input.actionTaken ?? null,
          actionDate: input.actionTaken ? ctx.now : null,
          followUpDate: input.followUpDate ?? null,
        })
        .where(eq(inmateReports.id, report.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: REVIEW_AUDIT_ACTIONS[input.status],
        modelName: 'InmateReport',
        objectId: row.id,
        description: `Marked report "${row.title}" as ${row.status}`,
      });
      return row;
    });

    return succeed(row, `Report ${row.status} successfully.`, inmateUrl(parent.id));
  });
}

// ---------------------------------------------------------------------------
// Visits
// ---------------------------------------------------------------------------

export async function logVisit(
  ctx: WorkflowContext,
  inmateId: string,
  raw: unknown,
): Promise<WorkflowResult<VisitorLogRow>> {
  const denied = gate(ctx.actor, 'log_visit');
  if (denied) return denied;

  const parsed = parseInput(logVisitInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('log_visit', async () => {
    const parent = await loadInmate(ctx.db, inmateId);
    if (!parent) return notFound('Inmate');
    const forbidden = requireOwnership(ctx.actor, inmateOwnership(parent));
    if (forbidden) return forbidden;

    if (input.visitAt > ctx.now) {
      return invalid('Visit time cannot be in the future.', [
        { field: 'visitAt', message: 'Visit time cannot be in the future.' },
      ]);
    }

    const authorizer = await findUser(ctx.db, input.authorizedById);
    if (!authorizer) return notFound('Authorizing user');

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(visitorLogs)
        .values({
          inmateId: parent.id,
          visitorName: input.visitorName,
          visitorIdNumber: input.visitorIdNumber ?? null,
          visitorPhone: input.visitorPhone ?? null,
          relationship: input.relationship,
          visitType: input.visitType,
          visitAt: input.visitAt,
          durationMinutes: input.durationMinutes,
          purpose: input.purpose,
          notes: input.notes ?? null,
          authorizedById: authorizer.id,
          isApproved: input.isApproved,
          createdAt: ctx.now,
        })
        .returning();

      await recordAudit(tx, ctx, {
        action: 'create',
        modelName: 'VisitorLog',
        objectId: row.id,
        description: `Logged ${row.visitType} visit by ${row.visitorName} for inmate ${parent.inmateNumber}`,
      });
      return row;
    });

    return succeed(row, 'Visit logged successfully.', inmateUrl(parent.id));
  });
}

// ---------------------------------------------------------------------------
// Programs
// ---------------------------------------------------------------------------

export async function createProgram(
  ctx: WorkflowContext,
  inmateId: string,
  raw: unknown,
): Promise<WorkflowResult<ProgramRow>> {
  const denied = gate(ctx.actor, 'create_program');
  if (denied) return denied;

  const parsed = parseInput(createProgramInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('create_program', async () => {
    const parent = await loadInmate(ctx.db, inmateId);
    if (!parent) return notFound('Inmate');
    const forbidden = requireOwnership(ctx.actor, inmateOwnership(parent));
    if (forbidden) return forbidden;

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(inmatePrograms)
        .values({
          inmateId: parent.id,
          programName: input.programName,
          programType: input.programType,
          description: input.description,
          startDate: input.startDate,
          expectedEndDate: input.expectedEndDate,
          status: initialProgramStatus(input.startDate, todayOf(ctx)),
          instructor: input.instructor ?? null,
          notes: input.notes ?? null,
          createdAt: ctx.now,
          updatedAt: ctx.now,
        })
        .returning();

      await recordAudit(tx, ctx, {
        action: 'create',
        modelName: 'InmateProgram',
        objectId: row.id,
        description: `Enrolled inmate ${parent.inmateNumber} in ${row.programName}`,
      });
      return row;
    });

    return succeed(row, `Program ${row.programName} created.`, inmateUrl(parent.id));
  });
}

/**
 * Partial update of a program, progress included. actual_end_date tracks
 * entry into and exit from `completed`.
 */
export async function updateProgram(
  ctx: WorkflowContext,
  programId: string,
  raw: unknown,
): Promise<WorkflowResult<ProgramRow>> {
  const denied = gate(ctx.actor, 'update_program');
  if (denied) return denied;

  const parsed = parseInput(updateProgramInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('update_program', async () => {
    const current = await loadProgram(ctx.db, programId);
    if (!current) return notFound('Program');
    const parent = await loadInmate(ctx.db, current.inmateId);
    if (!parent) return notFound('Inmate');
    const forbidden = requireOwnership(ctx.actor, inmateOwnership(parent));
    if (forbidden) return forbidden;

    const startDate = input.startDate ?? current.startDate;
    const expectedEndDate = input.expectedEndDate ?? current.expectedEndDate;
    if (!isProgramScheduleOrdered(startDate, expectedEndDate)) {
      return invalid(PROGRAM_ORDER_MESSAGE, [
        { field: 'expectedEndDate', message: PROGRAM_ORDER_MESSAGE },
      ]);
    }

    const status = input.status ?? current.status;
    const actualEndDate = resolveActualEndDate(
      current.status,
      status,
      current.actualEndDate,
      todayOf(ctx),
    );

    const row = await ctx.db.transaction(async (tx) => {
      const [row] = await tx
        .update(inmatePrograms)
        .set({ ...input, actualEndDate, updatedAt: ctx.now })
        .where(eq(inmatePrograms.id, current.id))
        .returning();

      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'InmateProgram',
        objectId: row.id,
        description: `Updated program ${row.programName} (${row.status}, ${row.progressPercentage}%)`,
      });
      return row;
    });

    return succeed(row, `Program ${row.programName} updated.`, inmateUrl(parent.id));
  });
}

// ---------------------------------------------------------------------------
// Detail
// ---------------------------------------------------------------------------

export interface InmateStatistics {
  reportsTotal: number;
  reportsUnreviewed: number;
  programsActive: number;
  programsCompleted: number;
  visitsTotal: number;
  daysInCustody: number;
}

export interface InmateDetail {
  inmate: InmateRow;
  recentReports: InmateReportRow[];
  programs: ProgramRow[];
  recentVisits: VisitorLogRow[];
  releases: ReleaseRow[];
  statistics: InmateStatistics;
}

export async function getInmateDetail(
  ctx: WorkflowContext,
  inmateId: string,
): Promise<WorkflowResult<InmateDetail>> {
  const denied = gate(ctx.actor, 'view_inmate');
  if (denied) return denied;

  return atBoundary('view_inmate', async () => {
    const row = await loadInmate(ctx.db, inmateId);
    if (!row) return notFound('Inmate');
    const forbidden = requireOwnership(ctx.actor, inmateOwnership(row));
    if (forbidden) return forbidden;

    const [reportRows, programRows, visitRows, releaseRows] = await Promise.all([
      ctx.db
        .select()
        .from(inmateReports)
        .where(eq(inmateReports.inmateId, row.id))
        .orderBy(desc(inmateReports.submittedAt)),
      ctx.db
        .select()
        .from(inmatePrograms)
        .where(eq(inmatePrograms.inmateId, row.id))
        .orderBy(desc(inmatePrograms.startDate)),
      ctx.db
        .select()
        .from(visitorLogs)
        .where(eq(visitorLogs.inmateId, row.id))
        .orderBy(desc(visitorLogs.visitAt)),
      ctx.db
        .select()
        .from(releases)
        .where(eq(releases.inmateId, row.id))
        .orderBy(desc(releases.releaseDate)),
    ]);

    const statistics: InmateStatistics = {
      reportsTotal: reportRows.length,
      reportsUnreviewed: reportRows.filter((r) => !r.isReviewed).length,
      programsActive: programRows.filter((p) => p.status === 'active').length,
      programsCompleted: programRows.filter((p) => p.status === 'completed').length,
      visitsTotal: visitRows.length,
      daysInCustody: daysBetween(row.admissionDate, row.actualReleaseDate ?? todayOf(ctx)),
    };

    return succeed(
      {
        inmate: row,
        recentReports: reportRows.slice(0, RECENT_LIMIT),
        programs: programRows,
        recentVisits: visitRows.slice(0, RECENT_LIMIT),
        releases: releaseRows,
        statistics,
      },
      `Inmate ${row.inmateNumber}`,
      inmateUrl(row.id),
    );
  });
}
