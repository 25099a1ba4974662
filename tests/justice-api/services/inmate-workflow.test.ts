import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { eq } from 'drizzle-orm';
import { auditLogs, inmates, notifications, releases, visitorLogs } from '@db/schema';
import type { Actor } from '@core/access';
import {
  assignInmate,
  changeInmateStatus,
  createInmate,
  createInmateReport,
  createProgram,
  getInmateDetail,
  logVisit,
  releaseInmate,
  reviewInmateReport,
  updateInmate,
  updateProgram,
} from '@api/services/inmate-workflow';
import { FIXED_NOW, contextFor, createTestDb, resetTestDb, seedUser } from '../../fixtures/test-db';
import type { TestDb } from '../../fixtures/test-db';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let testDb: TestDb;
let officer: Actor;
let otherOfficer: Actor;
let warden: Actor;
let clerk: Actor;

function inmateBody(overrides: Record<string, unknown> = {}) {
  return {
    inmateNumber: 'IN-7',
    identificationNumber: 'ID-0007',
    firstName: 'Sam',
    lastName: 'Reed',
    dateOfBirth: '1990-04-12',
    gender: 'male',
    admissionDate: '2026-10-08',
    ...overrides,
  };
}

function visitBody(overrides: Record<string, unknown> = {}) {
  return {
    visitorName: 'Lena Reed',
    relationship: 'sibling',
    visitType: 'family',
    visitAt: '2026-10-17T14:00',
    durationMinutes: 30,
    purpose: 'Family visit',
    authorizedById: warden.id,
    ...overrides,
  };
}

function programBody(overrides: Record<string, unknown> = {}) {
  return {
    programName: 'Carpentry',
    programType: 'vocational',
    description: 'Workshop training',
    startDate: '2026-10-01',
    expectedEndDate: '2027-01-31',
    ...overrides,
  };
}

async function newInmate(overrides: Record<string, unknown> = {}): Promise<string> {
  const result = await createInmate(contextFor(testDb.db, officer), inmateBody(overrides));
  if (!result.ok) throw new Error(`inmate setup failed: ${result.error}`);
  return result.data.id;
}

async function newReport(inmateId: string): Promise<string> {
  const result = await createInmateReport(contextFor(testDb.db, officer), inmateId, {
    reportType: 'disciplinary',
    title: 'Cell search',
    content: 'Contraband found',
    priority: 'urgent',
  });
  if (!result.ok) throw new Error(`report setup failed: ${result.error}`);
  return result.data.id;
}

async function newProgram(inmateId: string, overrides: Record<string, unknown> = {}): Promise<string> {
  const result = await createProgram(contextFor(testDb.db, officer), inmateId, programBody(overrides));
  if (!result.ok) throw new Error(`program setup failed: ${result.error}`);
  return result.data.id;
}

beforeAll(async () => {
  testDb = await createTestDb();
});

afterAll(async () => {
  await testDb.client.close();
});

beforeEach(async () => {
  await resetTestDb(testDb);
  officer = await seedUser(testDb.db, { username: 'officer', role: 'prison_officer' });
  otherOfficer = await seedUser(testDb.db, {
    username: 'officer2',
    role: 'prison_officer',
    firstName: 'Kim',
    lastName: 'Hale',
  });
  warden = await seedUser(testDb.db, { username: 'warden' });
  clerk = await seedUser(testDb.db, { username: 'clerk', role: 'clerk' });
});

// ---------------------------------------------------------------------------
// Inmate record
// ---------------------------------------------------------------------------

describe('createInmate', () => {
  it('registers an active inmate under the creating officer', async () => {
    const result = await createInmate(contextFor(testDb.db, officer), inmateBody());
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.data.status).toBe('active');
    expect(result.data.assignedOfficerId).toBe(officer.id);
    expect(result.data.assignmentDate).toBe('2026-10-18');
    expect(result.data.behaviorRating).toBe('good');
    expect(result.data.protectiveCustody).toBe(false);
    expect(result.message).toBe('Inmate Sam Reed registered successfully.');
    expect(result.redirectTo).toBe(`/inmates/${result.data.id}`);
  });

  it('reports every clashing identifier', async () => {
    await newInmate();
    const result = await createInmate(contextFor(testDb.db, officer), inmateBody());
    expect(result).toEqual({
      ok: false,
      kind: 'validation',
      error: 'Inmate ID already exists.',
      fieldErrors: [
        { field: 'inmateNumber', message: 'Inmate ID already exists.' },
        { field: 'identificationNumber', message: 'Identification number already exists.' },
      ],
    });
    expect(await testDb.db.select().from(inmates)).toHaveLength(1);
  });

  it('denies a clerk', async () => {
    const result = await createInmate(contextFor(testDb.db, clerk), inmateBody());
    expect(result).toEqual({
      ok: false,
      kind: 'access_denied',
      error: 'Access denied. Prison Officer role required.',
      redirectTo: '/dashboard/clerk',
    });
  });
});

describe('updateInmate', () => {
  it('changes only the fields sent', async () => {
    const inmateId = await newInmate();
    const result = await updateInmate(contextFor(testDb.db, officer), inmateId, {
      cellNumber: 'B-12',
      disciplinaryIssues: true,
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.cellNumber).toBe('B-12');
    expect(result.data.disciplinaryIssues).toBe(true);
    expect(result.data.firstName).toBe('Sam');
  });

  it('keeps other officers out', async () => {
    const inmateId = await newInmate();
    const result = await updateInmate(contextFor(testDb.db, otherOfficer), inmateId, {
      cellNumber: 'B-12',
    });
    expect(result).toEqual({
      ok: false,
      kind: 'access_denied',
      error: 'You can only act on inmates assigned to you.',
      redirectTo: '/dashboard/prison-officer',
    });
  });
});

describe('assignInmate', () => {
  it('hands the inmate to another officer and notifies them', async () => {
    const inmateId = await newInmate();
    const result = await assignInmate(contextFor(testDb.db, officer), inmateId, {
      officerId: otherOfficer.id,
      reason: 'Shift change',
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.assignedOfficerId).toBe(otherOfficer.id);
    expect(result.data.assignmentReason).toBe('Shift change');
    expect(result.message).toBe('Inmate Sam Reed assigned to Officer Kim Hale.');

    const sent = await testDb.db
      .select()
      .from(notifications)
      .where(eq(notifications.recipientId, otherOfficer.id));
    expect(sent).toHaveLength(1);
    expect(sent[0].title).toBe('Inmate Assigned');

    const followUp = await updateInmate(contextFor(testDb.db, officer), inmateId, { block: 'C' });
    expect(followUp.ok).toBe(false);
  });

  it('lets another officer take over the inmate', async () => {
    const inmateId = await newInmate();
    const result = await assignInmate(contextFor(testDb.db, otherOfficer), inmateId, {
      officerId: otherOfficer.id,
    });
    expect(result.ok && result.data.assignedOfficerId).toBe(otherOfficer.id);

    const sent = await testDb.db.select().from(notifications);
    expect(sent).toHaveLength(0);
  });

  it('reassigns an inmate left without an officer', async () => {
    const inmateId = await newInmate();
    await testDb.db.update(inmates).set({ assignedOfficerId: null }).where(eq(inmates.id, inmateId));

    const result = await assignInmate(contextFor(testDb.db, otherOfficer), inmateId, {
      officerId: officer.id,
    });
    expect(result.ok && result.data.assignedOfficerId).toBe(officer.id);
  });

  it('refuses a target without the officer role', async () => {
    const inmateId = await newInmate();
    const result = await assignInmate(contextFor(testDb.db, officer), inmateId, {
      officerId: clerk.id,
    });
    expect(result).toEqual({ ok: false, kind: 'not_found', error: 'Officer not found' });
  });
});

// ---------------------------------------------------------------------------
// Status and release
// ---------------------------------------------------------------------------

describe('changeInmateStatus', () => {
  it('records a transfer and then refuses further moves', async () => {
    const inmateId = await newInmate();
    const moved = await changeInmateStatus(contextFor(testDb.db, officer), inmateId, {
      action: 'transfer',
    });
    expect(moved.ok && moved.data.status).toBe('transferred');

    const again = await changeInmateStatus(contextFor(testDb.db, officer), inmateId, {
      action: 'record_escape',
    });
    expect(again).toEqual({
      ok: false,
      kind: 'validation',
      error: "Action 'record_escape' is not valid for an inmate in status 'transferred'",
    });
  });
});

describe('releaseInmate', () => {
  it('releases the inmate and files the release record', async () => {
    const inmateId = await newInmate();
    const result = await releaseInmate(contextFor(testDb.db, officer), inmateId, {
      releaseDate: '2026-10-18',
      releaseType: 'parole',
      authorizedById: warden.id,
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.data.inmate.status).toBe('released');
    expect(result.data.inmate.actualReleaseDate).toBe('2026-10-18');
    expect(result.data.release.processedById).toBe(officer.id);
    expect(result.data.release.authorizedById).toBe(warden.id);

    const [audit] = await testDb.db
      .select()
      .from(auditLogs)
      .where(eq(auditLogs.action, 'release'));
    expect(audit.objectId).toBe(inmateId);
  });

  it('refuses a release date before admission', async () => {
    const inmateId = await newInmate();
    const result = await releaseInmate(contextFor(testDb.db, officer), inmateId, {
      releaseDate: '2026-10-07',
      releaseType: 'parole',
      authorizedById: warden.id,
    });
    expect(result).toEqual({
      ok: false,
      kind: 'validation',
      error: 'Release date cannot be before the admission date.',
      fieldErrors: [
        { field: 'releaseDate', message: 'Release date cannot be before the admission date.' },
      ],
    });

    const [row] = await testDb.db.select().from(inmates).where(eq(inmates.id, inmateId));
    expect(row.status).toBe('active');
    expect(await testDb.db.select().from(releases)).toHaveLength(0);
  });

  it('accepts a release on the admission date', async () => {
    const inmateId = await newInmate();
    const result = await releaseInmate(contextFor(testDb.db, officer), inmateId, {
      releaseDate: '2026-10-08',
      releaseType: 'parole',
      authorizedById: warden.id,
    });
    expect(result.ok && result.data.inmate.actualReleaseDate).toBe('2026-10-08');
  });

  it('refuses to release twice and files no second record', async () => {
    const inmateId = await newInmate();
    const body = { releaseDate: '2026-10-18', releaseType: 'parole', authorizedById: warden.id };
    await releaseInmate(contextFor(testDb.db, officer), inmateId, body);
    const second = await releaseInmate(contextFor(testDb.db, officer), inmateId, body);
    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.error).toBe("Action 'release' is not valid for an inmate in status 'released'");
    }
    expect(await testDb.db.select().from(releases)).toHaveLength(1);
  });
});

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

describe('inmate reports', () => {
  it('files reports as pending', async () => {
    const inmateId = await newInmate();
    const reportId = await newReport(inmateId);
    const detail = await getInmateDetail(contextFor(testDb.db, officer), inmateId);
    expect(detail.ok).toBe(true);
    if (!detail.ok) return;
    expect(detail.data.recentReports.map((r) => r.id)).toEqual([reportId]);
    expect(detail.data.recentReports[0].status).toBe('pending');
    expect(detail.data.recentReports[0].isReviewed).toBe(false);
  });

  it('records the review and stamps the action date', async () => {
    const inmateId = await newInmate();
    const reportId = await newReport(inmateId);
    const result = await reviewInmateReport(contextFor(testDb.db, officer), reportId, {
      status: 'approved',
      actionRequired: true,
      actionTaken: 'Privileges suspended',
      followUpDate: '2026-11-01',
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.message).toBe('Report approved successfully.');
    expect(result.data.isReviewed).toBe(true);
    expect(result.data.reviewedById).toBe(officer.id);
    expect(result.data.actionDate?.getTime()).toBe(FIXED_NOW.getTime());
    expect(result.data.followUpDate).toBe('2026-11-01');

    const approvals = await testDb.db
      .select()
      .from(auditLogs)
      .where(eq(auditLogs.action, 'approve'));
    expect(approvals).toHaveLength(1);
  });

  it('requires a review status', async () => {
    const inmateId = await newInmate();
    const reportId = await newReport(inmateId);
    const result = await reviewInmateReport(contextFor(testDb.db, officer), reportId, {});
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe('Please select a review status.');
  });
});

// ---------------------------------------------------------------------------
// Visits
// ---------------------------------------------------------------------------

describe('logVisit', () => {
  it('logs a visit from yesterday', async () => {
    const inmateId = await newInmate();
    const result = await logVisit(contextFor(testDb.db, officer), inmateId, visitBody());
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.durationMinutes).toBe(30);
    expect(result.data.authorizedById).toBe(warden.id);
    expect(await testDb.db.select().from(visitorLogs)).toHaveLength(1);
  });

  it('refuses a visit dated tomorrow and stores nothing', async () => {
    const inmateId = await newInmate();
    const result = await logVisit(
      contextFor(testDb.db, officer),
      inmateId,
      visitBody({ visitAt: '2026-10-19T10:00' }),
    );
    expect(result).toEqual({
      ok: false,
      kind: 'validation',
      error: 'Visit time cannot be in the future.',
      fieldErrors: [{ field: 'visitAt', message: 'Visit time cannot be in the future.' }],
    });
    expect(await testDb.db.select().from(visitorLogs)).toHaveLength(0);
  });

  it('refuses a visit one second ahead of now', async () => {
    const inmateId = await newInmate();
    const result = await logVisit(
      contextFor(testDb.db, officer),
      inmateId,
      visitBody({ visitAt: '2026-10-18T12:00:01' }),
    );
    expect(result.ok).toBe(false);
  });

  it('accepts a visit at exactly now', async () => {
    const inmateId = await newInmate();
    const result = await logVisit(
      contextFor(testDb.db, officer),
      inmateId,
      visitBody({ visitAt: '2026-10-18T12:00' }),
    );
    expect(result.ok).toBe(true);
  });

  it.each<[number, boolean]>([
    [15, true],
    [480, true],
    [14, false],
    [481, false],
  ])('duration %i accepted: %s', async (durationMinutes, accepted) => {
    const inmateId = await newInmate();
    const result = await logVisit(
      contextFor(testDb.db, officer),
      inmateId,
      visitBody({ durationMinutes }),
    );
    expect(result.ok).toBe(accepted);
  });

  it('needs an existing authorizing user', async () => {
    const inmateId = await newInmate();
    const result = await logVisit(
      contextFor(testDb.db, officer),
      inmateId,
      visitBody({ authorizedById: '00000000-0000-4000-8000-000000000000' }),
    );
    expect(result).toEqual({ ok: false, kind: 'not_found', error: 'Authorizing user not found' });
  });
});

// ---------------------------------------------------------------------------
// Programs
// ---------------------------------------------------------------------------

describe('programs', () => {
  it('starts as upcoming or active depending on the start date', async () => {
    const inmateId = await newInmate();
    const running = await createProgram(contextFor(testDb.db, officer), inmateId, programBody());
    const later = await createProgram(
      contextFor(testDb.db, officer),
      inmateId,
      programBody({ startDate: '2026-11-01' }),
    );
    expect(running.ok && running.data.status).toBe('active');
    expect(later.ok && later.data.status).toBe('upcoming');
  });

  it('stamps and clears the actual end date with completion', async () => {
    const inmateId = await newInmate();
    const programId = await newProgram(inmateId);

    const done = await updateProgram(contextFor(testDb.db, officer), programId, {
      status: 'completed',
      progressPercentage: 100,
      certificateEarned: true,
    });
    expect(done.ok).toBe(true);
    if (!done.ok) return;
    expect(done.data.actualEndDate).toBe('2026-10-18');
    expect(done.data.progressPercentage).toBe(100);

    const reopened = await updateProgram(contextFor(testDb.db, officer), programId, {
      status: 'active',
    });
    expect(reopened.ok && reopened.data.actualEndDate).toBeNull();
  });

  it('checks the merged schedule on update', async () => {
    const inmateId = await newInmate();
    const programId = await newProgram(inmateId);
    const result = await updateProgram(contextFor(testDb.db, officer), programId, {
      startDate: '2027-02-01',
    });
    expect(result).toEqual({
      ok: false,
      kind: 'validation',
      error: 'Start date must be before expected end date.',
      fieldErrors: [
        { field: 'expectedEndDate', message: 'Start date must be before expected end date.' },
      ],
    });
  });

  it('rejects progress above 100', async () => {
    const inmateId = await newInmate();
    const programId = await newProgram(inmateId);
    const result = await updateProgram(contextFor(testDb.db, officer), programId, {
      progressPercentage: 101,
    });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe('Progress must be between 0 and 100.');
  });
});

// ---------------------------------------------------------------------------
// Detail
// ---------------------------------------------------------------------------

describe('getInmateDetail', () => {
  it('summarises custody', async () => {
    const inmateId = await newInmate();
    await newReport(inmateId);
    await newProgram(inmateId);
    await logVisit(contextFor(testDb.db, officer), inmateId, visitBody());

    const result = await getInmateDetail(contextFor(testDb.db, officer), inmateId);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.statistics).toEqual({
      reportsTotal: 1,
      reportsUnreviewed: 1,
      programsActive: 1,
      programsCompleted: 0,
      visitsTotal: 1,
      daysInCustody: 10,
    });
    expect(result.data.releases).toEqual([]);
  });
});
