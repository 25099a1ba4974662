import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { eq } from 'drizzle-orm';
import { auditLogs, userProfiles } from '@db/schema';
import type { Actor } from '@core/access';
import { displayName, listUsersByRole, updateProfile } from '@api/services/users';
import { contextFor, createTestDb, resetTestDb, seedUser } from '../../fixtures/test-db';
import type { TestDb } from '../../fixtures/test-db';

let testDb: TestDb;
let clerk: Actor;
let officer: Actor;
let judgeB: Actor;
let judgeA: Actor;

beforeAll(async () => {
  testDb = await createTestDb();
});

afterAll(async () => {
  await testDb.client.close();
});

beforeEach(async () => {
  await resetTestDb(testDb);
  clerk = await seedUser(testDb.db, { username: 'clerk', role: 'clerk' });
  officer = await seedUser(testDb.db, { username: 'officer', role: 'prison_officer' });
  judgeB = await seedUser(testDb.db, {
    username: 'jb',
    role: 'judge',
    firstName: 'Bea',
    lastName: 'Lund',
  });
  judgeA = await seedUser(testDb.db, {
    username: 'ja',
    role: 'judge',
    firstName: 'Abe',
    lastName: 'Cole',
  });
});

describe('displayName', () => {
  it('prefers the full name and falls back to the username', () => {
    expect(displayName({ firstName: 'Abe', lastName: 'Cole', username: 'ja' })).toBe('Abe Cole');
    expect(displayName({ firstName: '', lastName: '', username: 'ja' })).toBe('ja');
  });
});

describe('listUsersByRole', () => {
  it('lists active judges ordered by name', async () => {
    const result = await listUsersByRole(contextFor(testDb.db, clerk), { role: 'judge' });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data).toEqual([
      { id: judgeA.id, name: 'Abe Cole' },
      { id: judgeB.id, name: 'Bea Lund' },
    ]);
  });

  it('leaves out inactive profiles', async () => {
    await testDb.db
      .update(userProfiles)
      .set({ isActive: false })
      .where(eq(userProfiles.userId, judgeB.id));
    const result = await listUsersByRole(contextFor(testDb.db, clerk), { role: 'judge' });
    expect(result.ok && result.data.map((u) => u.id)).toEqual([judgeA.id]);
  });

  it('keeps the officer list on the prison side', async () => {
    const denied = await listUsersByRole(contextFor(testDb.db, clerk), { role: 'prison_officer' });
    expect(denied.ok).toBe(false);
    if (!denied.ok) expect(denied.error).toBe('Access denied. Prison Officer role required.');

    const allowed = await listUsersByRole(contextFor(testDb.db, officer), { role: 'prison_officer' });
    expect(allowed.ok && allowed.data).toEqual([{ id: officer.id, name: 'officer Test' }]);
  });

  it('rejects other roles', async () => {
    const result = await listUsersByRole(contextFor(testDb.db, clerk), { role: 'clerk' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe("role must be 'judge' or 'prison_officer'");
  });
});

describe('updateProfile', () => {
  it('updates user and profile fields together', async () => {
    const result = await updateProfile(contextFor(testDb.db, clerk), {
      firstName: 'Cleo',
      email: 'cleo@example.test',
      phoneNumber: '555-0100',
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.user.firstName).toBe('Cleo');
    expect(result.data.user.email).toBe('cleo@example.test');
    expect(result.data.profile.phoneNumber).toBe('555-0100');
    expect(result.redirectTo).toBe('/profile');

    const audits = await testDb.db.select().from(auditLogs);
    expect(audits).toHaveLength(1);
    expect(audits[0].modelName).toBe('UserProfile');
  });

  it('updates profile fields alone', async () => {
    const result = await updateProfile(contextFor(testDb.db, officer), { department: 'Block C' });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.profile.department).toBe('Block C');
    expect(result.data.user.firstName).toBe('officer');
  });

  it('rejects a malformed email', async () => {
    const result = await updateProfile(contextFor(testDb.db, clerk), { email: 'nope' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe('Enter a valid email address.');
  });
});
