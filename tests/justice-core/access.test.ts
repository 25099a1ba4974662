import { describe, it, expect } from 'vitest';
import { ROLES } from '@shared/constants';
import {
  OPERATION_PERMISSIONS,
  canActOn,
  checkRoleAccess,
  gate,
  landingPageFor,
  requireOwnership,
  type Actor,
  type WorkflowOperation,
} from '@core/access';

const clerk: Actor = { id: 'clerk-1', role: 'clerk' };
const judge: Actor = { id: 'judge-1', role: 'judge' };
const otherJudge: Actor = { id: 'judge-2', role: 'judge' };
const officer: Actor = { id: 'officer-1', role: 'prison_officer' };
const noProfile: Actor = { id: 'user-9', role: null };

// ---------------------------------------------------------------------------
// Permissions table
// ---------------------------------------------------------------------------

describe('OPERATION_PERMISSIONS', () => {
  it('grants every operation to at least one valid role', () => {
    const valid = new Set<string>(ROLES);
    for (const roles of Object.values(OPERATION_PERMISSIONS)) {
      expect(roles.length).toBeGreaterThan(0);
      for (const role of roles) expect(valid.has(role)).toBe(true);
    }
  });

  it('keeps case creation and assignment with clerks', () => {
    expect(OPERATION_PERMISSIONS.create_case).toEqual(['clerk']);
    expect(OPERATION_PERMISSIONS.assign_case).toEqual(['clerk']);
  });

  it('keeps sentencing and evidence review with judges', () => {
    expect(OPERATION_PERMISSIONS.sentence_case).toEqual(['judge']);
    expect(OPERATION_PERMISSIONS.review_evidence).toEqual(['judge']);
  });
});

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

describe('checkRoleAccess', () => {
  it('admits a role in the set', () => {
    expect(checkRoleAccess(clerk, ['clerk', 'judge'])).toBe(true);
  });

  it('refuses a role outside the set', () => {
    expect(checkRoleAccess(officer, ['clerk', 'judge'])).toBe(false);
  });

  it('refuses an actor without a profile', () => {
    expect(checkRoleAccess(noProfile, ['clerk', 'judge', 'prison_officer'])).toBe(false);
  });
});

describe('landingPageFor', () => {
  it('maps each role to its dashboard', () => {
    expect(landingPageFor('clerk')).toBe('/dashboard/clerk');
    expect(landingPageFor('judge')).toBe('/dashboard/judge');
    expect(landingPageFor('prison_officer')).toBe('/dashboard/prison-officer');
  });

  it('sends actors without a role to login', () => {
    expect(landingPageFor(null)).toBe('/login');
  });
});

describe('gate', () => {
  it('returns null for an admitted actor', () => {
    expect(gate(clerk, 'create_case')).toBeNull();
  });

  it('denies a judge creating a case and redirects to the judge dashboard', () => {
    expect(gate(judge, 'create_case')).toEqual({
      ok: false,
      kind: 'access_denied',
      error: 'Access denied. Clerk role required.',
      redirectTo: '/dashboard/judge',
    });
  });

  it('names every permitted role in the message', () => {
    const failure = gate(officer, 'add_evidence');
    expect(failure?.error).toBe('Access denied. Clerk or Judge role required.');
    expect(failure?.redirectTo).toBe('/dashboard/prison-officer');
  });

  it('denies an actor without a profile on every operation', () => {
    const operations: WorkflowOperation[] = ['create_case', 'log_visit', 'view_dashboard'];
    for (const operation of operations) {
      const failure = gate(noProfile, operation);
      expect(failure).toEqual({
        ok: false,
        kind: 'access_denied',
        error: 'Access denied. User profile not found.',
        redirectTo: '/login',
      });
    }
  });
});

// ---------------------------------------------------------------------------
// Ownership
// ---------------------------------------------------------------------------

describe('canActOn', () => {
  it('lets a clerk act on any case', () => {
    expect(canActOn(clerk, { kind: 'case', assignedJudgeId: null })).toBe(true);
    expect(canActOn(clerk, { kind: 'case', assignedJudgeId: 'judge-1' })).toBe(true);
  });

  it('lets a judge act only on cases assigned to them', () => {
    expect(canActOn(judge, { kind: 'case', assignedJudgeId: 'judge-1' })).toBe(true);
    expect(canActOn(otherJudge, { kind: 'case', assignedJudgeId: 'judge-1' })).toBe(false);
    expect(canActOn(judge, { kind: 'case', assignedJudgeId: null })).toBe(false);
  });

  it('lets a judge act only on hearings they preside over', () => {
    expect(canActOn(judge, { kind: 'hearing', judgeId: 'judge-1' })).toBe(true);
    expect(canActOn(otherJudge, { kind: 'hearing', judgeId: 'judge-1' })).toBe(false);
    expect(canActOn(clerk, { kind: 'hearing', judgeId: 'judge-1' })).toBe(true);
  });

  it('gives inmates to their assigned officer alone', () => {
    expect(canActOn(officer, { kind: 'inmate', assignedOfficerId: 'officer-1' })).toBe(true);
    expect(canActOn(officer, { kind: 'inmate', assignedOfficerId: 'officer-2' })).toBe(false);
    expect(canActOn(officer, { kind: 'inmate', assignedOfficerId: null })).toBe(false);
    expect(canActOn(clerk, { kind: 'inmate', assignedOfficerId: 'clerk-1' })).toBe(false);
  });
});

describe('requireOwnership', () => {
  it('returns null when the actor owns the record', () => {
    expect(requireOwnership(judge, { kind: 'case', assignedJudgeId: 'judge-1' })).toBeNull();
  });

  it('returns an access-denied failure otherwise', () => {
    expect(requireOwnership(otherJudge, { kind: 'case', assignedJudgeId: 'judge-1' })).toEqual({
      ok: false,
      kind: 'access_denied',
      error: 'You can only act on cases assigned to you.',
      redirectTo: '/dashboard/judge',
    });
  });
});
