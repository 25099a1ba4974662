import { CASE_ACTIONS } from '@shared/constants';
import type { CaseAction, CaseStatus, SentenceType } from '@shared/types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The fields of a case the status invariants range over. */
export interface CaseSnapshot {
  status: CaseStatus;
  assignedJudgeId: string | null;
  sentenceType: SentenceType | null;
  decisionDate: string | null;
}

export interface GuardResult {
  guardName: string;
  passed: boolean;
  reason?: string;
}

export interface CaseTransitionSuccess {
  ok: true;
  next: CaseSnapshot;
  guardResults: GuardResult[];
}

export interface CaseTransitionFailure {
  ok: false;
  error: string;
  guardResults?: GuardResult[];
}

export type CaseTransitionResult = CaseTransitionSuccess | CaseTransitionFailure;

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

export const CASE_TRANSITIONS: Record<CaseStatus, Partial<Record<CaseAction, CaseStatus>>> = {
  pending: {
    assign: 'assigned',
  },
  assigned: {
    assign: 'assigned',
    begin_proceedings: 'in_progress',
    sentence: 'decided',
  },
  in_progress: {
    assign: 'assigned',
    sentence: 'decided',
  },
  decided: {
    assign: 'assigned',
    sentence: 'decided',
    close: 'closed',
    appeal: 'appealed',
  },
  appealed: {
    assign: 'assigned',
    sentence: 'decided',
  },
  closed: {
    assign: 'assigned',
    sentence: 'decided',
  },
};

/** Actions a clerk or judge may fire directly, outside assign/sentence. */
export const ADMINISTRATIVE_CASE_ACTIONS = ['begin_proceedings', 'close', 'appeal'] as const;

export function nextCaseStatus(current: CaseStatus, action: CaseAction): CaseStatus | null {
  return CASE_TRANSITIONS[current][action] ?? null;
}

export function allowedCaseActions(current: CaseStatus): CaseAction[] {
  return CASE_ACTIONS.filter((action) => CASE_TRANSITIONS[current][action] !== undefined);
}

// ---------------------------------------------------------------------------
// Invariant Guards
// ---------------------------------------------------------------------------

type GuardFn = (next: CaseSnapshot) => GuardResult;

/**
 * A case that is assigned or in progress has a judge.
 */
export function guardJudgeAssigned(next: CaseSnapshot): GuardResult {
  const needsJudge = next.status === 'assigned' || next.status === 'in_progress';
  if (!needsJudge || next.assignedJudgeId) {
    return { guardName: 'guardJudgeAssigned', passed: true };
  }
  return {
    guardName: 'guardJudgeAssigned',
    passed: false,
    reason: `A case in status '${next.status}' must have an assigned judge`,
  };
}

/**
 * A decided case carries its decision date and sentence type.
 */
export function guardDecisionRecorded(next: CaseSnapshot): GuardResult {
  if (next.status !== 'decided' || (next.decisionDate && next.sentenceType)) {
    return { guardName: 'guardDecisionRecorded', passed: true };
  }
  return {
    guardName: 'guardDecisionRecorded',
    passed: false,
    reason: 'A decided case must record a decision date and sentence type',
  };
}

export const CASE_GUARDS: readonly GuardFn[] = [guardJudgeAssigned, guardDecisionRecorded];

export function checkCaseGuards(next: CaseSnapshot): GuardResult[] {
  return CASE_GUARDS.map((fn) => fn(next));
}

// ---------------------------------------------------------------------------
// Transition Reducer
// ---------------------------------------------------------------------------

/**
 * Pure reducer: applies `action` to `current` together with the field changes
 * the action brings, and returns the resulting snapshot when the move is in
 * the table and the result satisfies every case invariant.
 */
export function applyCaseAction(
  current: CaseSnapshot,
  action: CaseAction,
  changes: Partial<Omit<CaseSnapshot, 'status'>> = {},
): CaseTransitionResult {
  const target = nextCaseStatus(current.status, action);
  if (!target) {
    return {
      ok: false,
      error: `Action '${action}' is not valid for a case in status '${current.status}'`,
    };
  }

  const next: CaseSnapshot = { ...current, ...changes, status: target };
  const guardResults = checkCaseGuards(next);
  const failed = guardResults.filter((g) => !g.passed);

  if (failed.length > 0) {
    return {
      ok: false,
      error: failed.map((g) => g.reason).join('; '),
      guardResults,
    };
  }

  return { ok: true, next, guardResults };
}
