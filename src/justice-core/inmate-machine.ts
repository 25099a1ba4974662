import type { InmateAction, InmateStatus, ProgramStatus } from '@shared/types';

// ---------------------------------------------------------------------------
// Inmate Status
// ---------------------------------------------------------------------------

export const INMATE_TRANSITIONS: Record<InmateStatus, Partial<Record<InmateAction, InmateStatus>>> = {
  active: {
    release: 'released',
    transfer: 'transferred',
    record_death: 'deceased',
    record_escape: 'escaped',
  },
  released: {},
  transferred: {},
  deceased: {},
  escaped: {},
};

/** Status changes recorded without a release record. */
export const STATUS_CHANGE_ACTIONS = ['transfer', 'record_death', 'record_escape'] as const;

export type InmateTransitionResult =
  | { ok: true; newStatus: InmateStatus }
  | { ok: false; error: string };

export function applyInmateAction(
  current: InmateStatus,
  action: InmateAction,
): InmateTransitionResult {
  const newStatus = INMATE_TRANSITIONS[current][action];
  if (!newStatus) {
    return {
      ok: false,
      error: `Action '${action}' is not valid for an inmate in status '${current}'`,
    };
  }
  return { ok: true, newStatus };
}

export function isTerminalInmateStatus(status: InmateStatus): boolean {
  return Object.keys(INMATE_TRANSITIONS[status]).length === 0;
}

// ---------------------------------------------------------------------------
// Programs
// ---------------------------------------------------------------------------

/** A program that starts after `today` is upcoming; otherwise it is running. */
export function initialProgramStatus(startDate: string, today: string): ProgramStatus {
  return startDate > today ? 'upcoming' : 'active';
}

/**
 * actual_end_date follows the status: stamped on entering `completed`,
 * cleared on leaving it, untouched otherwise.
 */
export function resolveActualEndDate(
  previous: ProgramStatus,
  next: ProgramStatus,
  currentEndDate: string | null,
  today: string,
): string | null {
  if (next === 'completed' && previous !== 'completed') return today;
  if (previous === 'completed' && next !== 'completed') return null;
  return currentEndDate;
}

export function isProgramScheduleOrdered(startDate: string, expectedEndDate: string): boolean {
  return startDate < expectedEndDate;
}
