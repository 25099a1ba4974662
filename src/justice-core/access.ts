import type { Role } from '@shared/types';
import { accessDenied } from './result';
import type { WorkflowFailure } from './result';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The authenticated user a workflow runs on behalf of. */
export interface Actor {
  id: string;
  /** null when the user has no profile; such actors fail every gate. */
  role: Role | null;
}

export type WorkflowOperation =
  // court
  | 'create_case'
  | 'assign_case'
  | 'sentence_case'
  | 'edit_case'
  | 'transition_case'
  | 'view_case'
  | 'add_evidence'
  | 'review_evidence'
  | 'schedule_hearing'
  | 'edit_hearing'
  | 'complete_hearing'
  | 'cancel_hearing'
  | 'submit_case_report'
  | 'approve_case_report'
  // prison
  | 'create_inmate'
  | 'update_inmate'
  | 'view_inmate'
  | 'assign_inmate'
  | 'change_inmate_status'
  | 'release_inmate'
  | 'create_inmate_report'
  | 'review_inmate_report'
  | 'log_visit'
  | 'create_program'
  | 'update_program'
  // shared
  | 'list_judges'
  | 'list_officers'
  | 'view_dashboard'
  | 'list_notifications'
  | 'read_notification'
  | 'update_profile';

// ---------------------------------------------------------------------------
// Role Permissions
// ---------------------------------------------------------------------------

const ANY_ROLE = ['clerk', 'judge', 'prison_officer'] as const;

export const OPERATION_PERMISSIONS: Record<WorkflowOperation, readonly Role[]> = {
  create_case: ['clerk'],
  assign_case: ['clerk'],
  sentence_case: ['judge'],
  edit_case: ['clerk', 'judge'],
  transition_case: ['clerk', 'judge'],
  view_case: ['clerk', 'judge'],
  add_evidence: ['clerk', 'judge'],
  review_evidence: ['judge'],
  schedule_hearing: ['clerk', 'judge'],
  edit_hearing: ['clerk', 'judge'],
  complete_hearing: ['clerk', 'judge'],
  cancel_hearing: ['clerk', 'judge'],
  submit_case_report: ['clerk', 'judge'],
  approve_case_report: ['clerk'],

  create_inmate: ['prison_officer'],
  update_inmate: ['prison_officer'],
  view_inmate: ['prison_officer'],
  assign_inmate: ['prison_officer'],
  change_inmate_status: ['prison_officer'],
  release_inmate: ['prison_officer'],
  create_inmate_report: ['prison_officer'],
  review_inmate_report: ['prison_officer'],
  log_visit: ['prison_officer'],
  create_program: ['prison_officer'],
  update_program: ['prison_officer'],

  list_judges: ['clerk', 'judge'],
  list_officers: ['prison_officer'],
  view_dashboard: ANY_ROLE,
  list_notifications: ANY_ROLE,
  read_notification: ANY_ROLE,
  update_profile: ANY_ROLE,
};

const ROLE_LABELS: Record<Role, string> = {
  clerk: 'Clerk',
  judge: 'Judge',
  prison_officer: 'Prison Officer',
};

const LANDING_PAGES: Record<Role, string> = {
  clerk: '/dashboard/clerk',
  judge: '/dashboard/judge',
  prison_officer: '/dashboard/prison-officer',
};

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

export function landingPageFor(role: Role | null): string {
  return role ? LANDING_PAGES[role] : '/login';
}

export function checkRoleAccess(actor: Actor, roles: readonly Role[]): boolean {
  return actor.role !== null && roles.includes(actor.role);
}

/**
 * Role gate evaluated before anything else in an operation. Returns null when
 * the actor is admitted.
 */
export function gate(actor: Actor, operation: WorkflowOperation): WorkflowFailure | null {
  const roles = OPERATION_PERMISSIONS[operation];
  if (checkRoleAccess(actor, roles)) return null;

  if (actor.role === null) {
    return accessDenied('Access denied. User profile not found.', landingPageFor(null));
  }
  const required = roles.map((r) => ROLE_LABELS[r]).join(' or ');
  return accessDenied(`Access denied. ${required} role required.`, landingPageFor(actor.role));
}

// ---------------------------------------------------------------------------
// Ownership
// ---------------------------------------------------------------------------

export type OwnedAggregate =
  | { kind: 'case'; assignedJudgeId: string | null }
  | { kind: 'hearing'; judgeId: string }
  | { kind: 'inmate'; assignedOfficerId: string | null };

/**
 * Whether the actor may act on a specific record once the role gate has
 * admitted them. Clerks oversee every case and hearing; judges only their own.
 * Inmates belong to their assigned officer alone.
 */
export function canActOn(actor: Actor, aggregate: OwnedAggregate): boolean {
  switch (aggregate.kind) {
    case 'case':
      return (
        actor.role === 'clerk' ||
        (actor.role === 'judge' && aggregate.assignedJudgeId === actor.id)
      );
    case 'hearing':
      return (
        actor.role === 'clerk' ||
        (actor.role === 'judge' && aggregate.judgeId === actor.id)
      );
    case 'inmate':
      return actor.role === 'prison_officer' && aggregate.assignedOfficerId === actor.id;
  }
}

const OWNERSHIP_MESSAGES: Record<OwnedAggregate['kind'], string> = {
  case: 'You can only act on cases assigned to you.',
  hearing: 'You can only act on hearings you preside over.',
  inmate: 'You can only act on inmates assigned to you.',
};

/** AccessDenied when `canActOn` refuses, otherwise null. */
export function requireOwnership(
  actor: Actor,
  aggregate: OwnedAggregate,
): WorkflowFailure | null {
  if (canActOn(actor, aggregate)) return null;
  return accessDenied(OWNERSHIP_MESSAGES[aggregate.kind], landingPageFor(actor.role));
}
