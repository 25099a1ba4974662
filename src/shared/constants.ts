export const API_PREFIX = '/api';

export const WS_EVENTS = {
  CONNECTION_ESTABLISHED: 'connection_established',
  HEARTBEAT: 'heartbeat',
  NOTIFICATION_CREATED: 'notification_created',
} as const;

export const ROLES = ['clerk', 'judge', 'prison_officer'] as const;

// ---------------------------------------------------------------------------
// Court
// ---------------------------------------------------------------------------

export const CASE_STATUSES = [
  'pending',
  'assigned',
  'in_progress',
  'decided',
  'closed',
  'appealed',
] as const;

export const CASE_ACTIONS = [
  'assign',
  'begin_proceedings',
  'sentence',
  'close',
  'appeal',
] as const;

export const CASE_TYPES = [
  'criminal',
  'civil',
  'family',
  'commercial',
  'administrative',
] as const;

export const CASE_PRIORITIES = ['low', 'medium', 'high'] as const;

export const SENTENCE_TYPES = [
  'imprisonment',
  'probation',
  'community_service',
  'fine',
  'suspended',
  'dismissed',
] as const;

export const EVIDENCE_TYPES = [
  'document',
  'photo',
  'video',
  'audio',
  'physical',
  'witness',
  'expert',
] as const;

export const EVIDENCE_REVIEW_ACTIONS = ['approve', 'reject'] as const;

export const HEARING_TYPES = [
  'preliminary',
  'trial',
  'sentencing',
  'appeal',
  'review',
] as const;

export const CASE_REPORT_TYPES = ['final', 'interim', 'appeal'] as const;

export const REPORT_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;

// ---------------------------------------------------------------------------
// Prison
// ---------------------------------------------------------------------------

export const INMATE_STATUSES = [
  'active',
  'released',
  'transferred',
  'deceased',
  'escaped',
] as const;

export const INMATE_ACTIONS = [
  'release',
  'transfer',
  'record_death',
  'record_escape',
] as const;

export const GENDERS = ['male', 'female', 'other'] as const;

export const BEHAVIOR_RATINGS = ['excellent', 'good', 'fair', 'poor'] as const;

export const INMATE_REPORT_TYPES = [
  'regular',
  'urgent',
  'disciplinary',
  'medical',
  'behavioral',
  'incident',
] as const;

export const INMATE_REPORT_STATUSES = [
  'pending',
  'reviewed',
  'approved',
  'rejected',
] as const;

export const VISIT_TYPES = [
  'family',
  'legal',
  'official',
  'medical',
  'religious',
] as const;

export const VISITOR_RELATIONSHIPS = [
  'spouse',
  'parent',
  'child',
  'sibling',
  'friend',
  'lawyer',
  'doctor',
  'clergy',
  'other',
] as const;

export const VISIT_DURATION_MINUTES = { min: 15, max: 480 } as const;

export const PROGRAM_TYPES = [
  'education',
  'vocational',
  'counseling',
  'therapy',
  'work',
  'religious',
  'recreation',
] as const;

export const PROGRAM_STATUSES = [
  'upcoming',
  'active',
  'completed',
  'dropped',
  'suspended',
] as const;

export const RELEASE_TYPES = [
  'sentence_completed',
  'parole',
  'pardon',
  'court_order',
  'bail',
] as const;

// ---------------------------------------------------------------------------
// Notifications & audit
// ---------------------------------------------------------------------------

export const NOTIFICATION_TYPES = [
  'case_assigned',
  'report_submitted',
  'urgent_report',
  'release_alert',
  'case_update',
  'system',
] as const;

export const AUDIT_ACTIONS = [
  'create',
  'update',
  'delete',
  'view',
  'login',
  'logout',
  'assign',
  'submit',
  'approve',
  'reject',
  'read',
  'release',
] as const;

export const NOTIFICATION_LIST_LIMIT = 20;

export const ATTENTION_THRESHOLD_DAYS = 30;
