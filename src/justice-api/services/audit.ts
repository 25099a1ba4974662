import type { Database } from '@db/connection';
import { auditLogs } from '@db/schema/audit-logs';
import { notifications } from '@db/schema/notifications';
import { WS_EVENTS } from '@shared/constants';
import type { AuditAction, NotificationSummary, NotificationType, ReportPriority } from '@shared/types';
import { sendToUser } from '../websocket';
import type { WorkflowContext } from './context';

export type NotificationRow = typeof notifications.$inferSelect;

export interface AuditEntry {
  action: AuditAction;
  modelName: string;
  objectId: string;
  description: string;
}

/** Appends one audit row inside the caller's transaction. */
export async function recordAudit(
  tx: Database,
  ctx: WorkflowContext,
  entry: AuditEntry,
): Promise<void> {
  await tx.insert(auditLogs).values({
    userId: ctx.actor.id,
    action: entry.action,
    modelName: entry.modelName,
    objectId: entry.objectId,
    description: entry.description,
    ipAddress: ctx.origin.ipAddress,
    userAgent: ctx.origin.userAgent,
  });
}

export interface NotificationInput {
  recipientId: string;
  senderId?: string;
  title: string;
  message: string;
  type: NotificationType;
  priority?: ReportPriority;
  caseId?: string;
  reportId?: string;
}

export async function notify(tx: Database, input: NotificationInput): Promise<NotificationRow> {
  const [row] = await tx
    .insert(notifications)
    .values({
      recipientId: input.recipientId,
      senderId: input.senderId ?? null,
      title: input.title,
      message: input.message,
      notificationType: input.type,
      priority: input.priority ?? 'medium',
      caseId: input.caseId ?? null,
      reportId: input.reportId ?? null,
    })
    .returning();
  return row;
}

export function toSummary(row: NotificationRow): NotificationSummary {
  return {
    id: row.id,
    title: row.title,
    message: row.message,
    type: row.notificationType,
    priority: row.priority,
    isRead: row.isRead,
    createdAt: row.createdAt.toISOString(),
  };
}

/** Pushes committed notifications to their recipients' live sockets. */
export function publishNotifications(rows: readonly NotificationRow[]): void {
  for (const row of rows) {
    sendToUser(row.recipientId, WS_EVENTS.NOTIFICATION_CREATED, toSummary(row));
  }
}
