import { and, count, desc, eq } from 'drizzle-orm';
import { notifications } from '@db/schema/notifications';
import { gate, landingPageFor } from '@core/access';
import { isUuid } from '@core/inputs';
import { notFound, succeed } from '@core/result';
import type { WorkflowResult } from '@core/result';
import { NOTIFICATION_LIST_LIMIT } from '@shared/constants';
import type { NotificationFeed, NotificationSummary } from '@shared/types';
import { recordAudit, toSummary } from './audit';
import { atBoundary } from './context';
import type { WorkflowContext } from './context';

export async function listNotifications(
  ctx: WorkflowContext,
): Promise<WorkflowResult<NotificationFeed>> {
  const denied = gate(ctx.actor, 'list_notifications');
  if (denied) return denied;

  return atBoundary('list_notifications', async () => {
    const rows = await ctx.db
      .select()
      .from(notifications)
      .where(eq(notifications.recipientId, ctx.actor.id))
      .orderBy(desc(notifications.createdAt))
      .limit(NOTIFICATION_LIST_LIMIT);

    const [unread] = await ctx.db
      .select({ value: count() })
      .from(notifications)
      .where(and(eq(notifications.recipientId, ctx.actor.id), eq(notifications.isRead, false)));

    const summaries = rows.map(toSummary);
    return succeed(
      { notifications: summaries, unreadCount: unread?.value ?? 0, count: summaries.length },
      `${summaries.length} notifications`,
      landingPageFor(ctx.actor.role),
    );
  });
}

/**
 * Marks one of the actor's notifications read. Someone else's notification
 * is reported as missing. Repeat calls succeed and keep the first read time.
 */
export async function markNotificationRead(
  ctx: WorkflowContext,
  notificationId: string,
): Promise<WorkflowResult<NotificationSummary>> {
  const denied = gate(ctx.actor, 'read_notification');
  if (denied) return denied;

  return atBoundary('read_notification', async () => {
    if (!isUuid(notificationId)) return notFound('Notification');
    const [current] = await ctx.db
      .select()
      .from(notifications)
      .where(
        and(eq(notifications.id, notificationId), eq(notifications.recipientId, ctx.actor.id)),
      );
    if (!current) return notFound('Notification');

    if (current.isRead) {
      return succeed(toSummary(current), 'Notification already read.', landingPageFor(ctx.actor.role));
    }

    const row = await ctx.db.transaction(async (tx) => {
      // The is_read condition keeps the first read_at when two calls race.
      const [row] = await tx
        .update(notifications)
        .set({ isRead: true, readAt: ctx.now })
        .where(and(eq(notifications.id, current.id), eq(notifications.isRead, false)))
        .returning();
      if (!row) return undefined;

      await recordAudit(tx, ctx, {
        action: 'read',
        modelName: 'Notification',
        objectId: row.id,
        description: `Read notification "${row.title}"`,
      });
      return row;
    });
    if (!row) {
      return succeed({ ...toSummary(current), isRead: true }, 'Notification already read.', landingPageFor(ctx.actor.role));
    }

    return succeed(toSummary(row), 'Notification marked as read.', landingPageFor(ctx.actor.role));
  });
}
