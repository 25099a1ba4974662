import { and, asc, eq } from 'drizzle-orm';
import type { Database } from '@db/connection';
import { userProfiles, users } from '@db/schema/users';
import { gate, landingPageFor } from '@core/access';
import { parseInput, listUsersQuery, updateProfileInput } from '@core/inputs';
import { notFound, succeed } from '@core/result';
import type { WorkflowResult } from '@core/result';
import type { Role, UserOption } from '@shared/types';
import { recordAudit } from './audit';
import { atBoundary } from './context';
import type { WorkflowContext } from './context';

export type UserRow = typeof users.$inferSelect;
export type ProfileRow = typeof userProfiles.$inferSelect;

export function displayName(user: Pick<UserRow, 'firstName' | 'lastName' | 'username'>): string {
  const full = `${user.firstName} ${user.lastName}`.trim();
  return full || user.username;
}

/** The user behind `id`, provided their profile carries `role`. */
export async function findUserWithRole(
  db: Database,
  id: string,
  role: Role,
): Promise<UserRow | undefined> {
  const [row] = await db
    .select({ user: users })
    .from(users)
    .innerJoin(userProfiles, eq(userProfiles.userId, users.id))
    .where(and(eq(users.id, id), eq(userProfiles.role, role)));
  return row?.user;
}

export async function findUser(db: Database, id: string): Promise<UserRow | undefined> {
  const [row] = await db.select().from(users).where(eq(users.id, id));
  return row;
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * Pick-list of users holding a role. Judges are listed for the court side,
 * officers for the prison side.
 */
export async function listUsersByRole(
  ctx: WorkflowContext,
  raw: unknown,
): Promise<WorkflowResult<UserOption[]>> {
  const parsed = parseInput(listUsersQuery, raw);
  if (!parsed.ok) return parsed;
  const { role } = parsed.data;

  const denied = gate(ctx.actor, role === 'judge' ? 'list_judges' : 'list_officers');
  if (denied) return denied;

  return atBoundary('list_users', async () => {
    const rows = await ctx.db
      .select({ id: users.id, firstName: users.firstName, lastName: users.lastName, username: users.username })
      .from(users)
      .innerJoin(userProfiles, eq(userProfiles.userId, users.id))
      .where(and(eq(userProfiles.role, role), eq(userProfiles.isActive, true)))
      .orderBy(asc(users.firstName), asc(users.lastName));

    const options = rows.map((r) => ({ id: r.id, name: displayName(r) }));
    return succeed(options, `${options.length} users`, landingPageFor(ctx.actor.role));
  });
}

export interface ProfileView {
  user: UserRow;
  profile: ProfileRow;
}

export async function updateProfile(
  ctx: WorkflowContext,
  raw: unknown,
): Promise<WorkflowResult<ProfileView>> {
  const denied = gate(ctx.actor, 'update_profile');
  if (denied) return denied;

  const parsed = parseInput(updateProfileInput, raw);
  if (!parsed.ok) return parsed;
  const input = parsed.data;

  return atBoundary('update_profile', async () => {
    const [profile] = await ctx.db
      .select()
      .from(userProfiles)
      .where(eq(userProfiles.userId, ctx.actor.id));
    if (!profile) return notFound('Profile');

    const { phoneNumber, department, ...userFields } = input;

    const view = await ctx.db.transaction(async (tx) => {
      const [user] = Object.values(userFields).some((v) => v !== undefined)
        ? await tx.update(users).set(userFields).where(eq(users.id, ctx.actor.id)).returning()
        : await tx.select().from(users).where(eq(users.id, ctx.actor.id));
      const [updatedProfile] = await tx
        .update(userProfiles)
        .set({ phoneNumber, department, updatedAt: ctx.now })
        .where(eq(userProfiles.id, profile.id))
        .returning();
      await recordAudit(tx, ctx, {
        action: 'update',
        modelName: 'UserProfile',
        objectId: profile.id,
        description: `Updated profile for ${displayName(user)}`,
      });
      return { user, profile: updatedProfile };
    });

    return succeed(view, 'Profile updated successfully.', '/profile');
  });
}
