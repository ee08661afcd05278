/**
 * Identity Types
 *
 * The identity layer (Supabase Auth) hands the service layer an
 * already-verified principal. Nothing below the API layer authenticates.
 */

/**
 * Actor Context - who is performing the action
 * Every service method receives this context
 */
export interface ActorContext {
  type: 'user' | 'admin' | 'system';
  userId?: string;
  requestId: string;
  permissions: string[];
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for maintenance sweeps and internal calls
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
  permissions: ['*'],
};

/**
 * Admin and system actors are not bound to a key prefix
 */
export function isPrivilegedActor(actor: ActorContext): boolean {
  return (
    actor.type === 'admin' ||
    actor.type === 'system' ||
    actor.permissions.includes('*')
  );
}

/**
 * Principal recorded on grants and audit entries
 */
export function principalOf(actor: ActorContext): string {
  return actor.userId ?? actor.type;
}
