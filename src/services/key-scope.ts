/**
 * Storage key validation and principal scoping
 *
 * A user may only target keys under users/<userId>/.
 * Admin and system actors may target any key.
 */

import type { ActorContext, Transfer } from '@/types/index.js';
import { isPrivilegedActor } from '@/types/index.js';

export const MAX_KEY_LENGTH = 1024;

export function userKeyPrefix(userId: string): string {
  return `users/${userId}/`;
}

/**
 * Returns a reason when the key is unusable, null when it is fine
 */
export function validateStorageKey(key: string): string | null {
  if (key.trim() === '') {
    return 'key is required';
  }
  // Object stores bound keys in UTF-8 bytes
  if (Buffer.byteLength(key, 'utf8') > MAX_KEY_LENGTH) {
    return `key must be at most ${MAX_KEY_LENGTH} bytes`;
  }
  if (key.startsWith('/')) {
    return 'key must not start with "/"';
  }
  if (key.split('/').some((segment) => segment === '..' || segment === '.')) {
    return 'key must not contain relative path segments';
  }
  return null;
}

export function canTargetKey(actor: ActorContext, key: string): boolean {
  if (isPrivilegedActor(actor)) {
    return true;
  }
  if (actor.userId === undefined) {
    return false;
  }
  return key.startsWith(userKeyPrefix(actor.userId));
}

export function canActOnTransfer(
  actor: ActorContext,
  transfer: Transfer
): boolean {
  if (isPrivilegedActor(actor)) {
    return true;
  }
  return actor.userId !== undefined && actor.userId === transfer.ownerId;
}
