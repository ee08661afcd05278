/**
 * AuditService Implementation
 *
 * Purpose: append-only record of every transfer and grant mutation.
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 */

import type {
  ActorContext,
  AuditEvent,
  AuditLogEntry,
  Result,
} from '@/types/index.js';
import { success, failure } from '@/types/index.js';

/**
 * Database abstraction interface for AuditService
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
}

/**
 * Build log entry from actor and event
 */
export function buildLogEntry(
  actor: ActorContext,
  event: AuditEvent
): AuditLogEntry {
  return {
    actorId: actor.userId ?? null,
    actorType: actor.type,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    ipAddress: actor.ip ?? null,
    userAgent: actor.userAgent ?? null,
    requestId: actor.requestId,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log an audit event
     * No permission check - every service may log
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      try {
        await db.insertLog(buildLogEntry(actor, event));
        return success(undefined);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },
  };
}
