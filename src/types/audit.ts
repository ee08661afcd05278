/**
 * Audit Types
 */

/**
 * Actions recorded against transfers and grants
 */
export type AuditAction =
  | 'transfer:begun'
  | 'transfer:part_stored'
  | 'transfer:completed'
  | 'transfer:aborted'
  | 'grant:issued';

/**
 * Event to be logged to the audit trail
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: AuditAction;
  resourceType: 'transfer' | 'object';
  resourceId?: string; // transfer id or storage key
  details?: Record<string, unknown>;
}

/**
 * Row shape written by the audit sink
 */
export interface AuditLogEntry {
  actorId: string | null;
  actorType: string;
  action: AuditAction;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  userAgent: string | null;
  requestId: string | null;
}
