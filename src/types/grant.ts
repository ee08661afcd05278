/**
 * Access Grant Types
 * A grant is a signed URL for exactly one operation on exactly one key.
 * Grants are never persisted.
 */

export type GrantOperation = 'get' | 'put';

export interface AccessGrant {
  key: string;
  operation: GrantOperation;
  url: string;
  expiresAt: Date;
  issuedBy: string;
}
