/**
 * GrantService Implementation
 *
 * Issues signed URLs so clients move bytes directly against the object
 * store. Stateless: every call is a function of key, operation, expiry,
 * signing credential and the current time.
 */

import type { GrantConfig } from '@/config.js';
import type {
  AccessGrant,
  ActorContext,
  AuditEvent,
  GrantOperation,
  Result,
} from '@/types/index.js';
import { failure, principalOf, success } from '@/types/index.js';

import { canTargetKey, validateStorageKey } from './key-scope.js';

/**
 * Object store interface for GrantService
 */
export interface GrantServiceStorage {
  headObject: (key: string) => Promise<{ size: number; etag: string } | null>;
  presign: (params: {
    key: string;
    operation: GrantOperation;
    expiresInSeconds: number;
  }) => Promise<string>;
}

/**
 * Minimal AuditService interface (subset needed by GrantService)
 */
export interface GrantServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * GrantService interface
 */
export interface GrantService {
  issueDownloadUrl(
    actor: ActorContext,
    key: string,
    expirySeconds: number
  ): Promise<Result<AccessGrant>>;
  issueUploadUrl(
    actor: ActorContext,
    key: string,
    expirySeconds: number
  ): Promise<Result<AccessGrant>>;
}

/**
 * Create GrantService instance
 */
export function createGrantService(deps: {
  storage: GrantServiceStorage;
  auditService: GrantServiceAudit;
  config: GrantConfig;
  now?: () => Date;
}): GrantService {
  const { storage, auditService, config } = deps;
  const now = deps.now ?? (() => new Date());

  function checkRequest(
    actor: ActorContext,
    key: string,
    expirySeconds: number
  ): Result<void> {
    if (
      !Number.isInteger(expirySeconds) ||
      expirySeconds < 1 ||
      expirySeconds > config.maxExpirySeconds
    ) {
      return failure(
        'INVALID_EXPIRY',
        `expiry must be between 1 and ${config.maxExpirySeconds} seconds`
      );
    }

    const keyProblem = validateStorageKey(key);
    if (keyProblem !== null) {
      return failure('VALIDATION_ERROR', keyProblem);
    }

    if (!canTargetKey(actor, key)) {
      return failure('PERMISSION_DENIED', 'Cannot access this key');
    }

    return success(undefined);
  }

  async function issue(
    actor: ActorContext,
    key: string,
    operation: GrantOperation,
    expirySeconds: number
  ): Promise<Result<AccessGrant>> {
    const issuedAt = now();
    const url = await storage.presign({
      key,
      operation,
      expiresInSeconds: expirySeconds,
    });

    const grant: AccessGrant = {
      key,
      operation,
      url,
      expiresAt: new Date(issuedAt.getTime() + expirySeconds * 1000),
      issuedBy: principalOf(actor),
    };

    try {
      const logged = await auditService.log(actor, {
        action: 'grant:issued',
        resourceType: 'object',
        resourceId: key,
        details: { operation, expirySeconds },
      });
      if (!logged.success) {
        console.error(`[grant] audit not recorded: ${logged.error.message}`);
      }
    } catch (error) {
      console.error('[grant] audit not recorded:', error);
    }

    return success(grant);
  }

  return {
    /**
     * Signed GET for an existing object
     * Existence is checked with a metadata probe, never a read
     */
    async issueDownloadUrl(
      actor: ActorContext,
      key: string,
      expirySeconds: number
    ): Promise<Result<AccessGrant>> {
      const checked = checkRequest(actor, key, expirySeconds);
      if (!checked.success) {
        return checked;
      }

      try {
        const head = await storage.headObject(key);
        if (head === null) {
          return failure('NOT_FOUND', 'Object not found');
        }
        return await issue(actor, key, 'get', expirySeconds);
      } catch (error) {
        console.error('[grant] download grant failed:', error);
        return failure(
          'STORE_UNAVAILABLE',
          'Storage unavailable while issuing download URL'
        );
      }
    },

    /**
     * Signed PUT; the key need not exist yet
     */
    async issueUploadUrl(
      actor: ActorContext,
      key: string,
      expirySeconds: number
    ): Promise<Result<AccessGrant>> {
      const checked = checkRequest(actor, key, expirySeconds);
      if (!checked.success) {
        return checked;
      }

      try {
        return await issue(actor, key, 'put', expirySeconds);
      } catch (error) {
        console.error('[grant] upload grant failed:', error);
        return failure(
          'STORE_UNAVAILABLE',
          'Storage unavailable while issuing upload URL'
        );
      }
    },
  };
}
