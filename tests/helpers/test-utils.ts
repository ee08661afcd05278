/**
 * Test Utilities
 * Common helpers for writing tests
 */

import { nanoid } from 'nanoid';
import { vi, type Mock } from 'vitest';

import type { RetryPolicy, TransferConfig } from '@/config.js';
import { DEFAULT_TRANSFER_CONFIG } from '@/config.js';
import { createMemoryTransferLock } from '@/lib/lock.js';
import type { TransferLock } from '@/lib/lock.js';
import type { Sleep } from '@/lib/retry.js';
import { createTransferService } from '@/services/transfer.service.js';
import type { TransferService } from '@/services/transfer.service.js';
import { sha256Hex } from '@/services/transfer.parts.js';
import type {
  ActorContext,
  AuditEvent,
  Failure,
  Result,
} from '@/types/index.js';

import {
  createInMemoryObjectStorage,
  createInMemoryTransferDb,
  createTestClock,
} from './in-memory-stores.js';
import type {
  InMemoryObjectStorage,
  InMemoryTransferDb,
  TestClock,
} from './in-memory-stores.js';

/**
 * Create a user actor for testing
 */
export function createUserActor(
  overrides?: Partial<ActorContext>
): ActorContext {
  return {
    type: 'user',
    userId: `user_${nanoid(8)}`,
    requestId: `req_${nanoid(8)}`,
    permissions: [],
    ...overrides,
  };
}

/**
 * Create an admin actor for testing
 */
export function createAdminActor(
  overrides?: Partial<ActorContext>
): ActorContext {
  return createUserActor({
    type: 'admin',
    permissions: ['admin:transfers'],
    ...overrides,
  });
}

/**
 * Deterministic bytes: byte i is (seed + i) mod 256
 */
export function makeBytes(length: number, seed = 0): Uint8Array {
  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = (seed + i) % 256;
  }
  return bytes;
}

export function checksumOf(bytes: Uint8Array): string {
  return sha256Hex(bytes);
}

export const NO_RETRY: RetryPolicy = {
  maxRetries: 0,
  baseDelayMs: 1,
  maxDelayMs: 1,
};

export const FAST_RETRY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1,
  maxDelayMs: 4,
};

export interface AuditRecorder {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
  events: AuditEvent[];
}

export function createAuditRecorder(): AuditRecorder {
  const events: AuditEvent[] = [];
  return {
    events,
    log: vi.fn(async (_actor: ActorContext, event: AuditEvent) => {
      events.push(event);
      return { success: true as const, data: undefined };
    }),
  };
}

export interface TransferHarness {
  service: TransferService;
  db: InMemoryTransferDb;
  storage: InMemoryObjectStorage;
  audit: AuditRecorder;
  clock: TestClock;
  lock: TransferLock;
  sleep: Mock<Sleep>;
}

/**
 * TransferService over in-memory stores, a test clock and a no-op sleep
 */
export function createTransferHarness(
  options: {
    config?: Partial<TransferConfig>;
    retry?: RetryPolicy;
    lock?: TransferLock;
  } = {}
): TransferHarness {
  const clock = createTestClock();
  const db = createInMemoryTransferDb();
  const storage = createInMemoryObjectStorage(clock);
  const audit = createAuditRecorder();
  const lock =
    options.lock ?? createMemoryTransferLock(() => clock.now().getTime());
  const sleep = vi.fn<Sleep>(async () => {});

  const service = createTransferService({
    db,
    storage,
    auditService: audit,
    lock,
    config: { ...DEFAULT_TRANSFER_CONFIG, ...options.config },
    retry: options.retry ?? FAST_RETRY,
    now: clock.now,
    sleep,
  });

  return { service, db, storage, audit, clock, lock, sleep };
}

/**
 * Data of a success result; throws with the error code otherwise
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.success) {
    throw new Error(`${result.error.code}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Error of a failure result; throws when the result succeeded
 */
export function failureOf<T>(result: Result<T>): Failure['error'] {
  if (result.success) {
    throw new Error('Expected a failure result');
  }
  return result.error;
}
