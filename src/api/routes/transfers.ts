/**
 * Transfer Routes
 * Resumable multipart transfers: begin, upload parts, complete, abort
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { z } from 'zod';

import { DEFAULT_TRANSFER_CONFIG } from '@/config.js';
import type { TransferService } from '@/services/index.js';
import type { ActorContext, PartRecord, Transfer } from '@/types/index.js';

import { errorResponse, successResponse } from '../utils/response.js';

interface TransferRoutesDeps {
  transferService: TransferService;
  /**
   * Largest part body read from a request, in bytes
   */
  maxPartSize?: number;
}

/**
 * Helper to get actor from context
 */
function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

function formatTransfer(transfer: Transfer) {
  return {
    id: transfer.id,
    targetKey: transfer.targetKey,
    totalSize: transfer.totalSize,
    partSize: transfer.partSize,
    partCount: transfer.partCount,
    status: transfer.status,
    createdAt: transfer.createdAt.toISOString(),
    updatedAt: transfer.updatedAt.toISOString(),
    completedAt: transfer.completedAt?.toISOString() ?? null,
  };
}

function formatPart(part: PartRecord) {
  return {
    partIndex: part.partIndex,
    byteStart: part.byteStart,
    byteEnd: part.byteEnd,
    size: part.size,
    checksum: part.checksum,
    status: part.status,
    updatedAt: part.updatedAt.toISOString(),
  };
}

function validationError(c: Context, message: string, requestId: string) {
  return c.json(
    {
      error: {
        code: 'VALIDATION_ERROR',
        message,
        requestId,
      },
    },
    400
  );
}

// Zod Schemas
// Range checks live in the service so they surface as INVALID_SIZE
const beginSchema = z.object({
  fileSize: z.number({ required_error: 'fileSize is required' }),
  partSize: z.number({ required_error: 'partSize is required' }),
  targetKey: z.string({ required_error: 'targetKey is required' }),
});

const PART_INDEX_PATTERN = /^\d+$/;
const CHECKSUM_HEADER = 'x-content-sha256';

/**
 * Create transfer routes
 */
export function createTransferRoutes(deps: TransferRoutesDeps): Hono {
  const { transferService } = deps;
  const maxPartSize = deps.maxPartSize ?? DEFAULT_TRANSFER_CONFIG.maxPartSize;
  const app = new Hono();

  const partBodyLimit = bodyLimit({
    maxSize: maxPartSize,
    onError: (c) =>
      c.json(
        {
          error: {
            code: 'PAYLOAD_TOO_LARGE',
            message: `Part body exceeds the maximum of ${maxPartSize} bytes`,
            requestId: getRequestId(c),
          },
        },
        413
      ),
  });

  /**
   * POST /transfers
   * Begin a transfer
   */
  app.post('/transfers', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    let rawBody: unknown;
    try {
      rawBody = await c.req.json();
    } catch {
      rawBody = {};
    }

    const validation = beginSchema.safeParse(rawBody);
    if (!validation.success) {
      return validationError(
        c,
        validation.error.issues[0]?.message ?? 'Invalid transfer request',
        requestId
      );
    }

    const result = await transferService.begin(actor, validation.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatTransfer(result.data), requestId, 201);
  });

  /**
   * GET /transfers/:id
   * Transfer status
   */
  app.get('/transfers/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await transferService.status(actor, c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatTransfer(result.data), requestId);
  });

  /**
   * GET /transfers/:id/parts
   * Stored parts and the indices still missing
   */
  app.get('/transfers/:id/parts', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await transferService.listParts(actor, c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        transfer: formatTransfer(result.data.transfer),
        parts: result.data.parts.map(formatPart),
        missingParts: result.data.missingParts,
        storedBytes: result.data.storedBytes,
      },
      requestId
    );
  });

  /**
   * PUT /transfers/:id/parts/:index
   * Raw part bytes in the body, SHA-256 hex digest in x-content-sha256
   */
  app.put('/transfers/:id/parts/:index', partBodyLimit, async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const indexParam = c.req.param('index');

    if (!PART_INDEX_PATTERN.test(indexParam)) {
      return validationError(c, 'part index must be a positive integer', requestId);
    }

    const checksum = c.req.header(CHECKSUM_HEADER);
    if (checksum === undefined || checksum === '') {
      return validationError(c, `${CHECKSUM_HEADER} header is required`, requestId);
    }

    const bytes = new Uint8Array(await c.req.arrayBuffer());

    const result = await transferService.uploadPart(actor, {
      transferId: c.req.param('id'),
      partIndex: Number(indexParam),
      bytes,
      checksum,
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatPart(result.data), requestId);
  });

  /**
   * POST /transfers/:id/complete
   * Assemble the stored parts into the target object
   */
  app.post('/transfers/:id/complete', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await transferService.complete(actor, c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { key: result.data }, requestId);
  });

  /**
   * DELETE /transfers/:id
   * Abort; succeeds for unknown or already finished transfers
   */
  app.delete('/transfers/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const transferId = c.req.param('id');

    const result = await transferService.abort(actor, transferId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { id: transferId, aborted: true }, requestId);
  });

  return app;
}
