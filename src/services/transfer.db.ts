/**
 * TransferService Database Adapter
 * Implements TransferServiceDb interface using Supabase
 *
 * Tables: transfers, transfer_parts (see supabase/migrations)
 * transfer_parts has PRIMARY KEY (transfer_id, part_index), so a part
 * index is unique per transfer and every part write is one statement.
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';

import type {
  PartRecord,
  PartStatus,
  StoredPart,
  Transfer,
  TransferStatus,
} from '@/types/index.js';
import { StoreUnavailableError, isStoredPart } from '@/types/index.js';

import type { TransferServiceDb } from './transfer.service.js';

/**
 * Database row types; status columns carry CHECK constraints
 */
interface TransferRow {
  id: string;
  owner_id: string | null;
  target_key: string;
  total_size: number;
  part_size: number;
  part_count: number;
  upload_id: string;
  status: TransferStatus;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

interface PartRow {
  transfer_id: string;
  part_index: number;
  byte_start: number;
  byte_end: number;
  size: number;
  checksum: string;
  status: PartStatus;
  storage_token: string | null;
  updated_at: string;
}

const OPEN_STATES: TransferStatus[] = ['initiated', 'in_progress'];

// SQLSTATE classes worth retrying: connection exceptions, serialization
// failures, deadlocks, operator intervention
const TRANSIENT_SQLSTATE = /^(08|40001|40P01|57P)/;

/**
 * Map database row to Transfer entity
 */
function mapRowToTransfer(row: TransferRow): Transfer {
  return {
    id: row.id,
    ownerId: row.owner_id,
    targetKey: row.target_key,
    totalSize: Number(row.total_size),
    partSize: Number(row.part_size),
    partCount: row.part_count,
    uploadId: row.upload_id,
    status: row.status,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    completedAt: row.completed_at !== null ? new Date(row.completed_at) : null,
  };
}

/**
 * Map database row to PartRecord entity
 */
function mapRowToPart(row: PartRow): PartRecord {
  return {
    transferId: row.transfer_id,
    partIndex: row.part_index,
    byteStart: Number(row.byte_start),
    byteEnd: Number(row.byte_end),
    size: Number(row.size),
    checksum: row.checksum,
    status: row.status,
    storageToken: row.storage_token,
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Turn a PostgREST error into the adapter error the service expects
 */
function dbError(action: string, error: PostgrestError, status: number): Error {
  const message = `Failed to ${action}: ${error.message}`;
  if (status === 0 || status >= 500 || TRANSIENT_SQLSTATE.test(error.code)) {
    return new StoreUnavailableError('metadata', message, { cause: error });
  }
  return new Error(message);
}

/**
 * Create TransferServiceDb implementation using Supabase
 */
export function createTransferServiceDb(
  supabase: SupabaseClient
): TransferServiceDb {
  return {
    /**
     * Insert a transfer; upsert on id so a retried insert is harmless
     */
    async createTransfer(transfer: Transfer): Promise<Transfer> {
      const { data, error, status } = await supabase
        .from('transfers')
        .upsert(
          {
            id: transfer.id,
            owner_id: transfer.ownerId,
            target_key: transfer.targetKey,
            total_size: transfer.totalSize,
            part_size: transfer.partSize,
            part_count: transfer.partCount,
            upload_id: transfer.uploadId,
            status: transfer.status,
            created_at: transfer.createdAt.toISOString(),
            updated_at: transfer.updatedAt.toISOString(),
            completed_at: null,
          },
          { onConflict: 'id' }
        )
        .select('*')
        .single();

      if (error !== null) {
        throw dbError('create transfer', error, status);
      }

      return mapRowToTransfer(data as TransferRow);
    },

    /**
     * Get transfer by ID
     */
    async getTransfer(transferId: string): Promise<Transfer | null> {
      const { data, error, status } = await supabase
        .from('transfers')
        .select('*')
        .eq('id', transferId)
        .maybeSingle();

      if (error !== null) {
        throw dbError('get transfer', error, status);
      }

      return data === null ? null : mapRowToTransfer(data as TransferRow);
    },

    /**
     * Conditional status update; null when the row was not in `from`
     */
    async transitionTransfer(
      transferId: string,
      params: { from: TransferStatus[]; to: TransferStatus; at: Date }
    ): Promise<Transfer | null> {
      const updateData: Record<string, unknown> = {
        status: params.to,
        updated_at: params.at.toISOString(),
      };
      if (params.to === 'completed') {
        updateData.completed_at = params.at.toISOString();
      }

      const { data, error, status } = await supabase
        .from('transfers')
        .update(updateData)
        .eq('id', transferId)
        .in('status', params.from)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw dbError('update transfer status', error, status);
      }

      return data === null ? null : mapRowToTransfer(data as TransferRow);
    },

    async touchTransfer(transferId: string, at: Date): Promise<void> {
      const { error, status } = await supabase
        .from('transfers')
        .update({ updated_at: at.toISOString() })
        .eq('id', transferId)
        .in('status', OPEN_STATES);

      if (error !== null) {
        throw dbError('touch transfer', error, status);
      }
    },

    /**
     * Open transfers whose last activity predates the cutoff
     */
    async listStaleTransfers(updatedBefore: Date): Promise<Transfer[]> {
      const { data, error, status } = await supabase
        .from('transfers')
        .select('*')
        .in('status', OPEN_STATES)
        .lt('updated_at', updatedBefore.toISOString())
        .order('updated_at', { ascending: true });

      if (error !== null) {
        throw dbError('list stale transfers', error, status);
      }

      return (data as TransferRow[]).map(mapRowToTransfer);
    },

    async listParts(transferId: string): Promise<PartRecord[]> {
      const { data, error, status } = await supabase
        .from('transfer_parts')
        .select('*')
        .eq('transfer_id', transferId)
        .order('part_index', { ascending: true });

      if (error !== null) {
        throw dbError('list parts', error, status);
      }

      return (data as PartRow[]).map(mapRowToPart);
    },

    async getPart(
      transferId: string,
      partIndex: number
    ): Promise<PartRecord | null> {
      const { data, error, status } = await supabase
        .from('transfer_parts')
        .select('*')
        .eq('transfer_id', transferId)
        .eq('part_index', partIndex)
        .maybeSingle();

      if (error !== null) {
        throw dbError('get part', error, status);
      }

      return data === null ? null : mapRowToPart(data as PartRow);
    },

    /**
     * ON CONFLICT DO NOTHING: never downgrades a stored row
     */
    async insertPendingPart(part: PartRecord): Promise<void> {
      const { error, status } = await supabase.from('transfer_parts').upsert(
        {
          transfer_id: part.transferId,
          part_index: part.partIndex,
          byte_start: part.byteStart,
          byte_end: part.byteEnd,
          size: part.size,
          checksum: part.checksum,
          status: 'pending',
          storage_token: null,
          updated_at: part.updatedAt.toISOString(),
        },
        { onConflict: 'transfer_id,part_index', ignoreDuplicates: true }
      );

      if (error !== null) {
        throw dbError('insert pending part', error, status);
      }
    },

    /**
     * One UPDATE sets status, checksum and token together
     * Zero rows means abort deleted the parts underneath us
     */
    async markPartStored(params: {
      transferId: string;
      partIndex: number;
      checksum: string;
      storageToken: string;
      at: Date;
    }): Promise<StoredPart | null> {
      const { data, error, status } = await supabase
        .from('transfer_parts')
        .update({
          status: 'stored',
          checksum: params.checksum,
          storage_token: params.storageToken,
          updated_at: params.at.toISOString(),
        })
        .eq('transfer_id', params.transferId)
        .eq('part_index', params.partIndex)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw dbError('mark part stored', error, status);
      }
      if (data === null) {
        return null;
      }

      const part = mapRowToPart(data as PartRow);
      if (!isStoredPart(part)) {
        throw new Error(
          `Part ${params.partIndex} of ${params.transferId} did not persist as stored`
        );
      }
      return part;
    },

    async demotePart(params: {
      transferId: string;
      partIndex: number;
      storageToken: string;
      at: Date;
    }): Promise<void> {
      const { error, status } = await supabase
        .from('transfer_parts')
        .update({
          status: 'pending',
          storage_token: null,
          updated_at: params.at.toISOString(),
        })
        .eq('transfer_id', params.transferId)
        .eq('part_index', params.partIndex)
        .eq('storage_token', params.storageToken);

      if (error !== null) {
        throw dbError('demote part', error, status);
      }
    },

    async deleteParts(transferId: string): Promise<void> {
      const { error, status } = await supabase
        .from('transfer_parts')
        .delete()
        .eq('transfer_id', transferId);

      if (error !== null) {
        throw dbError('delete parts', error, status);
      }
    },
  };
}
