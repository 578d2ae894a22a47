/**
 * Batch record access
 * ===================
 * The pipeline only reads (BatchRecordSource). Data entry goes through
 * BatchRecordStore.
 */

import type { BatchRecord } from '../contracts/batch_record.contract.js';

export interface BatchRecordSource {
  listRecords(): Promise<BatchRecord[]>;
}

export interface BatchRecordStore extends BatchRecordSource {
  listByBatch(batchId: string): Promise<BatchRecord[]>;
  upsert(record: BatchRecord): Promise<BatchRecord>;
  /** Removes one analysis, or every analysis of the batch when analyzedAt is omitted. */
  remove(batchId: string, analyzedAt?: string): Promise<number>;
}

function sortRecords(records: BatchRecord[]): BatchRecord[] {
  return records.sort(
    (a, b) => a.batchId.localeCompare(b.batchId) || Date.parse(a.analyzedAt) - Date.parse(b.analyzedAt)
  );
}

function cloneRecord(record: BatchRecord): BatchRecord {
  return record.measurements ? { ...record, measurements: { ...record.measurements } } : { ...record };
}

/**
 * Process-local store for tests and offline runs.
 */
export class InMemoryBatchRecordStore implements BatchRecordStore {
  private readonly records = new Map<string, BatchRecord>();

  constructor(seed: BatchRecord[] = []) {
    for (const record of seed) {
      this.records.set(this.keyOf(record.batchId, record.analyzedAt), cloneRecord(record));
    }
  }

  private keyOf(batchId: string, analyzedAt: string): string {
    return `${batchId}@${analyzedAt}`;
  }

  async listRecords(): Promise<BatchRecord[]> {
    return sortRecords([...this.records.values()].map(cloneRecord));
  }

  async listByBatch(batchId: string): Promise<BatchRecord[]> {
    const all = await this.listRecords();
    return all.filter((r) => r.batchId === batchId);
  }

  async upsert(record: BatchRecord): Promise<BatchRecord> {
    this.records.set(this.keyOf(record.batchId, record.analyzedAt), cloneRecord(record));
    return cloneRecord(record);
  }

  async remove(batchId: string, analyzedAt?: string): Promise<number> {
    let removed = 0;
    for (const [key, record] of this.records) {
      if (record.batchId !== batchId) continue;
      if (analyzedAt != null && record.analyzedAt !== analyzedAt) continue;
      this.records.delete(key);
      removed++;
    }
    return removed;
  }
}
