/**
 * Batch Record Storage
 * ====================
 * MongoDB collection for LOT analyses
 */

import mongoose, { Schema } from 'mongoose';
import { ANALYSIS_TYPES, type BatchRecord } from '../contracts/batch_record.contract.js';
import type { BatchRecordStore } from './batch_record.store.js';

export interface IBatchRecord {
  batchId: string;
  analysisType: string;
  analyzedAt: Date;
  productName?: string;
  alcoholContent: number | null;
  acidity: number | null;
  sugarContent: number | null;
  tanninLevel: number | null;
  esterConcentration: number | null;
  aldehydeLevel: number | null;
  measurements?: Record<string, number | null>;
  aromaScore: number | null;
  tasteScore: number | null;
  finishScore: number | null;
  overallScore: number | null;
  productionDate: Date | null;
  entryDate: Date | null;
  notes?: string;
}

const score = { type: Number, default: null, min: 0, max: 100 };
const feature = { type: Number, default: null };

const BatchRecordSchema = new Schema<IBatchRecord>(
  {
    batchId: { type: String, required: true, index: true },
    analysisType: { type: String, required: true, enum: [...ANALYSIS_TYPES] },
    analyzedAt: { type: Date, required: true },
    productName: { type: String },
    alcoholContent: feature,
    acidity: feature,
    sugarContent: feature,
    tanninLevel: feature,
    esterConcentration: feature,
    aldehydeLevel: feature,
    measurements: { type: Schema.Types.Mixed },
    aromaScore: score,
    tasteScore: score,
    finishScore: score,
    overallScore: score,
    productionDate: { type: Date, default: null },
    entryDate: { type: Date, default: null },
    notes: { type: String },
  },
  {
    collection: 'batch_records',
    timestamps: true,
  }
);

BatchRecordSchema.index({ batchId: 1, analyzedAt: 1 }, { unique: true });

export const BatchRecordModel: mongoose.Model<IBatchRecord> =
  mongoose.models.SensoryBatchRecord || mongoose.model<IBatchRecord>('SensoryBatchRecord', BatchRecordSchema);

function isAnalysisType(value: string): value is BatchRecord['analysisType'] {
  return (ANALYSIS_TYPES as readonly string[]).includes(value);
}

function toRecord(doc: IBatchRecord): BatchRecord {
  return {
    batchId: doc.batchId,
    analysisType: isAnalysisType(doc.analysisType) ? doc.analysisType : 'other-product',
    analyzedAt: doc.analyzedAt.toISOString(),
    productName: doc.productName,
    alcoholContent: doc.alcoholContent ?? null,
    acidity: doc.acidity ?? null,
    sugarContent: doc.sugarContent ?? null,
    tanninLevel: doc.tanninLevel ?? null,
    esterConcentration: doc.esterConcentration ?? null,
    aldehydeLevel: doc.aldehydeLevel ?? null,
    measurements: doc.measurements,
    aromaScore: doc.aromaScore ?? null,
    tasteScore: doc.tasteScore ?? null,
    finishScore: doc.finishScore ?? null,
    overallScore: doc.overallScore ?? null,
    productionDate: doc.productionDate ? doc.productionDate.toISOString() : null,
    entryDate: doc.entryDate ? doc.entryDate.toISOString() : null,
    notes: doc.notes,
  };
}

function toDocument(record: BatchRecord): IBatchRecord {
  return {
    ...record,
    analyzedAt: new Date(record.analyzedAt),
    productionDate: record.productionDate ? new Date(record.productionDate) : null,
    entryDate: record.entryDate ? new Date(record.entryDate) : new Date(),
  };
}

export class MongoBatchRecordStore implements BatchRecordStore {
  constructor(private readonly model: mongoose.Model<IBatchRecord> = BatchRecordModel) {}

  async listRecords(): Promise<BatchRecord[]> {
    const docs = await this.model.find().sort({ batchId: 1, analyzedAt: 1 }).lean<IBatchRecord[]>();
    return docs.map(toRecord);
  }

  async listByBatch(batchId: string): Promise<BatchRecord[]> {
    const docs = await this.model.find({ batchId }).sort({ analyzedAt: 1 }).lean<IBatchRecord[]>();
    return docs.map(toRecord);
  }

  async upsert(record: BatchRecord): Promise<BatchRecord> {
    const doc = toDocument(record);
    const saved = await this.model
      .findOneAndUpdate(
        { batchId: doc.batchId, analyzedAt: doc.analyzedAt },
        { $set: doc },
        { upsert: true, new: true, runValidators: true }
      )
      .lean<IBatchRecord>();
    return saved ? toRecord(saved) : record;
  }

  async remove(batchId: string, analyzedAt?: string): Promise<number> {
    const filter = analyzedAt != null ? { batchId, analyzedAt: new Date(analyzedAt) } : { batchId };
    const result = await this.model.deleteMany(filter);
    return result.deletedCount;
  }
}
