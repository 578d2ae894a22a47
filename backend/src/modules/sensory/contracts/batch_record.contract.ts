/**
 * Batch Record Contract
 * =====================
 * One row per LOT per analysis. Chemical features feed the models,
 * sensory scores (0..100) are the labels.
 */

export const ANALYSIS_TYPES = ['initial', 'aging', 'other-product'] as const;

export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export const SENSORY_TARGETS = ['aroma', 'taste', 'finish', 'overall'] as const;

export type SensoryTarget = (typeof SENSORY_TARGETS)[number];

export const BASE_FEATURES = [
  'alcoholContent',      // ABV %
  'acidity',             // pH
  'sugarContent',        // g/L
  'tanninLevel',         // mg/L
  'esterConcentration',  // mg/L
  'aldehydeLevel',       // mg/L
] as const;

export type BaseFeature = (typeof BASE_FEATURES)[number];

export interface BatchRecord {
  batchId: string;
  analysisType: AnalysisType;
  analyzedAt: string;
  productName?: string;

  alcoholContent: number | null;
  acidity: number | null;
  sugarContent: number | null;
  tanninLevel: number | null;
  esterConcentration: number | null;
  aldehydeLevel: number | null;

  // Instrument exports, keyed by index code
  measurements?: Record<string, number | null>;

  aromaScore: number | null;
  tasteScore: number | null;
  finishScore: number | null;
  overallScore: number | null;

  productionDate: string | null;
  entryDate: string | null;
  notes?: string;
}

export interface RecordKey {
  batchId: string;
  analyzedAt: string;
}

const TARGET_FIELDS: Record<SensoryTarget, 'aromaScore' | 'tasteScore' | 'finishScore' | 'overallScore'> = {
  aroma: 'aromaScore',
  taste: 'tasteScore',
  finish: 'finishScore',
  overall: 'overallScore',
};

export function isBaseFeature(name: string): name is BaseFeature {
  return (BASE_FEATURES as readonly string[]).includes(name);
}

export function readTarget(record: BatchRecord, target: SensoryTarget): number | null {
  return record[TARGET_FIELDS[target]] ?? null;
}

/**
 * Base features come from the record columns, anything else from measurements.
 */
export function readFeature(record: BatchRecord, name: string): number | null {
  if (isBaseFeature(name)) {
    return record[name] ?? null;
  }
  return record.measurements?.[name] ?? null;
}

export function recordKeyOf(record: BatchRecord): RecordKey {
  return { batchId: record.batchId, analyzedAt: record.analyzedAt };
}
