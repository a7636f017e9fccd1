import * as functions from 'firebase-functions';
import type { ClinicalRecord } from '../types/clinicalRecord';
import type { ClinicalModel } from './openai';

export interface SummaryRegenerationResult {
  record: ClinicalRecord;
  regenerated: boolean;
  warning?: string;
}

/**
 * Rewrites quick_summary from the current problems and medications.
 * An empty or failed model response keeps the previous summary.
 */
export async function regenerateQuickSummary(
  model: ClinicalModel,
  record: ClinicalRecord,
): Promise<SummaryRegenerationResult> {
  try {
    const summary = (await model.summarizeRecord(record)).trim();

    if (!summary) {
      return {
        record,
        regenerated: false,
        warning: 'Summary regeneration returned empty text.',
      };
    }

    return { record: { ...record, quick_summary: summary }, regenerated: true };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    functions.logger.warn('[summary] Failed to regenerate quick summary', { error: message });
    return {
      record,
      regenerated: false,
      warning: `Failed to regenerate quick summary: ${message}`,
    };
  }
}
