/**
 * Clinical Synthesis
 *
 * Turns uploaded document images into a validated clinical record and the
 * note that is appended to a patient's history. Any response that is not
 * well-formed JSON matching the record schema fails the whole operation.
 */

import * as functions from 'firebase-functions';
import {
  clinicalRecordSchema,
  formatServiceDate,
  type ClinicalRecord,
  type Note,
} from '../types/clinicalRecord';
import type { ClinicalModel, DocumentImage } from './openai';
import { extractJsonBlock, safeParseJson } from './openai/jsonParser';

export type SynthesisErrorCode = 'empty_response' | 'invalid_json' | 'schema_mismatch' | 'model_error';

export class SynthesisError extends Error {
  constructor(
    readonly code: SynthesisErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'SynthesisError';
  }
}

export function parseSynthesisResult(content: string): ClinicalRecord {
  if (!content.trim()) {
    throw new SynthesisError('empty_response', 'The model returned an empty synthesis');
  }

  const { data, error } = safeParseJson(extractJsonBlock(content));
  if (error) {
    throw new SynthesisError('invalid_json', `The model returned invalid JSON: ${error}`);
  }

  const parsed = clinicalRecordSchema.safeParse(data);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw new SynthesisError(
      'schema_mismatch',
      `The synthesis did not match the record schema (${fields.join(', ')})`,
    );
  }

  return parsed.data;
}

export function buildNoteFromRecord(record: ClinicalRecord, now: Date = new Date()): Note {
  return {
    date_of_service: record.date_of_service || formatServiceDate(now),
    summary: record.quick_summary || 'N/A',
    raw_data: record,
  };
}

export async function synthesizeNote(
  model: ClinicalModel,
  images: DocumentImage[],
  now: Date = new Date(),
): Promise<Note> {
  let content: string;
  try {
    content = await model.synthesizeRecord(images);
  } catch (error) {
    functions.logger.error('[synthesis] Model call failed', error);
    throw new SynthesisError(
      'model_error',
      `Error during synthesis: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return buildNoteFromRecord(parseSynthesisResult(content), now);
}
