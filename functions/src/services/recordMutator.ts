/**
 * Record Mutator
 *
 * Applies add/remove/update changes to a clinical record. Never throws and
 * never mutates its input: a changed record is returned as a new object,
 * an unchanged one as the same reference.
 */

import { z } from 'zod';
import {
  clinicalTermSchema,
  isSameClinicalTerm,
  type ClinicalListField,
  type ClinicalRecord,
  type ClinicalTerm,
} from '../types/clinicalRecord';

export type MutationOutcome =
  | 'added'
  | 'duplicate'
  | 'removed'
  | 'updated'
  | 'not_found'
  | 'invalid_details'
  | 'invalid_format'
  | 'unsupported';

export interface MutationResult {
  record: ClinicalRecord;
  outcome: MutationOutcome;
  message: string;
  removedCount?: number;
}

const CHANGED_OUTCOMES: ReadonlySet<MutationOutcome> = new Set(['added', 'removed', 'updated']);

export function isRecordChanged(result: MutationResult): boolean {
  return CHANGED_OUTCOMES.has(result.outcome);
}

function isListTarget(target: string): target is ClinicalListField {
  return target === 'problems' || target === 'medications';
}

function readList(record: ClinicalRecord, target: ClinicalListField): ClinicalTerm[] {
  const value: unknown = record[target];
  return Array.isArray(value) ? value : [];
}

function applyListMutation(
  record: ClinicalRecord,
  action: string,
  target: ClinicalListField,
  details: unknown,
): MutationResult {
  const unchanged = (outcome: MutationOutcome, message: string): MutationResult => ({
    record,
    outcome,
    message,
  });

  const parsed = clinicalTermSchema.safeParse(details);
  if (!parsed.success) {
    return unchanged('invalid_details', 'Invalid details for update: missing required fields.');
  }

  const term = parsed.data;
  const list = readList(record, target);

  switch (action) {
    case 'add': {
      if (list.some((entry) => isSameClinicalTerm(entry, term))) {
        return unchanged('duplicate', `${term.standard_name} already exists in ${target}.`);
      }
      return {
        record: { ...record, [target]: [...list, term] },
        outcome: 'added',
        message: `Added ${term.standard_name} to ${target}.`,
      };
    }
    case 'remove': {
      const remaining = list.filter((entry) => !isSameClinicalTerm(entry, term));
      const removedCount = list.length - remaining.length;
      if (removedCount === 0) {
        return unchanged('not_found', `Item not found in ${target} for removal.`);
      }
      return {
        record: { ...record, [target]: remaining },
        outcome: 'removed',
        message: `Removed ${term.standard_name} from ${target}.`,
        removedCount,
      };
    }
    case 'update': {
      const index = list.findIndex((entry) => entry.standard_name === term.standard_name);
      if (index < 0) {
        return unchanged('not_found', `Could not find ${term.standard_name} to update in ${target}.`);
      }
      return {
        record: {
          ...record,
          [target]: list.map((entry, entryIndex) => (entryIndex === index ? term : entry)),
        },
        outcome: 'updated',
        message: `Updated ${term.standard_name} in ${target}.`,
      };
    }
    default:
      return unchanged('unsupported', `Unsupported action or target: ${action} → ${target}`);
  }
}

const summaryDetailsSchema = z.object({
  quick_summary: z.unknown(),
  text: z.unknown(),
});

function readSummaryText(details: unknown): string | null {
  if (typeof details === 'string') {
    return details;
  }

  const parsed = summaryDetailsSchema.safeParse(details);
  if (!parsed.success) {
    return null;
  }

  // quick_summary wins over text when both are present
  for (const value of [parsed.data.quick_summary, parsed.data.text]) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }

  return null;
}

export function applyRecordMutation(
  record: ClinicalRecord,
  action: string,
  target: string,
  details: unknown,
): MutationResult {
  if (isListTarget(target)) {
    return applyListMutation(record, action, target, details);
  }

  if (target === 'quick_summary' && action === 'update') {
    const summary = readSummaryText(details);
    if (!summary) {
      return { record, outcome: 'invalid_format', message: 'Invalid quick_summary update format.' };
    }
    return {
      record: { ...record, quick_summary: summary },
      outcome: 'updated',
      message: 'Updated quick summary.',
    };
  }

  return {
    record,
    outcome: 'unsupported',
    message: `Unsupported action or target: ${action} → ${target}`,
  };
}
