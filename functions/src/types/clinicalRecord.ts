/**
 * Clinical record types
 *
 * Schemas for patient documents as stored in Firestore and for the
 * structured record the synthesis model returns. Records are parsed
 * through these schemas wherever they cross a storage or model boundary.
 */

import { z } from 'zod';

// =============================================================================
// Clinical terms
// =============================================================================

export const clinicalTermSchema = z.object({
  standard_name: z.string(),
  standard_code_type: z.string(),
  standard_code_value: z.string(),
});

export type ClinicalTerm = z.infer<typeof clinicalTermSchema>;

export const CLINICAL_TERM_KEYS = [
  'standard_name',
  'standard_code_type',
  'standard_code_value',
] as const;

export function isSameClinicalTerm(a: ClinicalTerm, b: ClinicalTerm): boolean {
  return CLINICAL_TERM_KEYS.every((key) => a[key] === b[key]);
}

// =============================================================================
// Records, notes and patients
// =============================================================================

export const clinicalRecordSchema = z.object({
  patient_id: z.string().default(''),
  date_of_service: z.string().default(''),
  quick_summary: z.string().default(''),
  problems: z.array(clinicalTermSchema).default([]),
  medications: z.array(clinicalTermSchema).default([]),
});

export type ClinicalRecord = z.infer<typeof clinicalRecordSchema>;

export type ClinicalListField = 'problems' | 'medications';

export const noteSchema = z.object({
  date_of_service: z.string(),
  summary: z.string(),
  raw_data: clinicalRecordSchema,
});

export type Note = z.infer<typeof noteSchema>;

/** Persisted layout of a patient document; the id is the document key. */
export const patientDocumentSchema = z.object({
  name: z.string().min(1),
  date_added: z.string(),
  notes: z.array(noteSchema).default([]),
});

export type PatientDocument = z.infer<typeof patientDocumentSchema>;

export type Patient = PatientDocument & { id: string };

export type PatientMap = Map<string, Patient>;

export function toPatientDocument(patient: Patient): PatientDocument {
  return {
    name: patient.name,
    date_added: patient.date_added,
    notes: patient.notes,
  };
}

export function getLatestNote(patient: Patient): Note | null {
  return patient.notes.length > 0 ? patient.notes[patient.notes.length - 1] : null;
}

/** Formats a date as YYYY-MM-DD in UTC. */
export function formatServiceDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
