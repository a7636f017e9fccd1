/**
 * Shared builders and fakes for service and route tests
 */

import type { ChatReply, ChatTurnMessage, DocumentImage } from '../services/openai';
import type {
  PatientListing,
  PatientRepository,
} from '../services/repositories/patients/PatientRepository';
import type {
  ClinicalRecord,
  ClinicalTerm,
  Note,
  Patient,
  PatientDocument,
} from '../types/clinicalRecord';

export const LISINOPRIL: ClinicalTerm = {
  standard_name: 'Lisinopril',
  standard_code_type: 'RxNorm',
  standard_code_value: '29046',
};

export const METFORMIN: ClinicalTerm = {
  standard_name: 'Metformin',
  standard_code_type: 'RxNorm',
  standard_code_value: '6809',
};

export const HYPERTENSION: ClinicalTerm = {
  standard_name: 'Hypertension',
  standard_code_type: 'SNOMED_CT',
  standard_code_value: '38341003',
};

export const TYPE_2_DIABETES: ClinicalTerm = {
  standard_name: 'Type 2 diabetes mellitus',
  standard_code_type: 'SNOMED_CT',
  standard_code_value: '44054006',
};

export function makeRecord(overrides: Partial<ClinicalRecord> = {}): ClinicalRecord {
  return {
    patient_id: 'P-1001',
    date_of_service: '2025-10-20',
    quick_summary: 'Hypertension managed without medication.',
    problems: [],
    medications: [],
    ...overrides,
  };
}

export function makeNote(record: ClinicalRecord = makeRecord()): Note {
  return {
    date_of_service: record.date_of_service,
    summary: record.quick_summary,
    raw_data: record,
  };
}

export function makePatient(overrides: Partial<Patient> = {}): Patient {
  return {
    id: 'P-1001',
    name: 'Jane Doe',
    date_added: '2025-10-01',
    notes: [],
    ...overrides,
  };
}

export function createModelMock() {
  return {
    synthesizeRecord: jest.fn<Promise<string>, [DocumentImage[]]>(),
    chat: jest.fn<Promise<ChatReply>, [{ systemInstruction: string; messages: ChatTurnMessage[] }]>(),
    summarizeRecord: jest.fn<Promise<string>, [ClinicalRecord]>(),
  };
}

export function createRepositoryMock(patients: Patient[] = [], skippedIds: string[] = []) {
  const repository = {
    listAll: jest.fn<Promise<PatientListing>, []>(async () => ({ patients, skippedIds })),
    setById: jest.fn<Promise<void>, [string, PatientDocument]>(async () => undefined),
  } satisfies PatientRepository;

  return repository;
}

export const textReply = (text: string): ChatReply => ({ text, toolCallArguments: null });
