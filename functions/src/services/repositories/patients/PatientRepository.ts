import type { Patient, PatientDocument } from '../../../types/clinicalRecord';

export interface PatientListing {
  patients: Patient[];
  /** Ids of stored documents that failed validation and were left out */
  skippedIds: string[];
}

export interface PatientRepository {
  listAll(): Promise<PatientListing>;
  setById(patientId: string, payload: PatientDocument): Promise<void>;
}
