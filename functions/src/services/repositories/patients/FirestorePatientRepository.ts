import * as functions from 'firebase-functions';
import { firestoreConfig } from '../../../config';
import {
  patientDocumentSchema,
  type Patient,
  type PatientDocument,
} from '../../../types/clinicalRecord';
import type { PatientListing, PatientRepository } from './PatientRepository';

function parsePatientDocument(
  id: string,
  data: FirebaseFirestore.DocumentData,
): Patient | null {
  const parsed = patientDocumentSchema.safeParse(data);

  if (!parsed.success) {
    functions.logger.warn(`[patients] Skipping patient document ${id} that failed validation`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }

  return { id, ...parsed.data };
}

export class FirestorePatientRepository implements PatientRepository {
  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    private readonly collectionName: string = firestoreConfig.patientsCollection,
  ) {}

  async listAll(): Promise<PatientListing> {
    const snapshot = await this.db.collection(this.collectionName).get();
    const listing: PatientListing = { patients: [], skippedIds: [] };

    snapshot.docs.forEach((doc) => {
      const patient = parsePatientDocument(doc.id, doc.data());
      if (patient) {
        listing.patients.push(patient);
      } else {
        listing.skippedIds.push(doc.id);
      }
    });

    return listing;
  }

  async setById(patientId: string, payload: PatientDocument): Promise<void> {
    // Full overwrite, last write wins
    await this.db.collection(this.collectionName).doc(patientId).set(payload);
  }
}
