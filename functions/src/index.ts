import { onRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';
import { createApp } from './app';
import { firestoreConfig, sessionConfig } from './config';
import { ClinicalSession } from './services/clinicalSession';
import { getClinicalModelService } from './services/openai';
import { RecordStore } from './services/recordStore';
import { FirestorePatientRepository } from './services/repositories/patients/FirestorePatientRepository';
import { SessionRegistry } from './services/sessionRegistry';
import { initSentry } from './utils/sentry';

// Initialize Sentry BEFORE other initializations
initSentry();

admin.initializeApp(
  firestoreConfig.serviceAccountPath
    ? { credential: admin.credential.cert(firestoreConfig.serviceAccountPath) }
    : undefined,
);

const recordStore = new RecordStore(new FirestorePatientRepository(admin.firestore()));

const registry = new SessionRegistry((sessionId) =>
  ClinicalSession.start(sessionId, {
    store: recordStore,
    model: getClinicalModelService(),
    seedDemoPatients: sessionConfig.seedDemoPatients,
  }),
);

export const api = onRequest(
  {
    timeoutSeconds: 120,
    memory: '512MiB',
    // Sessions live in process memory
    maxInstances: 1,
  },
  createApp({ registry }),
);
