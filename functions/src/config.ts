/**
 * Configuration for the clinical note synthesizer functions
 * Reads from environment variables (process.env)
 *
 * Required environment variables:
 * - OPENAI_API_KEY: For document synthesis, chat and record summaries
 *
 * Optional:
 * - OPENAI_MODEL: Multimodal chat model (defaults to gpt-4o-mini)
 * - OPENAI_TIMEOUT_MS: Per-request timeout for model calls
 * - GCP_SERVICE_ACCOUNT_FILE: Service account JSON used instead of default credentials
 * - PATIENTS_COLLECTION: Firestore collection holding patient documents
 * - SEED_DEMO_PATIENTS: Set to "false" to start sessions without demo patients
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins
 *
 * For production, set secrets via Firebase Functions secrets:
 *   firebase functions:secrets:set OPENAI_API_KEY
 */

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const openAIConfig = {
  apiKey: process.env.OPENAI_API_KEY || '',
  model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  timeoutMs: parsePositiveInt(process.env.OPENAI_TIMEOUT_MS, 60000),
};

export const firestoreConfig = {
  serviceAccountPath: process.env.GCP_SERVICE_ACCOUNT_FILE || '',
  patientsCollection: process.env.PATIENTS_COLLECTION || 'patients',
};

export const sessionConfig = {
  // Demo seeding is on unless explicitly disabled
  seedDemoPatients: process.env.SEED_DEMO_PATIENTS !== 'false',
};

export const corsConfig = {
  // Comma-separated list of allowed origins for CORS
  // Example: "https://notes.example.org,https://admin.example.org"
  allowedOrigins: process.env.ALLOWED_ORIGINS || '',
  // Allow development origins when NODE_ENV is not production
  isDevelopment: process.env.NODE_ENV !== 'production',
};
