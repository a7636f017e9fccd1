/**
 * Record Store
 *
 * Loads and saves whole patient documents through a PatientRepository.
 * Every call is retried with exponential backoff; once attempts are
 * exhausted the failure is logged and reported as an empty load or a
 * `false` save instead of an exception.
 */

import * as functions from 'firebase-functions';
import { toPatientDocument, type Patient, type PatientMap } from '../types/clinicalRecord';
import { RetryExhaustedError, withRetry, type RetryOptions } from '../utils/retryUtils';
import type { PatientRepository } from './repositories/patients/PatientRepository';

export type RecordStoreRetryOptions = Pick<
  RetryOptions,
  'maxAttempts' | 'initialDelayMs' | 'maxDelayMs' | 'backoffFactor'
>;

export const DEFAULT_STORE_RETRY: Required<RecordStoreRetryOptions> = {
  maxAttempts: 5,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  backoffFactor: 2,
};

function failureDetails(error: unknown) {
  if (error instanceof RetryExhaustedError) {
    return { attempts: error.attempts, error: error.message };
  }
  return { error: error instanceof Error ? error.message : String(error) };
}

export interface LoadedPatients {
  patients: PatientMap;
  unreadableIds: string[];
}

export class RecordStore {
  private readonly retry: Required<RecordStoreRetryOptions>;

  constructor(
    private readonly repository: PatientRepository,
    retry: RecordStoreRetryOptions = {},
  ) {
    this.retry = { ...DEFAULT_STORE_RETRY, ...retry };
  }

  /**
   * Loads every readable patient. `unreadableIds` lists stored documents that
   * failed validation; their ids are still taken in the store.
   */
  async loadAll(): Promise<LoadedPatients> {
    try {
      const listing = await withRetry(() => this.repository.listAll(), this.retryOptions('loadAll'));
      functions.logger.info(`[recordStore] Loaded ${listing.patients.length} patients`, {
        skipped: listing.skippedIds.length,
      });
      return {
        patients: new Map(listing.patients.map((patient) => [patient.id, patient])),
        unreadableIds: listing.skippedIds,
      };
    } catch (error) {
      functions.logger.error('[recordStore] Failed to load patients', failureDetails(error));
      return { patients: new Map(), unreadableIds: [] };
    }
  }

  async save(patientId: string, patient: Patient): Promise<boolean> {
    const payload = toPatientDocument(patient);

    try {
      await withRetry(
        () => this.repository.setById(patientId, payload),
        this.retryOptions(`save ${patientId}`),
      );
      return true;
    } catch (error) {
      functions.logger.error(`[recordStore] Failed to save patient ${patientId}`, failureDetails(error));
      return false;
    }
  }

  private retryOptions(operation: string): RetryOptions {
    return {
      ...this.retry,
      onRetry: (error, attempt, nextDelayMs) => {
        functions.logger.warn(
          `[recordStore] ${operation} attempt ${attempt}/${this.retry.maxAttempts} failed, retrying in ${nextDelayMs}ms`,
          { error: error instanceof Error ? error.message : String(error) },
        );
      },
    };
  }
}
