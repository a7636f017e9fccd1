/**
 * Clinical Session
 *
 * One user's working copy of the patients map and their chat transcripts.
 * A session is hydrated from the record store when it starts; writes go back
 * through the store one whole patient document at a time. When a save fails
 * the in-memory patient is kept and flagged unsaved until a later save
 * succeeds. Sessions do not coordinate with each other: the last save wins.
 */

import * as functions from 'firebase-functions';
import { formatServiceDate, type Note, type Patient, type PatientMap } from '../types/clinicalRecord';
import { synthesizeNote } from './clinicalSynthesis';
import type { ClinicalModel, DocumentImage } from './openai';
import { PatientChat } from './patientChat';
import type { RecordStore } from './recordStore';

export class PatientNotFoundError extends Error {
  readonly code = 'not_found' as const;

  constructor(readonly patientId: string) {
    super(`Patient ${patientId} not found`);
    this.name = 'PatientNotFoundError';
  }
}

/** A chat turn or note synthesis for the patient is still running. */
export class PatientBusyError extends Error {
  readonly code = 'conflict' as const;

  constructor(readonly patientId: string) {
    super(`Patient ${patientId} has a record update in progress`);
    this.name = 'PatientBusyError';
  }
}

export interface ClinicalSessionOptions {
  store: RecordStore;
  model: ClinicalModel;
  /** Seed demo patients when the store has none */
  seedDemoPatients?: boolean;
  now?: () => Date;
}

export const DEMO_PATIENTS: readonly Patient[] = [
  { id: 'P-1001', name: 'Jane Doe', date_added: '2025-10-01', notes: [] },
  { id: 'P-1002', name: 'John Smith', date_added: '2025-10-15', notes: [] },
];

const PATIENT_ID_BASE = 1001;

export class ClinicalSession {
  private patients: PatientMap = new Map();
  private readonly chats = new Map<string, PatientChat>();
  private readonly unsaved = new Set<string>();
  // Ids held by stored documents that could not be loaded
  private readonly reservedIds = new Set<string>();
  private readonly notesInProgress = new Set<string>();
  private readonly now: () => Date;

  constructor(
    readonly id: string,
    private readonly options: ClinicalSessionOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  static async start(id: string, options: ClinicalSessionOptions): Promise<ClinicalSession> {
    const session = new ClinicalSession(id, options);
    await session.hydrate();
    return session;
  }

  async hydrate(): Promise<void> {
    const loaded = await this.options.store.loadAll();
    this.patients = loaded.patients;
    this.chats.clear();
    this.unsaved.clear();
    this.reservedIds.clear();
    loaded.unreadableIds.forEach((patientId) => this.reservedIds.add(patientId));

    if (this.patients.size === 0 && this.options.seedDemoPatients) {
      const seeds = DEMO_PATIENTS.filter((demo) => !this.reservedIds.has(demo.id));
      for (const demo of seeds) {
        this.patients.set(demo.id, { ...demo, notes: [] });
        await this.savePatient(demo.id);
      }
      functions.logger.info(`[session] Seeded ${seeds.length} demo patients`, {
        sessionId: this.id,
      });
    }
  }

  /** Patients sorted by name. */
  listPatients(): Patient[] {
    return [...this.patients.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  getPatient(patientId: string): Patient | undefined {
    return this.patients.get(patientId);
  }

  isUnsaved(patientId: string): boolean {
    return this.unsaved.has(patientId);
  }

  isAddingNote(patientId: string): boolean {
    return this.notesInProgress.has(patientId);
  }

  async addPatient(name: string): Promise<{ patient: Patient; saved: boolean }> {
    const patient: Patient = {
      id: this.nextPatientId(),
      name: name.trim(),
      date_added: formatServiceDate(this.now()),
      notes: [],
    };

    this.patients.set(patient.id, patient);
    const saved = await this.savePatient(patient.id);
    functions.logger.info(`[session] Added patient ${patient.id}`, { sessionId: this.id, saved });

    return { patient, saved };
  }

  /**
   * Synthesizes a note from document images and appends it to the patient's
   * history. Synthesis failures throw before anything is appended. Rejected
   * with PatientBusyError while a chat turn or another synthesis for the
   * patient is in flight.
   */
  async addNoteFromImages(
    patientId: string,
    images: DocumentImage[],
  ): Promise<{ note: Note; saved: boolean }> {
    const patient = this.requirePatient(patientId);
    const chatState = this.chats.get(patientId)?.getState() ?? 'idle';
    if (chatState !== 'idle' || this.notesInProgress.has(patientId)) {
      throw new PatientBusyError(patientId);
    }

    this.notesInProgress.add(patientId);
    let note: Note;
    try {
      note = await synthesizeNote(this.options.model, images, this.now());
      patient.notes.push(note);
    } finally {
      this.notesInProgress.delete(patientId);
    }

    const saved = await this.savePatient(patientId);
    functions.logger.info(`[session] Added note to patient ${patientId}`, {
      sessionId: this.id,
      noteCount: patient.notes.length,
      saved,
    });

    return { note, saved };
  }

  getChat(patientId: string): PatientChat {
    const patient = this.requirePatient(patientId);

    let chat = this.chats.get(patientId);
    if (!chat) {
      chat = new PatientChat(patient.id, patient.name, this.options.model, this, this.now);
      this.chats.set(patientId, chat);
    }

    return chat;
  }

  async savePatient(patientId: string): Promise<boolean> {
    const patient = this.requirePatient(patientId);
    const saved = await this.options.store.save(patientId, patient);

    if (saved) {
      this.unsaved.delete(patientId);
    } else {
      this.unsaved.add(patientId);
    }

    return saved;
  }

  close(): void {
    this.chats.clear();
    this.patients.clear();
    this.unsaved.clear();
    this.reservedIds.clear();
  }

  private requirePatient(patientId: string): Patient {
    const patient = this.patients.get(patientId);
    if (!patient) {
      throw new PatientNotFoundError(patientId);
    }
    return patient;
  }

  private nextPatientId(): string {
    let sequence = this.patients.size + PATIENT_ID_BASE;
    while (this.patients.has(`P-${sequence}`) || this.reservedIds.has(`P-${sequence}`)) {
      sequence += 1;
    }
    return `P-${sequence}`;
  }
}
