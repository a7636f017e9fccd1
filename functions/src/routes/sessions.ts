/**
 * Session API Routes
 *
 * A session is one user's working copy of the patients map. Patients, their
 * synthesized notes and the per-patient chat are all addressed through the
 * session that holds them.
 */

import { Router, type Response } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { strictLimiter } from '../middlewares/rateLimit';
import {
  PatientBusyError,
  PatientNotFoundError,
  type ClinicalSession,
} from '../services/clinicalSession';
import { SynthesisError } from '../services/clinicalSynthesis';
import type { SessionRegistry } from '../services/sessionRegistry';
import { getLatestNote, type Patient } from '../types/clinicalRecord';
import { sanitizeChatMessage, sanitizePatientName } from '../utils/inputSanitization';

// Validation schemas
const createPatientSchema = z.object({
  name: z.string().min(1),
});

export const SUPPORTED_IMAGE_TYPES = ['image/png', 'image/jpeg', 'image/webp', 'image/gif'] as const;

const createNoteSchema = z.object({
  images: z
    .array(
      z.object({
        mimeType: z.enum(SUPPORTED_IMAGE_TYPES),
        data: z.string().min(1),
      }),
    )
    .min(1)
    .max(10),
});

const chatMessageSchema = z.object({
  message: z.string(),
});

function sendError(res: Response, status: number, code: string, message: string): void {
  res.status(status).json({ code, message });
}

function toPatientSummary(session: ClinicalSession, patient: Patient) {
  return {
    id: patient.id,
    name: patient.name,
    date_added: patient.date_added,
    noteCount: patient.notes.length,
    unsaved: session.isUnsaved(patient.id),
  };
}

export function createSessionsRouter(registry: SessionRegistry): Router {
  const router = Router();

  const findSession = (res: Response, sessionId: string): ClinicalSession | null => {
    const session = registry.get(sessionId);
    if (!session) {
      sendError(res, 404, 'not_found', 'Session not found');
      return null;
    }
    return session;
  };

  const findPatient = (
    res: Response,
    sessionId: string,
    patientId: string,
  ): { session: ClinicalSession; patient: Patient } | null => {
    const session = findSession(res, sessionId);
    if (!session) {
      return null;
    }
    const patient = session.getPatient(patientId);
    if (!patient) {
      sendError(res, 404, 'not_found', 'Patient not found');
      return null;
    }
    return { session, patient };
  };

  /**
   * POST /v1/sessions
   * Start a session hydrated from the record store
   */
  router.post('/', async (req, res) => {
    try {
      const session = await registry.start();
      res.status(201).json({
        sessionId: session.id,
        patientCount: session.listPatients().length,
      });
    } catch (error) {
      functions.logger.error('[sessions] Error starting session:', error);
      sendError(res, 500, 'server_error', 'Failed to start session');
    }
  });

  /**
   * DELETE /v1/sessions/:sessionId
   */
  router.delete('/:sessionId', (req, res) => {
    if (!registry.end(req.params.sessionId)) {
      sendError(res, 404, 'not_found', 'Session not found');
      return;
    }
    res.status(204).send();
  });

  /**
   * GET /v1/sessions/:sessionId/patients
   * Patients sorted by name
   */
  router.get('/:sessionId/patients', (req, res) => {
    const session = findSession(res, req.params.sessionId);
    if (!session) return;

    res.json({
      patients: session.listPatients().map((patient) => toPatientSummary(session, patient)),
    });
  });

  /**
   * POST /v1/sessions/:sessionId/patients
   */
  router.post('/:sessionId/patients', async (req, res) => {
    const session = findSession(res, req.params.sessionId);
    if (!session) return;

    const parsed = createPatientSchema.safeParse(req.body);
    const name = parsed.success ? sanitizePatientName(parsed.data.name) : '';
    if (!name) {
      sendError(res, 400, 'invalid_request', 'Patient name is required');
      return;
    }

    try {
      const { patient, saved } = await session.addPatient(name);
      res.status(201).json({ patient, saved });
    } catch (error) {
      functions.logger.error('[sessions] Error adding patient:', error);
      sendError(res, 500, 'server_error', 'Failed to add patient');
    }
  });

  /**
   * GET /v1/sessions/:sessionId/patients/:patientId
   * Patient with the record of their latest note
   */
  router.get('/:sessionId/patients/:patientId', (req, res) => {
    const found = findPatient(res, req.params.sessionId, req.params.patientId);
    if (!found) return;

    res.json({
      patient: found.patient,
      latestRecord: getLatestNote(found.patient)?.raw_data ?? null,
      unsaved: found.session.isUnsaved(found.patient.id),
    });
  });

  /**
   * POST /v1/sessions/:sessionId/patients/:patientId/notes
   * Synthesize a note from uploaded document images and append it
   */
  router.post('/:sessionId/patients/:patientId/notes', strictLimiter, async (req, res) => {
    const found = findPatient(res, req.params.sessionId, req.params.patientId);
    if (!found) return;

    const parsed = createNoteSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(
        res,
        400,
        'invalid_request',
        `Provide 1-10 images of type ${SUPPORTED_IMAGE_TYPES.join(', ')} as base64 data`,
      );
      return;
    }

    try {
      const { note, saved } = await found.session.addNoteFromImages(
        found.patient.id,
        parsed.data.images,
      );
      res.status(201).json({ note, saved });
    } catch (error) {
      if (error instanceof SynthesisError) {
        functions.logger.warn(`[sessions] Synthesis failed (${error.code})`, {
          patientId: found.patient.id,
        });
        sendError(res, 422, 'synthesis_failed', error.message);
        return;
      }
      if (error instanceof PatientNotFoundError) {
        sendError(res, 404, 'not_found', 'Patient not found');
        return;
      }
      if (error instanceof PatientBusyError) {
        sendError(res, 409, 'conflict', 'A record update for this patient is in progress');
        return;
      }
      functions.logger.error('[sessions] Error adding note:', error);
      sendError(res, 500, 'server_error', 'Failed to add note');
    }
  });

  /**
   * GET /v1/sessions/:sessionId/patients/:patientId/chat
   */
  router.get('/:sessionId/patients/:patientId/chat', (req, res) => {
    const found = findPatient(res, req.params.sessionId, req.params.patientId);
    if (!found) return;

    const chat = found.session.getChat(found.patient.id);
    res.json({ state: chat.getState(), messages: chat.getTranscript() });
  });

  /**
   * POST /v1/sessions/:sessionId/patients/:patientId/chat
   * Send a message to the assistant; the reply may change the record
   */
  router.post('/:sessionId/patients/:patientId/chat', strictLimiter, async (req, res) => {
    const found = findPatient(res, req.params.sessionId, req.params.patientId);
    if (!found) return;

    const parsed = chatMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      sendError(res, 400, 'invalid_request', 'Message is required');
      return;
    }

    try {
      const chat = found.session.getChat(found.patient.id);
      const result = await chat.submitUserMessage(sanitizeChatMessage(parsed.data.message));

      if (result.status === 'rejected') {
        if (result.reason === 'turn_in_progress') {
          sendError(res, 409, 'conflict', 'The assistant is still answering the previous message');
        } else if (result.reason === 'note_in_progress') {
          sendError(res, 409, 'conflict', 'A note is being added for this patient');
        } else {
          sendError(res, 400, 'invalid_request', 'Message is required');
        }
        return;
      }

      res.json(result);
    } catch (error) {
      functions.logger.error('[sessions] Error handling chat message:', error);
      sendError(res, 500, 'server_error', 'Failed to handle chat message');
    }
  });

  return router;
}
