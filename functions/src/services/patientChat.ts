/**
 * Patient Chat
 *
 * Conversation with the clinical assistant about one patient. Each turn sends
 * the whole transcript plus the patient's latest record to the model, keeps
 * the reply in the transcript, and applies an add/remove directive for
 * problems or medications to the latest note when the reply carries one.
 *
 * Turn lifecycle: idle → awaiting_reply → (applying_directive) → idle.
 * The owning session refuses new notes for the patient until the turn ends.
 * Model failures become assistant messages; a turn never throws.
 */

import * as functions from 'firebase-functions';
import { getLatestNote, type Patient } from '../types/clinicalRecord';
import { extractDirective, type DirectiveSource, type RecordDirective } from './directiveParser';
import type { ClinicalModel } from './openai';
import { buildChatSystemPrompt } from './openai/clinicalPromptRegistry';
import { applyRecordMutation, isRecordChanged, type MutationOutcome } from './recordMutator';
import { regenerateQuickSummary } from './summaryRegenerator';

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  text: string;
  createdAt: string;
}

export type PatientChatState = 'idle' | 'awaiting_reply' | 'applying_directive';

export interface ChatNotice {
  level: 'info' | 'warning' | 'error';
  message: string;
}

export interface DirectiveApplication {
  directive: RecordDirective;
  source: DirectiveSource;
  status: 'applied' | 'ignored' | 'aborted';
  /** Outcome message of an applied or aborted directive */
  message?: string;
  outcome?: MutationOutcome;
  summaryRegenerated?: boolean;
  saved?: boolean;
}

export type ChatTurnResult =
  | {
      status: 'rejected';
      reason: 'empty_message' | 'turn_in_progress' | 'note_in_progress';
      ok: false;
      notices: ChatNotice[];
    }
  | {
      status: 'completed';
      ok: boolean;
      reply: ChatMessage;
      directive: DirectiveApplication | null;
      notices: ChatNotice[];
    }
  | {
      status: 'model_error';
      ok: false;
      reply: ChatMessage;
      notices: ChatNotice[];
    };

/** What the chat needs from the session that owns the patient. */
export interface PatientChatHost {
  getPatient(patientId: string): Patient | undefined;
  savePatient(patientId: string): Promise<boolean>;
  /** True while a note is being synthesized for the patient */
  isAddingNote(patientId: string): boolean;
}

export const EMPTY_REPLY_TEXT = '_No response received._';
export const NO_RECORD_CONTEXT = 'No synthesized record is available yet.';

const AUTO_APPLY_ACTIONS: ReadonlySet<string> = new Set(['add', 'remove']);
const AUTO_APPLY_TARGETS: ReadonlySet<string> = new Set(['problems', 'medications']);

export class PatientChat {
  private readonly transcript: ChatMessage[] = [];
  private state: PatientChatState = 'idle';

  constructor(
    private readonly patientId: string,
    private readonly patientName: string,
    private readonly model: ClinicalModel,
    private readonly host: PatientChatHost,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.append(
      'assistant',
      `Hello! I'm your assistant for **${patientName}** (ID: \`${patientId}\`). ` +
        'Ask about their conditions, medications, or suggest updates.',
    );
  }

  getState(): PatientChatState {
    return this.state;
  }

  getTranscript(): ChatMessage[] {
    return this.transcript.map((message) => ({ ...message }));
  }

  async submitUserMessage(text: string): Promise<ChatTurnResult> {
    const prompt = text.trim();
    if (!prompt) {
      return {
        status: 'rejected',
        reason: 'empty_message',
        ok: false,
        notices: [{ level: 'warning', message: 'Message is empty.' }],
      };
    }

    if (this.state !== 'idle') {
      return {
        status: 'rejected',
        reason: 'turn_in_progress',
        ok: false,
        notices: [{ level: 'warning', message: 'The assistant is still answering the previous message.' }],
      };
    }

    // The latest note must not change underneath a directive
    if (this.host.isAddingNote(this.patientId)) {
      return {
        status: 'rejected',
        reason: 'note_in_progress',
        ok: false,
        notices: [{ level: 'warning', message: 'A note is being added for this patient. Try again shortly.' }],
      };
    }

    this.append('user', prompt);
    this.state = 'awaiting_reply';

    try {
      return await this.runTurn();
    } finally {
      this.state = 'idle';
    }
  }

  private async runTurn(): Promise<ChatTurnResult> {
    const notices: ChatNotice[] = [];
    const systemInstruction = buildChatSystemPrompt(this.patientName, this.currentRecordContext());

    let replyText: string;
    let toolCallArguments: string | null;
    try {
      const reply = await this.model.chat({
        systemInstruction,
        messages: this.transcript.map((message) => ({ role: message.role, content: message.text })),
      });
      replyText = reply.text;
      toolCallArguments = reply.toolCallArguments;
    } catch (error) {
      functions.logger.error(`[patientChat] Model call failed for patient ${this.patientId}`, error);
      const text = `Model error: ${error instanceof Error ? error.message : String(error)}`;
      notices.push({ level: 'error', message: text });
      return { status: 'model_error', ok: false, reply: this.append('assistant', text), notices };
    }

    const directive = await this.handleDirective({ text: replyText, toolCallArguments }, notices);
    // A bare tool call has no content; its outcome stands in for the reply
    const replyMessage = this.append('assistant', replyText || directive?.message || EMPTY_REPLY_TEXT);
    const ok = !directive || (directive.status !== 'aborted' && directive.saved !== false);

    return { status: 'completed', ok, reply: replyMessage, directive, notices };
  }

  private async handleDirective(
    reply: { text: string; toolCallArguments: string | null },
    notices: ChatNotice[],
  ): Promise<DirectiveApplication | null> {
    const extraction = extractDirective(reply);

    if (extraction.kind === 'none') {
      return null;
    }

    if (extraction.kind === 'invalid') {
      functions.logger.warn(`[patientChat] Ignoring unparseable directive for patient ${this.patientId}`, {
        source: extraction.source,
        error: extraction.error,
      });
      notices.push({
        level: 'warning',
        message: 'AI generated invalid JSON. Please rephrase the request.',
      });
      return null;
    }

    const { directive, source } = extraction;
    if (!AUTO_APPLY_ACTIONS.has(directive.action) || !AUTO_APPLY_TARGETS.has(directive.target)) {
      return { directive, source, status: 'ignored' };
    }

    this.state = 'applying_directive';

    const patient = this.host.getPatient(this.patientId);
    const latestNote = patient ? getLatestNote(patient) : null;
    if (!latestNote) {
      const message = 'No record found to update.';
      notices.push({ level: 'error', message });
      return { directive, source, status: 'aborted', message };
    }

    const mutation = applyRecordMutation(
      latestNote.raw_data,
      directive.action,
      directive.target,
      directive.details,
    );
    const changed = isRecordChanged(mutation);
    notices.push({ level: changed ? 'info' : 'warning', message: mutation.message });

    let record = mutation.record;
    let summaryRegenerated = false;
    if (changed) {
      const regeneration = await regenerateQuickSummary(this.model, record);
      record = regeneration.record;
      summaryRegenerated = regeneration.regenerated;
      notices.push(
        regeneration.warning
          ? { level: 'warning', message: regeneration.warning }
          : { level: 'info', message: 'Quick summary regenerated.' },
      );
    }

    latestNote.raw_data = record;

    const saved = await this.host.savePatient(this.patientId);
    notices.push(
      saved
        ? { level: 'info', message: 'Record saved.' }
        : { level: 'warning', message: 'Local update applied but the record store save failed.' },
    );

    functions.logger.info(`[patientChat] Applied ${directive.action} on ${directive.target}`, {
      patientId: this.patientId,
      outcome: mutation.outcome,
      saved,
    });

    return {
      directive,
      source,
      status: 'applied',
      message: mutation.message,
      outcome: mutation.outcome,
      summaryRegenerated,
      saved,
    };
  }

  private currentRecordContext(): string {
    const patient = this.host.getPatient(this.patientId);
    const latestNote = patient ? getLatestNote(patient) : null;
    return latestNote ? JSON.stringify(latestNote.raw_data, null, 2) : NO_RECORD_CONTEXT;
  }

  private append(role: ChatRole, text: string): ChatMessage {
    const message: ChatMessage = { role, text, createdAt: this.now().toISOString() };
    this.transcript.push(message);
    return { ...message };
  }
}
