import { randomUUID } from 'crypto';
import * as functions from 'firebase-functions';
import type { ClinicalSession } from './clinicalSession';

export type ClinicalSessionFactory = (sessionId: string) => Promise<ClinicalSession>;

/**
 * Live sessions of this process, keyed by session id.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, ClinicalSession>();

  constructor(
    private readonly createSession: ClinicalSessionFactory,
    private readonly generateId: () => string = randomUUID,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  async start(): Promise<ClinicalSession> {
    const session = await this.createSession(this.generateId());
    this.sessions.set(session.id, session);
    functions.logger.info(`[sessions] Started session ${session.id}`);
    return session;
  }

  get(sessionId: string): ClinicalSession | undefined {
    return this.sessions.get(sessionId);
  }

  end(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }

    session.close();
    this.sessions.delete(sessionId);
    functions.logger.info(`[sessions] Ended session ${sessionId}`);
    return true;
  }
}
