import type { ParticipantCode, SessionCode, SubmissionDescriptor } from '../types';

export interface Participant {
  code: ParticipantCode;
  sessionCode: SessionCode;
  [field: string]: unknown;
}

/** Record store for participants; `getByCode` rejects with `ParticipantNotFoundError` when absent. */
export interface ParticipantStore {
  getByCode(code: ParticipantCode): Promise<Participant>;
}

/**
 * Page the simulated browser is currently on. The worker mutates this object on
 * every prepare, so bot logic reading it lazily always sees the latest page.
 */
export interface PageState {
  path: string | null;
  html: string | null;
}

export interface BotLogic {
  /** Lazily yields the participant's submissions in page order. */
  createSubmits(participant: Participant, page: Readonly<PageState>): Iterable<SubmissionDescriptor>;
}
