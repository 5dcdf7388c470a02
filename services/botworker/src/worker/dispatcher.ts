import { config } from '../config';
import { PreparedSubmitMissingError } from '../errors';
import { moduleLogger, type Logger } from '../logger';
import type { BotLogic, PageState, Participant, ParticipantStore } from '../contracts/collaborators';
import type { CommandRequest } from '../protocol/commands';
import { toWireSubmission } from '../protocol/wire';
import type { Ack, ParticipantCode, PrepareNextSubmitResult, PreparedSubmit, WireResponse } from '../types';
import { Mutex } from './lock';
import { SubmissionSequence } from './sequence';

export interface BotSession {
  participant: Participant;
  page: PageState;
  submits: SubmissionSequence;
}

export interface DispatcherOptions {
  participants: ParticipantStore;
  botLogic: BotLogic;
  /** Maximum sessions held in memory; the least recently used is evicted past it. */
  sessionLimit?: number;
  logger?: Logger;
}

export interface DispatcherStats {
  sessions: number;
  preparedSubmits: number;
}

/**
 * Owns every bot session and prepared submission of this worker process.
 * All state changes go through the commands below.
 */
export class CommandDispatcher {
  private readonly participants: ParticipantStore;
  private readonly botLogic: BotLogic;
  private readonly sessionLimit: number;
  private readonly log: Logger;

  // Map iteration order doubles as LRU order (oldest first)
  private readonly sessions = new Map<ParticipantCode, BotSession>();
  private readonly preparedSubmits = new Map<ParticipantCode, PreparedSubmit>();
  // one lock for the whole cache, not per participant
  private readonly prepareLock = new Mutex();

  constructor(options: DispatcherOptions) {
    this.participants = options.participants;
    this.botLogic = options.botLogic;
    const limit = options.sessionLimit ?? config.bots.sessionLimit;
    this.sessionLimit = Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : config.bots.sessionLimit;
    this.log = options.logger ?? moduleLogger('dispatcher');
  }

  async execute(request: CommandRequest): Promise<WireResponse> {
    switch (request.command) {
      case 'ping':
        return this.ping();
      case 'initialize_participant':
        return this.initializeParticipant(request.params.participant_code);
      case 'prepare_next_submit': {
        const { participant_code, path, html } = request.params;
        return this.prepareNextSubmit(participant_code, path, html);
      }
      case 'consume_next_submit':
        return this.consumeNextSubmit(request.params.participant_code);
      case 'clear_all':
        return this.clearAll();
    }
  }

  ping(): Ack {
    return { ok: true };
  }

  async initializeParticipant(participantCode: ParticipantCode): Promise<Ack> {
    const participant = await this.participants.getByCode(participantCode);
    const page: PageState = { path: null, html: null };
    const submits = new SubmissionSequence(this.botLogic.createSubmits(participant, page));

    this.sessions.delete(participant.code);
    this.sessions.set(participant.code, { participant, page, submits });
    // a fresh session starts with nothing prepared
    this.preparedSubmits.delete(participant.code);
    this.prune();

    this.log.debug({ participant: participant.code }, 'participant initialized');
    return { ok: true };
  }

  async prepareNextSubmit(participantCode: ParticipantCode, path: string, html: string): Promise<PrepareNextSubmitResult> {
    const session = this.sessions.get(participantCode);
    if (!session) {
      return {
        request_error:
          `Participant ${participantCode} not loaded in bot worker. ` +
          `The bot worker keeps only the ${this.sessionLimit} most recently used sessions and discards older ones, ` +
          'or it may have been restarted after the session was created. ' +
          'Create a new session and run the bots again.',
      };
    }

    this.touch(participantCode, session);
    // bot logic asserts against the page it is being asked about
    session.page.path = path;
    session.page.html = html;

    return this.prepareLock.use((): PreparedSubmit => {
      if (this.preparedSubmits.has(participantCode)) {
        // duplicate request; the first one already advanced the sequence
        return {};
      }

      const step = session.submits.next();
      // empty placeholder tells the caller "no more submits" rather than looking like a timeout
      const submission: PreparedSubmit = step.done ? {} : toWireSubmission(step.value);
      this.preparedSubmits.set(participantCode, submission);
      return submission;
    });
  }

  consumeNextSubmit(participantCode: ParticipantCode): PreparedSubmit {
    const submission = this.preparedSubmits.get(participantCode);
    if (!submission) throw new PreparedSubmitMissingError(participantCode);
    this.preparedSubmits.delete(participantCode);
    return submission;
  }

  clearAll(): Ack {
    this.sessions.clear();
    this.preparedSubmits.clear();
    this.log.info('cleared all bot sessions');
    return { ok: true };
  }

  hasSession(participantCode: ParticipantCode): boolean {
    return this.sessions.has(participantCode);
  }

  hasPreparedSubmit(participantCode: ParticipantCode): boolean {
    return this.preparedSubmits.has(participantCode);
  }

  stats(): DispatcherStats {
    return { sessions: this.sessions.size, preparedSubmits: this.preparedSubmits.size };
  }

  private touch(participantCode: ParticipantCode, session: BotSession): void {
    this.sessions.delete(participantCode);
    this.sessions.set(participantCode, session);
  }

  private prune(): void {
    for (const code of this.sessions.keys()) {
      if (this.sessions.size <= this.sessionLimit) return;
      this.sessions.delete(code);
      this.preparedSubmits.delete(code);
      this.log.info({ participant: code }, 'evicted least recently used bot session');
    }
  }
}
