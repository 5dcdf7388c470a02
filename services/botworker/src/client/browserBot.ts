import { config, type BotTimeouts } from '../config';
import type { CompletionBroadcaster, MessageChannel } from '../contracts/channel';
import { BotRequestError } from '../errors';
import { readSubmission } from '../protocol/wire';
import type { ParticipantCode, PostData, SessionCode } from '../types';
import { callBotWorker, initializeBot, type CallReply } from './rpc';

/** What the current request handler knows about the simulated browser. */
export interface BotRequestContext {
  participantCode: ParticipantCode;
  sessionCode: SessionCode;
  /** Path of the page being served. */
  path: string;
}

export interface EphemeralBrowserBotOptions {
  channel: MessageChannel;
  broadcaster: CompletionBroadcaster;
  keyPrefix?: string;
  timeouts?: Partial<BotTimeouts>;
}

export type NextPostData = { done: false; postData: PostData } | { done: true };

/**
 * Request-scoped stand-in for a browser bot. Holds no state between requests;
 * every call is a round trip to the bot worker.
 */
export class EphemeralBrowserBot {
  readonly participantCode: ParticipantCode;
  readonly sessionCode: SessionCode;
  readonly path: string;
  private readonly channel: MessageChannel;
  private readonly broadcaster: CompletionBroadcaster;
  private readonly keyPrefix: string;
  private readonly timeouts: BotTimeouts;

  constructor(context: BotRequestContext, options: EphemeralBrowserBotOptions) {
    this.participantCode = context.participantCode;
    this.sessionCode = context.sessionCode;
    this.path = context.path;
    this.channel = options.channel;
    this.broadcaster = options.broadcaster;
    this.keyPrefix = options.keyPrefix ?? config.bots.keyPrefix;
    this.timeouts = { ...config.timeouts, ...options.timeouts };
  }

  async initialize(): Promise<void> {
    await initializeBot(this.channel, this.participantCode, {
      keyPrefix: this.keyPrefix,
      timeoutSeconds: this.timeouts.initializeSeconds,
      pingTimeoutSeconds: this.timeouts.pingSeconds,
    });
  }

  /** Asks the worker to compute the submission for the page being rendered. */
  async prepareNextSubmit(html: string): Promise<void> {
    const reply = await this.call(
      'prepare_next_submit',
      { participant_code: this.participantCode, path: this.path, html },
      this.timeouts.prepareSeconds,
    );
    if (reply.kind === 'request_error') throw new BotRequestError(reply.error);
  }

  /** Takes the prepared submission; `done` once the bot has nothing left to submit. */
  async getNextPostData(): Promise<NextPostData> {
    const reply = await this.call(
      'consume_next_submit',
      { participant_code: this.participantCode },
      this.timeouts.consumeSeconds,
    );
    if (reply.kind === 'request_error') throw new BotRequestError(reply.error);

    const next = readSubmission(reply.body);
    if (next.done) return { done: true };
    return { done: false, postData: next.submission.post_data };
  }

  async sendCompletionMessage(): Promise<void> {
    await this.broadcaster.broadcast(
      `${config.bots.completionGroupPrefix}-${this.sessionCode}`,
      JSON.stringify({ text: this.participantCode }),
    );
  }

  private call(
    command: 'prepare_next_submit' | 'consume_next_submit',
    kwargs: Record<string, unknown>,
    timeoutSeconds: number,
  ): Promise<CallReply> {
    return callBotWorker(this.channel, this.participantCode, command, kwargs, {
      keyPrefix: this.keyPrefix,
      timeoutSeconds,
      pingTimeoutSeconds: this.timeouts.pingSeconds,
    });
  }
}
