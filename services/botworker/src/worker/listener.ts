import { performance } from 'node:perf_hooks';
import { config } from '../config';
import { moduleLogger, type Logger } from '../logger';
import type { MessageChannel } from '../contracts/channel';
import { decodeRequest, encodeReply, listenChannelKeys, peekResponseKey, responseErrorFrom } from '../protocol/wire';
import type { WireResponse } from '../types';
import type { CommandDispatcher } from './dispatcher';

export interface ChannelListenerOptions {
  /** Dedicated channel; the blocking pop occupies it between messages. */
  channel: MessageChannel;
  dispatcher: CommandDispatcher;
  keyPrefix?: string;
  /** Participant-code first characters this worker serves. */
  charRange?: string;
  popTimeoutSeconds?: number;
  responseTtlSeconds?: number;
  logger?: Logger;
}

const round = (ms: number) => Math.round(ms * 1000) / 1000;

/**
 * Serial receive loop: pops one request at a time from the shard channels,
 * runs it on the dispatcher and pushes exactly one reply to its response key.
 */
export class ChannelListener {
  readonly listenKeys: readonly string[];
  private readonly channel: MessageChannel;
  private readonly dispatcher: CommandDispatcher;
  private readonly popTimeoutSeconds: number;
  private readonly responseTtlSeconds: number;
  private readonly log: Logger;
  private running = false;
  private loop: Promise<void> | null = null;

  constructor(options: ChannelListenerOptions) {
    this.channel = options.channel;
    this.dispatcher = options.dispatcher;
    this.listenKeys = listenChannelKeys(
      options.keyPrefix ?? config.bots.keyPrefix,
      options.charRange ?? config.bots.charRange,
    );
    this.popTimeoutSeconds = options.popTimeoutSeconds ?? config.timeouts.listenSeconds;
    this.responseTtlSeconds = options.responseTtlSeconds ?? config.bots.responseTtlSeconds;
    this.log = options.logger ?? moduleLogger('listener');
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Runs until `stop()`; rejects only if the channel itself fails. */
  listen(): Promise<void> {
    if (!this.loop) {
      this.running = true;
      this.loop = this.run().finally(() => {
        this.running = false;
        this.loop = null;
      });
    }
    return this.loop;
  }

  /** Ends the loop once the pending pop returns. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.loop) await this.loop;
  }

  /** Waits for one message and handles it; `false` when the pop timed out. */
  async receiveOnce(idleSince = performance.now()): Promise<boolean> {
    const popped = await this.channel.popBlocking(this.listenKeys, this.popTimeoutSeconds);
    if (!popped) return false;

    const busyStart = performance.now();
    this.log.debug({ idleMs: round(busyStart - idleSince) }, 'idle');
    await this.handleMessage(popped.value);
    this.log.debug({ busyMs: round(performance.now() - busyStart), key: popped.key }, 'busy');
    return true;
  }

  async handleMessage(raw: string): Promise<void> {
    let responseKey = peekResponseKey(raw);
    let encoded: string;
    try {
      const decoded = decodeRequest(raw);
      responseKey = decoded.responseKey;
      const reply: WireResponse = await this.dispatcher.execute(decoded.request);
      encoded = encodeReply(reply);
    } catch (err) {
      // a failing command must not take the loop down; the caller gets the detail instead
      this.log.error({ err, responseKey }, 'bot worker command failed');
      encoded = encodeReply(responseErrorFrom(err));
    }

    if (!responseKey) {
      this.log.error({ message: raw.slice(0, 200) }, 'dropping message without response_key');
      return;
    }
    await this.channel.push(responseKey, encoded, { ttlSeconds: this.responseTtlSeconds });
  }

  private async run(): Promise<void> {
    this.log.info({ keys: this.listenKeys.length }, 'bot worker is listening for messages through Redis');
    let idleSince = performance.now();
    while (this.running) {
      if (await this.receiveOnce(idleSince)) idleSince = performance.now();
    }
    this.log.info('bot worker stopped listening');
  }
}
