import { config } from '../config';
import type { MessageChannel } from '../contracts/channel';
import {
  BotResponseError,
  BotWorkerUnreachableError,
  BotWorkerUnresponsiveError,
} from '../errors';
import type { CommandName } from '../protocol/commands';
import { decodeReply, encodeRequest, inputChannelKey, responseKeyFor, type WorkerReply } from '../protocol/wire';
import type { ParticipantCode } from '../types';

export interface CallOptions {
  keyPrefix?: string;
  /** Seconds to wait for the reply. */
  timeoutSeconds?: number;
  /** Seconds the liveness probe waits after a timeout. */
  pingTimeoutSeconds?: number;
}

export type CallReply = Exclude<WorkerReply, { kind: 'response_error' }>;

async function sendAndWait(
  channel: MessageChannel,
  participantCode: ParticipantCode,
  command: CommandName,
  kwargs: Record<string, unknown>,
  keyPrefix: string,
  timeoutSeconds: number,
): Promise<WorkerReply | null> {
  const responseKey = responseKeyFor(keyPrefix, command, participantCode);
  await channel.push(
    inputChannelKey(keyPrefix, participantCode),
    encodeRequest({ command, kwargs, response_key: responseKey }),
  );
  const popped = await channel.popBlocking([responseKey], timeoutSeconds);
  return popped ? decodeReply(popped.value) : null;
}

/** Liveness probe; throws `BotWorkerUnreachableError` when nothing answers. */
export async function pingBotWorker(
  channel: MessageChannel,
  participantCode: ParticipantCode,
  options: Pick<CallOptions, 'keyPrefix' | 'timeoutSeconds'> = {},
): Promise<void> {
  const reply = await sendAndWait(
    channel,
    participantCode,
    'ping',
    {},
    options.keyPrefix ?? config.bots.keyPrefix,
    options.timeoutSeconds ?? config.timeouts.pingSeconds,
  );
  if (!reply) throw new BotWorkerUnreachableError();
}

/**
 * One request/response round trip to the worker serving `participantCode`.
 * A timeout is followed by a ping so an unreachable worker and a stalled call
 * surface as different errors. Worker-side failures are rethrown here with the
 * worker's traceback attached.
 */
export async function callBotWorker(
  channel: MessageChannel,
  participantCode: ParticipantCode,
  command: CommandName,
  kwargs: Record<string, unknown>,
  options: CallOptions = {},
): Promise<CallReply> {
  const keyPrefix = options.keyPrefix ?? config.bots.keyPrefix;
  const timeoutSeconds = options.timeoutSeconds ?? config.timeouts.prepareSeconds;

  const reply = await sendAndWait(channel, participantCode, command, kwargs, keyPrefix, timeoutSeconds);
  if (!reply) {
    await pingBotWorker(channel, participantCode, { keyPrefix, timeoutSeconds: options.pingTimeoutSeconds });
    throw new BotWorkerUnresponsiveError(command, timeoutSeconds);
  }
  if (reply.kind === 'response_error') {
    throw new BotResponseError(command, reply.error, reply.traceback);
  }
  return reply;
}

/** Loads the participant's bot session into the worker. */
export async function initializeBot(
  channel: MessageChannel,
  participantCode: ParticipantCode,
  options: CallOptions = {},
): Promise<void> {
  await pingBotWorker(channel, participantCode, {
    keyPrefix: options.keyPrefix,
    timeoutSeconds: options.pingTimeoutSeconds,
  });
  await callBotWorker(channel, participantCode, 'initialize_participant', { participant_code: participantCode }, {
    ...options,
    timeoutSeconds: options.timeoutSeconds ?? config.timeouts.initializeSeconds,
  });
}

/** Drops every session and prepared submit held by the worker serving `participantCode`'s shard. */
export async function clearBotWorker(
  channel: MessageChannel,
  participantCode: ParticipantCode,
  options: CallOptions = {},
): Promise<void> {
  await callBotWorker(channel, participantCode, 'clear_all', {}, {
    ...options,
    timeoutSeconds: options.timeoutSeconds ?? config.timeouts.initializeSeconds,
  });
}
