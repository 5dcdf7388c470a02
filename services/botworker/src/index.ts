/**
 * Browser bot worker.
 *
 * Worker side: `startBotWorker` / `runBotWorker` host a `CommandDispatcher`
 * behind a `ChannelListener` on Redis. Request side: `EphemeralBrowserBot`
 * and the round-trip helpers talk to it over the same Redis.
 */
export { config, SESSION_CODE_CHARSET } from './config';
export type { BotTimeouts } from './config';
export { logger } from './logger';
export * from './errors';
export type * from './types';
export type { MessageChannel, CompletionBroadcaster, PoppedMessage, PushOptions } from './contracts/channel';
export type { BotLogic, PageState, Participant, ParticipantStore } from './contracts/collaborators';
export { COMMAND_NAMES, resolveCommand } from './protocol/commands';
export type { CommandName, CommandRequest } from './protocol/commands';
export { inputChannelKey, responseKeyFor, listenChannelKeys, inputChannelPattern } from './protocol/wire';
export { SubmissionSequence } from './worker/sequence';
export { CommandDispatcher } from './worker/dispatcher';
export type { DispatcherOptions, DispatcherStats, BotSession } from './worker/dispatcher';
export { ChannelListener } from './worker/listener';
export type { ChannelListenerOptions } from './worker/listener';
export { startBotWorker, runBotWorker } from './worker/run';
export type { BotWorkerOptions, BotWorkerHandle } from './worker/run';
export { getRedis, createRedisConnection, closeRedis } from './redis/client';
export { RedisMessageChannel, createRedisChannel } from './redis/channel';
export { RedisCompletionBroadcaster } from './redis/broadcast';
export { pingBotWorker, callBotWorker, initializeBot, clearBotWorker } from './client/rpc';
export type { CallOptions } from './client/rpc';
export { flushBotChannels } from './client/admin';
export { EphemeralBrowserBot } from './client/browserBot';
export type { BotRequestContext, EphemeralBrowserBotOptions, NextPostData } from './client/browserBot';
export { buildApp } from './server';
