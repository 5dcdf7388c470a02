import { config } from '../config';
import type { MessageChannel } from '../contracts/channel';
import { inputChannelPattern } from '../protocol/wire';

export interface FlushOptions {
  keyPrefix?: string;
  charRange?: string;
}

/**
 * Deletes the pending requests of every input channel in `charRange`.
 * Response keys are left alone; they expire by themselves.
 */
export async function flushBotChannels(channel: MessageChannel, options: FlushOptions = {}): Promise<number> {
  const charRange = options.charRange || config.bots.charRange;
  return channel.deleteMatching(inputChannelPattern(options.keyPrefix ?? config.bots.keyPrefix, charRange));
}
