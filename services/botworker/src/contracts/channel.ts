export interface PoppedMessage {
  key: string;
  value: string;
}

export interface PushOptions {
  /** Expire the list this many seconds after the push. */
  ttlSeconds?: number;
}

/**
 * Durable FIFO queues addressed by string keys.
 * `popBlocking` holds the underlying connection until it returns, so a blocking
 * consumer should own its channel rather than share it with other callers.
 */
export interface MessageChannel {
  push(key: string, value: string, options?: PushOptions): Promise<void>;
  /** Pops the head of the first non-empty key, or resolves `null` after `timeoutSeconds`. */
  popBlocking(keys: readonly string[], timeoutSeconds: number): Promise<PoppedMessage | null>;
  /** Deletes every key matching a glob pattern; returns how many were removed. */
  deleteMatching(pattern: string): Promise<number>;
  ping(): Promise<void>;
}

/** One-way notification to everyone listening on a group. */
export interface CompletionBroadcaster {
  broadcast(group: string, message: string): Promise<void>;
}
