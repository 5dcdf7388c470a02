import { AssertionError } from 'node:assert';
import type { ParticipantCode } from './types';

export class BotWorkerError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'BotWorkerError';
    this.code = code;
  }
}

// ---------- worker side ----------

export class ParticipantNotFoundError extends BotWorkerError {
  constructor(participantCode: ParticipantCode) {
    super(`Participant ${participantCode} does not exist`, 'participant_not_found');
    this.name = 'ParticipantNotFoundError';
  }
}

/** consume_next_submit was called without a prepared submission for the participant. */
export class PreparedSubmitMissingError extends BotWorkerError {
  constructor(participantCode: ParticipantCode) {
    super(`No prepared submit for participant ${participantCode}`, 'prepared_submit_missing');
    this.name = 'PreparedSubmitMissingError';
  }
}

export class UnknownCommandError extends BotWorkerError {
  constructor(command: string) {
    super(`Unknown bot worker command: ${command}`, 'unknown_command');
    this.name = 'UnknownCommandError';
  }
}

export class CommandArgumentError extends BotWorkerError {
  constructor(message: string) {
    super(message, 'bad_arguments');
    this.name = 'CommandArgumentError';
  }
}

export class ProtocolError extends BotWorkerError {
  constructor(message: string) {
    super(message, 'protocol_error');
    this.name = 'ProtocolError';
  }
}

// ---------- client side ----------

export class BotWorkerUnreachableError extends BotWorkerError {
  constructor() {
    super(
      'Ping to the bot worker failed. ' +
        'Browser bots need a running bot worker listening on the same Redis. ' +
        'Start the bot worker, or set "use_browser_bots": false in the session config.',
      'worker_unreachable',
    );
    this.name = 'BotWorkerUnreachableError';
  }
}

export class BotWorkerUnresponsiveError extends BotWorkerError {
  readonly command: string;

  constructor(command: string, timeoutSeconds: number) {
    super(
      `Bot worker is running but did not answer ${command} within ${timeoutSeconds}s.`,
      'worker_unresponsive',
    );
    this.name = 'BotWorkerUnresponsiveError';
    this.command = command;
  }
}

/** The worker raised while executing a command; `traceback` is the worker's stack. */
export class BotResponseError extends BotWorkerError {
  readonly command: string;
  readonly responseError: string;
  readonly traceback: string;

  constructor(command: string, responseError: string, traceback: string) {
    super(`Bot worker failed while handling ${command}: ${responseError}\n${traceback}`, 'worker_failed');
    this.name = 'BotResponseError';
    this.command = command;
    this.responseError = responseError;
    this.traceback = traceback;
  }
}

/** The worker understood the request but its state rejects it (e.g. participant not loaded). */
export class BotRequestError extends AssertionError {
  constructor(message: string) {
    super({ message });
    this.name = 'BotRequestError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
