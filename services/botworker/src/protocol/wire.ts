import { z } from 'zod';
import { ProtocolError, describeError } from '../errors';
import type { ParticipantCode, ResponseErrorReply, WireResponse, WireSubmission } from '../types';
import { resolveCommand, type CommandName, type CommandRequest } from './commands';

// ---------- Keys ----------

export function shardOf(participantCode: ParticipantCode): string {
  const shard = participantCode.charAt(0);
  if (!shard) throw new ProtocolError('participant code must be non-empty');
  return shard;
}

/** Input channel a participant's requests are pushed to: `<prefix>-<first char>`. */
export function inputChannelKey(prefix: string, participantCode: ParticipantCode): string {
  return `${prefix}-${shardOf(participantCode)}`;
}

export function listenChannelKeys(prefix: string, charRange: string): string[] {
  return [...new Set(charRange)].map((char) => `${prefix}-${char}`);
}

export function responseKeyFor(prefix: string, command: CommandName, participantCode: ParticipantCode): string {
  return `${prefix}-${command}-${participantCode}`;
}

/**
 * Glob matching exactly the input channels of `charRange`. No trailing `*`:
 * response keys share the prefix and must survive a sweep.
 */
export function inputChannelPattern(prefix: string, charRange: string): string {
  const escapedPrefix = prefix.replace(/([*?[\]\\])/g, '\\$1');
  const escapedRange = [...new Set(charRange)].join('').replace(/([\]\\^-])/g, '\\$1');
  return `${escapedPrefix}-[${escapedRange}]`;
}

// ---------- Requests ----------

export interface RequestEnvelope {
  command: CommandName;
  args?: unknown[];
  kwargs?: Record<string, unknown>;
  response_key: string;
}

const requestEnvelopeSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.unknown()).default([]),
  kwargs: z.record(z.unknown()).default({}),
  response_key: z.string().min(1),
});

const responseKeyOnlySchema = z.object({ response_key: z.string().min(1) });

export interface DecodedRequest {
  responseKey: string;
  request: CommandRequest;
}

export function encodeRequest(envelope: RequestEnvelope): string {
  return JSON.stringify({
    command: envelope.command,
    args: envelope.args ?? [],
    kwargs: envelope.kwargs ?? {},
    response_key: envelope.response_key,
  });
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ProtocolError(`message is not valid JSON: ${describeError(err)}`);
  }
}

export function decodeRequest(raw: string): DecodedRequest {
  const parsed = requestEnvelopeSchema.safeParse(parseJson(raw));
  if (!parsed.success) {
    throw new ProtocolError(`malformed request envelope: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  const { command, args, kwargs, response_key } = parsed.data;
  return { responseKey: response_key, request: resolveCommand(command, args, kwargs) };
}

/** Best-effort recovery of the reply address from a message that failed to decode. */
export function peekResponseKey(raw: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = responseKeyOnlySchema.safeParse(parsed);
  return result.success ? result.data.response_key : null;
}

// ---------- Replies ----------

export function responseErrorFrom(err: unknown): ResponseErrorReply {
  const responseError = describeError(err);
  const traceback = err instanceof Error && err.stack ? err.stack : responseError;
  return { response_error: responseError, traceback };
}

export function encodeReply(reply: WireResponse | null | undefined): string {
  return JSON.stringify(reply ?? {});
}

const replyObjectSchema = z.record(z.unknown());
const responseErrorSchema = z.object({ response_error: z.string(), traceback: z.string().default('') });
const requestErrorSchema = z.object({ request_error: z.string() });
const wireSubmissionSchema = z.object({ post_data: z.record(z.unknown()) }).passthrough();

export type WorkerReply =
  | { kind: 'response_error'; error: string; traceback: string }
  | { kind: 'request_error'; error: string }
  | { kind: 'ok'; body: WireResponse };

export function decodeReply(raw: string): WorkerReply {
  const parsed = replyObjectSchema.safeParse(parseJson(raw));
  if (!parsed.success) throw new ProtocolError('reply is not a JSON object');
  const body = parsed.data;

  if ('response_error' in body) {
    const failure = responseErrorSchema.safeParse(body);
    if (!failure.success) throw new ProtocolError('malformed response_error reply');
    return { kind: 'response_error', error: failure.data.response_error, traceback: failure.data.traceback };
  }
  if ('request_error' in body) {
    const failure = requestErrorSchema.safeParse(body);
    if (!failure.success) throw new ProtocolError('malformed request_error reply');
    return { kind: 'request_error', error: failure.data.request_error };
  }
  return { kind: 'ok', body };
}

/**
 * Turns a descriptor yielded by bot logic into the JSON-safe submission that is
 * stored and sent: `page_class` removed, `post_data` required, values limited
 * to what survives JSON encoding.
 */
export function toWireSubmission(descriptor: unknown): WireSubmission {
  const parsed = wireSubmissionSchema.safeParse(descriptor);
  if (!parsed.success) {
    throw new ProtocolError(`bot submission is invalid: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  const { page_class: _pageClass, ...wire } = parsed.data;

  let encoded: string;
  try {
    encoded = JSON.stringify(wire);
  } catch (err) {
    throw new ProtocolError(`bot submission cannot be encoded: ${describeError(err)}`);
  }
  return wireSubmissionSchema.parse(JSON.parse(encoded));
}

export type SubmissionReply = { done: false; submission: z.infer<typeof wireSubmissionSchema> } | { done: true };

/** Reads a consume_next_submit body: a submission, or the empty placeholder. */
export function readSubmission(body: WireResponse): SubmissionReply {
  if (Object.keys(body).length === 0) return { done: true };
  const parsed = wireSubmissionSchema.safeParse(body);
  if (!parsed.success) throw new ProtocolError('submission reply is missing post_data');
  return { done: false, submission: parsed.data };
}
