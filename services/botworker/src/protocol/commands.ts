import { z } from 'zod';
import { CommandArgumentError, UnknownCommandError } from '../errors';

export const COMMAND_NAMES = [
  'ping',
  'initialize_participant',
  'prepare_next_submit',
  'consume_next_submit',
  'clear_all',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

// Positional order for `args`; keyword names for `kwargs`
const COMMAND_PARAMETERS: Record<CommandName, readonly string[]> = {
  ping: [],
  initialize_participant: ['participant_code'],
  prepare_next_submit: ['participant_code', 'path', 'html'],
  consume_next_submit: ['participant_code'],
  clear_all: [],
};

// ping is a liveness probe and accepts whatever it is sent
const VARIADIC_COMMANDS: ReadonlySet<CommandName> = new Set<CommandName>(['ping']);

const participantCode = z.string().min(1, 'participant_code required');

const paramSchemas = {
  ping: z.object({}).passthrough(),
  initialize_participant: z.object({ participant_code: participantCode }),
  prepare_next_submit: z.object({
    participant_code: participantCode,
    path: z.string(),
    html: z.string(),
  }),
  consume_next_submit: z.object({ participant_code: participantCode }),
  clear_all: z.object({}),
} satisfies Record<CommandName, z.ZodTypeAny>;

export type CommandParams<K extends CommandName> = z.infer<(typeof paramSchemas)[K]>;

export type CommandRequest = {
  [K in CommandName]: { command: K; params: CommandParams<K> };
}[CommandName];

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((known) => known === name);
}

/**
 * Binds positional and keyword arguments to the command's parameter list,
 * the way a call site would: surplus positionals, unknown keywords, duplicate
 * values and missing parameters all fail.
 */
export function bindArguments(
  command: CommandName,
  args: readonly unknown[],
  kwargs: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  if (VARIADIC_COMMANDS.has(command)) return {};

  const names = COMMAND_PARAMETERS[command];
  if (args.length > names.length) {
    throw new CommandArgumentError(
      `${command}() takes ${names.length} positional argument(s) but ${args.length} were given`,
    );
  }

  const bound: Record<string, unknown> = {};
  args.forEach((value, idx) => {
    bound[names[idx]] = value;
  });

  for (const [name, value] of Object.entries(kwargs)) {
    if (!names.includes(name)) {
      throw new CommandArgumentError(`${command}() got an unexpected keyword argument '${name}'`);
    }
    if (name in bound) {
      throw new CommandArgumentError(`${command}() got multiple values for argument '${name}'`);
    }
    bound[name] = value;
  }

  const missing = names.filter((name) => !(name in bound));
  if (missing.length > 0) {
    throw new CommandArgumentError(`${command}() missing required argument(s): ${missing.join(', ')}`);
  }
  return bound;
}

function parseParams<S extends z.ZodTypeAny>(command: CommandName, schema: S, bound: unknown): z.infer<S> {
  const parsed = schema.safeParse(bound);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CommandArgumentError(`${command}() invalid arguments: ${detail.join('; ')}`);
  }
  return parsed.data;
}

export function resolveCommand(
  name: string,
  args: readonly unknown[] = [],
  kwargs: Readonly<Record<string, unknown>> = {},
): CommandRequest {
  if (!isCommandName(name)) throw new UnknownCommandError(name);
  const bound = bindArguments(name, args, kwargs);

  switch (name) {
    case 'ping':
      return { command: name, params: parseParams(name, paramSchemas.ping, bound) };
    case 'initialize_participant':
      return { command: name, params: parseParams(name, paramSchemas.initialize_participant, bound) };
    case 'prepare_next_submit':
      return { command: name, params: parseParams(name, paramSchemas.prepare_next_submit, bound) };
    case 'consume_next_submit':
      return { command: name, params: parseParams(name, paramSchemas.consume_next_submit, bound) };
    case 'clear_all':
      return { command: name, params: parseParams(name, paramSchemas.clear_all, bound) };
  }
}
