import type { CompletionBroadcaster } from '../../src/contracts/channel';
import type { BotLogic, PageState, Participant, ParticipantStore } from '../../src/contracts/collaborators';
import { ParticipantNotFoundError } from '../../src/errors';
import type { SubmissionDescriptor } from '../../src/types';

export function participantStore(codes: string[], sessionCode = 'sess1'): ParticipantStore {
  return {
    getByCode: async (code) => {
      if (!codes.includes(code)) throw new ParticipantNotFoundError(code);
      return { code, sessionCode };
    },
  };
}

/** Bot logic that replays a fixed list of submissions per participant. */
export class ScriptedBotLogic implements BotLogic {
  /** How many submissions each participant's sequence has produced. */
  readonly advances = new Map<string, number>();
  /** Page path observed at each advance. */
  readonly seenPaths: Array<string | null> = [];

  constructor(private readonly scripts: Record<string, SubmissionDescriptor[]>) {}

  createSubmits(participant: Participant, page: Readonly<PageState>): Iterable<SubmissionDescriptor> {
    const script = this.scripts[participant.code] ?? [];
    const advances = this.advances;
    const seenPaths = this.seenPaths;
    return (function* () {
      for (const submission of script) {
        advances.set(participant.code, (advances.get(participant.code) ?? 0) + 1);
        seenPaths.push(page.path);
        // hand out a copy so callers cannot mutate the script
        yield { ...submission };
      }
    })();
  }
}

export class RecordingBroadcaster implements CompletionBroadcaster {
  readonly sent: Array<{ group: string; message: string }> = [];

  async broadcast(group: string, message: string): Promise<void> {
    this.sent.push({ group, message });
  }
}
