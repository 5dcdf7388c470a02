import { describe, expect, it } from 'vitest';
import { Mutex } from '../src/worker/lock';
import { SubmissionSequence } from '../src/worker/sequence';

describe('SubmissionSequence', () => {
  it('yields submissions in order, then stays exhausted', () => {
    const seq = new SubmissionSequence([{ post_data: { a: 1 } }, { post_data: { a: 2 } }]);

    expect(seq.next()).toEqual({ done: false, value: { post_data: { a: 1 } } });
    expect(seq.next()).toEqual({ done: false, value: { post_data: { a: 2 } } });
    expect(seq.next()).toEqual({ done: true });
    expect(seq.next()).toEqual({ done: true });
    expect(seq.exhausted).toBe(true);
    expect(seq.produced).toBe(2);
  });

  it('does not pull from the source after exhaustion', () => {
    let pulls = 0;
    const source = {
      [Symbol.iterator]: () => ({
        next: () => {
          pulls += 1;
          return { done: true as const, value: undefined };
        },
      }),
    };
    const seq = new SubmissionSequence(source);
    seq.next();
    seq.next();
    seq.next();
    expect(pulls).toBe(1);
  });

  it('propagates a failure from the bot logic once, then reports exhaustion', () => {
    const seq = new SubmissionSequence(
      (function* () {
        yield { post_data: {} };
        throw new Error('expected page /p/2');
      })(),
    );

    expect(seq.next().done).toBe(false);
    expect(() => seq.next()).toThrow('expected page /p/2');
    expect(seq.next()).toEqual({ done: true });
  });
});

describe('Mutex', () => {
  it('runs tasks one at a time in arrival order', async () => {
    const lock = new Mutex();
    const events: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.use(async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 1;
    });
    const second = lock.use(() => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    expect(lock.isLocked).toBe(true);

    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.isLocked).toBe(false);
  });

  it('releases the lock when a task throws', async () => {
    const lock = new Mutex();
    await expect(
      lock.use(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(lock.use(() => 'next')).resolves.toBe('next');
  });
});
