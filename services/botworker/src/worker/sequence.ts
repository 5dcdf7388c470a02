import type { SubmissionDescriptor } from '../types';

export type SequenceStep = { done: false; value: SubmissionDescriptor } | { done: true };

/**
 * A participant's submissions, advanced one step at a time.
 * Once the source is exhausted (or has thrown) every later `next()` reports
 * `done` without touching the source again.
 */
export class SubmissionSequence {
  private iterator: Iterator<SubmissionDescriptor> | null;
  private steps = 0;

  constructor(source: Iterable<SubmissionDescriptor>) {
    this.iterator = source[Symbol.iterator]();
  }

  get exhausted(): boolean {
    return this.iterator === null;
  }

  /** Number of submissions produced so far. */
  get produced(): number {
    return this.steps;
  }

  next(): SequenceStep {
    if (!this.iterator) return { done: true };

    let result: IteratorResult<SubmissionDescriptor>;
    try {
      result = this.iterator.next();
    } catch (err) {
      this.iterator = null;
      throw err;
    }

    if (result.done) {
      this.iterator = null;
      return { done: true };
    }
    this.steps += 1;
    return { done: false, value: result.value };
  }
}
