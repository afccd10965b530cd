import type { Classifier } from './classifiers/index.js';
import type { ExtractionSession } from './ExtractionSession.js';
import type { ClassificationOutcome, FileReference, RecordContext } from './types.js';

type Settled =
  | { ok: true; outcome: ClassificationOutcome }
  | { ok: false; error: unknown };

function settle(promise: Promise<ClassificationOutcome>): Promise<Settled> {
  return promise.then(
    (outcome): Settled => ({ ok: true, outcome }),
    (error: unknown): Settled => ({ ok: false, error })
  );
}

/**
 * Runs file references through the classifier with at most `concurrency`
 * classifications in flight. Outcomes reach the session in dispatch order.
 * With a concurrency of 1 each reference is classified before the walker
 * reads the next one.
 */
export class ClassificationPipeline {
  private readonly inFlight: Promise<Settled>[] = [];

  constructor(
    private readonly classifier: Classifier,
    private readonly session: ExtractionSession,
    private readonly concurrency: number = 1
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new TypeError('Expected `concurrency` to be an integer from 1 and up');
    }
  }

  async dispatch(context: RecordContext, fileReference: FileReference): Promise<void> {
    this.inFlight.push(settle(this.classifier.classify(context, fileReference)));
    if (this.inFlight.length >= this.concurrency) {
      await this.completeOldest();
    }
  }

  /**
   * Wait for every dispatched classification and record it.
   */
  async flush(): Promise<void> {
    while (this.inFlight.length > 0) {
      await this.completeOldest();
    }
  }

  private async completeOldest(): Promise<void> {
    const oldest = this.inFlight.shift();
    if (!oldest) {
      return;
    }
    const settled = await oldest;
    if (!settled.ok) {
      throw settled.error;
    }
    await this.session.record(settled.outcome);
  }
}
