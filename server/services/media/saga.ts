/**
 * Media pipeline — Saga & outcome tally
 *
 * A saga runs named steps in order. A step may register a compensating
 * action; when a later step fails, registered compensations run newest-first
 * and the original failure is rethrown as an {@link IngestError}. A failing
 * compensation is logged and counted on the error's `compensationFailures`
 * but never masks the original error.
 */

import type { Logger } from "../../logger";
import { describeError, IngestError } from "./errors";

type Compensation = () => Promise<unknown>;

export interface SagaStepResult<T> {
  value: T;
  /** Undo for this step; omit when the step has nothing to undo. */
  compensate?: Compensation;
}

export class Saga {
  private readonly compensations: Array<{ step: string; run: Compensation }> = [];

  constructor(
    private readonly name: string,
    private readonly logger: Logger,
    /** Event id reported on failure; set once the id is known. */
    public eventId = 0
  ) {}

  async step<T>(step: string, action: () => Promise<SagaStepResult<T>>): Promise<T> {
    let result: SagaStepResult<T>;
    try {
      result = await action();
    } catch (err) {
      this.logger.warn(`[Saga] ${this.name} failed at ${step}`, { eventId: this.eventId, error: describeError(err) });
      const failures = await this.rollback();
      const error =
        err instanceof IngestError
          ? err
          : new IngestError(this.eventId, step, `${this.name} failed at ${step}: ${describeError(err)}`, {
              cause: err,
            });
      error.compensationFailures += failures;
      throw error;
    }
    if (result.compensate) this.compensations.push({ step, run: result.compensate });
    this.logger.debug(`[Saga] ${this.name} completed ${step}`, { eventId: this.eventId });
    return result.value;
  }

  /** Returns the number of compensations that failed. */
  private async rollback(): Promise<number> {
    let failures = 0;
    while (this.compensations.length > 0) {
      const entry = this.compensations.pop();
      if (!entry) break;
      try {
        await entry.run();
        this.logger.info(`[Saga] ${this.name} compensated ${entry.step}`, { eventId: this.eventId });
      } catch (err) {
        failures++;
        this.logger.error(`[Saga] ${this.name} compensation for ${entry.step} failed`, {
          eventId: this.eventId,
          error: describeError(err),
        });
      }
    }
    return failures;
  }
}

export interface TallyFailure {
  target: string;
  error: string;
}

/** Success/failure counter for loops that keep going past individual failures. */
export class OutcomeTally {
  succeeded = 0;
  readonly failures: TallyFailure[] = [];

  get failed(): number {
    return this.failures.length;
  }

  success(count = 1): void {
    this.succeeded += count;
  }

  failure(target: string, err: unknown): void {
    this.failures.push({ target, error: describeError(err) });
  }
}
