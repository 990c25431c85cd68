/**
 * Run-scoped transaction recording.
 *
 * The first entry of a run is written together with its `@run-begin`
 * marker, so a run that records nothing leaves the log untouched.
 */

import { EngineError, invalidFieldError } from '../domain/errors';
import {
  MARKER_COMMAND,
  TransactionLog,
  TransactionRecorder,
  runBeginAction,
  parseMarker,
  validateRecordFields,
} from '../domain/transaction';
import { Logger, logger as rootLogger } from '../logger';
import { Mutex } from '../storage/mutex';

export class RunTransactionRecorder implements TransactionRecorder {
  private readonly mutex = new Mutex();
  private begun = false;
  private count = 0;
  private readonly log: Logger;

  constructor(
    private readonly transactions: TransactionLog,
    readonly runId: string,
    private readonly dryRun = false,
    logger?: Logger,
  ) {
    this.log = (logger ?? rootLogger).child({ component: 'run-recorder', runId });
  }

  get recorded(): number {
    return this.count;
  }

  /** Whether this run has written anything to the log. */
  get hasBegun(): boolean {
    return this.begun;
  }

  async record(action: string, rollbackCommand: string): Promise<void> {
    const invalid = validateRecordFields(action, rollbackCommand);
    if (invalid) throw new EngineError(invalid);
    if (parseMarker({ action })) {
      throw new EngineError(invalidFieldError('action', 'is reserved for log markers'));
    }

    if (this.dryRun) {
      this.log.info('Dry run: transaction not recorded', { action, rollbackCommand });
      return;
    }

    if (this.begun) {
      await this.transactions.record(action, rollbackCommand);
    } else {
      await this.mutex.runExclusive(async () => {
        if (this.begun) {
          await this.transactions.record(action, rollbackCommand);
          return;
        }
        await this.transactions.recordBatch([
          { action: runBeginAction(this.runId), rollbackCommand: MARKER_COMMAND },
          { action, rollbackCommand },
        ]);
        this.begun = true;
      });
    }
    this.count += 1;
  }

  /** A handle that also counts the entries of one module. */
  forModule(): TransactionRecorder {
    let moduleCount = 0;
    return {
      record: async (action: string, rollbackCommand: string) => {
        await this.record(action, rollbackCommand);
        if (!this.dryRun) moduleCount += 1;
      },
      get recorded() {
        return moduleCount;
      },
    };
  }
}
