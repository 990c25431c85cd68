/**
 * File-backed transaction log.
 *
 * Every append goes through a single mutex and is issued as one
 * `appendFile` call, so concurrent recorders never interleave partial
 * lines. Reads re-read the file each time; nothing is cached except the
 * line count used to number new entries.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { EngineError, describeThrown, storageError } from '../domain/errors';
import {
  LogValidationResult,
  TransactionEntry,
  TransactionLog,
  formatEntryLine,
  parseEntryLine,
  validateRecordFields,
} from '../domain/transaction';
import { Logger, logger as rootLogger } from '../logger';
import { isNotFound } from './fs-errors';
import { Mutex } from './mutex';

const DIR_MODE = 0o750;
const FILE_MODE = 0o640;

export interface FileTransactionLogOptions {
  file: string;
  now?: () => Date;
  logger?: Logger;
}

/** Split log text into lines, dropping the trailing newline. */
export function splitLogLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Scan raw lines for the expected three-field shape. */
export function validateLogLines(lines: string[]): LogValidationResult {
  let firstMalformedLine: number | undefined;
  let malformedLines = 0;
  lines.forEach((text, index) => {
    if (parseEntryLine(text, index + 1) === null) {
      malformedLines += 1;
      if (firstMalformedLine === undefined) firstMalformedLine = index + 1;
    }
  });
  return {
    valid: malformedLines === 0,
    entries: lines.length,
    firstMalformedLine,
    malformedLines,
  };
}

export class FileTransactionLog implements TransactionLog {
  private readonly file: string;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly mutex = new Mutex();
  private lineCount: number | undefined;

  constructor(options: FileTransactionLogOptions) {
    this.file = options.file;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ component: 'transaction-log' });
  }

  get path(): string {
    return this.file;
  }

  async init(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.file), { recursive: true, mode: DIR_MODE });
      const handle = await fs.open(this.file, 'a', FILE_MODE);
      await handle.close();
      await fs.chmod(this.file, FILE_MODE);
    } catch (err) {
      throw new EngineError(storageError('TRANSACTION_INIT', `Cannot prepare transaction log ${this.file}: ${describeThrown(err)}`, { file: this.file }));
    }
    this.log.debug('Transaction log initialized', { file: this.file });
  }

  async record(action: string, rollbackCommand: string): Promise<TransactionEntry> {
    const [entry] = await this.recordBatch([{ action, rollbackCommand }]);
    return entry;
  }

  async recordBatch(items: Array<{ action: string; rollbackCommand: string }>): Promise<TransactionEntry[]> {
    for (const item of items) {
      const invalid = validateRecordFields(item.action, item.rollbackCommand);
      if (invalid) throw new EngineError(invalid);
    }
    if (items.length === 0) return [];

    return this.mutex.runExclusive(async () => {
      const startLine = (await this.currentLineCount()) + 1;
      const timestamp = this.now().toISOString();
      const entries = items.map((item, offset) => ({
        timestamp,
        action: item.action,
        rollbackCommand: item.rollbackCommand,
        line: startLine + offset,
      }));
      const text = entries.map((e) => `${formatEntryLine(e.timestamp, e.action, e.rollbackCommand)}\n`).join('');

      try {
        await fs.appendFile(this.file, text, { mode: FILE_MODE });
      } catch (err) {
        // The file may now end in a partial line; recount on next append.
        this.lineCount = undefined;
        throw new EngineError(storageError('TRANSACTION_WRITE', `Cannot append to transaction log: ${describeThrown(err)}`, { file: this.file }));
      }
      this.lineCount = startLine - 1 + entries.length;
      for (const entry of entries) {
        this.log.debug('Transaction recorded', { action: entry.action, line: entry.line });
      }
      return entries;
    });
  }

  async *entriesReverse(): AsyncGenerator<TransactionEntry> {
    const lines = await this.readLines();
    for (let index = lines.length - 1; index >= 0; index--) {
      const entry = parseEntryLine(lines[index], index + 1);
      if (entry) {
        yield entry;
      } else {
        this.log.warn('Skipping malformed transaction log line', { line: index + 1 });
      }
    }
  }

  async count(): Promise<number> {
    return (await this.readLines()).length;
  }

  async tail(n: number): Promise<TransactionEntry[]> {
    const lines = await this.readLines();
    const start = Math.max(0, lines.length - Math.max(0, n));
    const entries: TransactionEntry[] = [];
    for (let index = start; index < lines.length; index++) {
      const entry = parseEntryLine(lines[index], index + 1);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  async validate(): Promise<LogValidationResult> {
    const result = validateLogLines(await this.readLines());
    if (!result.valid) {
      this.log.error('Transaction log validation failed', {
        firstMalformedLine: result.firstMalformedLine,
        malformedLines: result.malformedLines,
      });
    }
    return result;
  }

  async archive(destination: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      try {
        await fs.mkdir(path.dirname(destination), { recursive: true, mode: DIR_MODE });
        await fs.copyFile(this.file, destination);
        await fs.chmod(destination, FILE_MODE);
      } catch (err) {
        throw new EngineError(storageError('TRANSACTION_ARCHIVE', `Cannot archive transaction log to ${destination}: ${describeThrown(err)}`, { file: this.file, destination }));
      }
    });
    this.log.info('Transaction log archived', { destination });
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      try {
        await fs.writeFile(this.file, '', { mode: FILE_MODE });
      } catch (err) {
        throw new EngineError(storageError('TRANSACTION_WRITE', `Cannot clear transaction log: ${describeThrown(err)}`, { file: this.file }));
      }
      this.lineCount = 0;
    });
    this.log.info('Transaction log cleared', { file: this.file });
  }

  private async currentLineCount(): Promise<number> {
    if (this.lineCount === undefined) {
      this.lineCount = (await this.readLines()).length;
    }
    return this.lineCount;
  }

  private async readLines(): Promise<string[]> {
    try {
      return splitLogLines(await fs.readFile(this.file, 'utf8'));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new EngineError(storageError('TRANSACTION_READ', `Cannot read transaction log: ${describeThrown(err)}`, { file: this.file }));
    }
  }
}
