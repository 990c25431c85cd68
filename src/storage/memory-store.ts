/**
 * In-memory storage implementations.
 *
 * Reference implementations for tests and embedding. They share the line
 * codec with the file-backed log, so validation and parsing behave the
 * same; returned values are copies and never alias internal state.
 */

import { Checkpoint, CheckpointStore } from '../domain/checkpoint';
import { EngineError, invalidModuleIdError } from '../domain/errors';
import { isValidModuleId } from '../domain/module';
import {
  LogValidationResult,
  TransactionEntry,
  TransactionLog,
  formatEntryLine,
  parseEntryLine,
  validateRecordFields,
} from '../domain/transaction';
import { validateLogLines } from './transaction-log';

export class MemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, Checkpoint>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async init(): Promise<void> {}

  async exists(moduleId: string): Promise<boolean> {
    assertModuleId(moduleId);
    return this.checkpoints.has(moduleId);
  }

  async get(moduleId: string): Promise<Checkpoint | null> {
    assertModuleId(moduleId);
    const checkpoint = this.checkpoints.get(moduleId);
    return checkpoint ? { ...checkpoint } : null;
  }

  async create(moduleId: string): Promise<Checkpoint> {
    assertModuleId(moduleId);
    const existing = this.checkpoints.get(moduleId);
    if (existing) return { ...existing };
    const checkpoint: Checkpoint = { moduleId, createdAt: this.now().toISOString() };
    this.checkpoints.set(moduleId, checkpoint);
    return { ...checkpoint };
  }

  async remove(moduleId: string): Promise<boolean> {
    assertModuleId(moduleId);
    return this.checkpoints.delete(moduleId);
  }

  async list(): Promise<Set<string>> {
    return new Set(this.checkpoints.keys());
  }

  async clearAll(): Promise<number> {
    const count = this.checkpoints.size;
    this.checkpoints.clear();
    return count;
  }
}

export class MemoryTransactionLog implements TransactionLog {
  private lines: string[] = [];
  private readonly archives = new Map<string, string[]>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async init(): Promise<void> {}

  async record(action: string, rollbackCommand: string): Promise<TransactionEntry> {
    const [entry] = await this.recordBatch([{ action, rollbackCommand }]);
    return entry;
  }

  async recordBatch(items: Array<{ action: string; rollbackCommand: string }>): Promise<TransactionEntry[]> {
    for (const item of items) {
      const invalid = validateRecordFields(item.action, item.rollbackCommand);
      if (invalid) throw new EngineError(invalid);
    }
    const timestamp = this.now().toISOString();
    return items.map((item) => {
      this.lines.push(formatEntryLine(timestamp, item.action, item.rollbackCommand));
      return { timestamp, action: item.action, rollbackCommand: item.rollbackCommand, line: this.lines.length };
    });
  }

  async *entriesReverse(): AsyncGenerator<TransactionEntry> {
    const snapshot = [...this.lines];
    for (let index = snapshot.length - 1; index >= 0; index--) {
      const entry = parseEntryLine(snapshot[index], index + 1);
      if (entry) yield entry;
    }
  }

  async count(): Promise<number> {
    return this.lines.length;
  }

  async tail(n: number): Promise<TransactionEntry[]> {
    const start = Math.max(0, this.lines.length - Math.max(0, n));
    const entries: TransactionEntry[] = [];
    for (let index = start; index < this.lines.length; index++) {
      const entry = parseEntryLine(this.lines[index], index + 1);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  async validate(): Promise<LogValidationResult> {
    return validateLogLines(this.lines);
  }

  async archive(destination: string): Promise<void> {
    this.archives.set(destination, [...this.lines]);
  }

  async clear(): Promise<void> {
    this.lines = [];
  }

  /** Raw log lines, oldest first. */
  snapshot(): string[] {
    return [...this.lines];
  }

  /** Lines captured by archive(destination). */
  archived(destination: string): string[] | undefined {
    const lines = this.archives.get(destination);
    return lines ? [...lines] : undefined;
  }

  /** Append a raw line bypassing validation (simulates foreign or corrupted writes). */
  appendRaw(line: string): void {
    this.lines.push(line);
  }
}

function assertModuleId(moduleId: string): void {
  if (!isValidModuleId(moduleId)) {
    throw new EngineError(invalidModuleIdError(moduleId));
  }
}
