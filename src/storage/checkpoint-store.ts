/**
 * File-backed checkpoint store.
 *
 * One `<moduleId>.checkpoint` file per completed module under the
 * checkpoint directory. A marker is written to a private temporary file
 * and then hard-linked into place, so an observer sees either no marker
 * or a complete one, and an existing marker is never overwritten.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { Checkpoint, CheckpointStore } from '../domain/checkpoint';
import { EngineError, describeThrown, invalidModuleIdError, storageError } from '../domain/errors';
import { isValidModuleId } from '../domain/module';
import { Logger, logger as rootLogger } from '../logger';
import { isAlreadyExists, isNotFound } from './fs-errors';

const CHECKPOINT_SUFFIX = '.checkpoint';
const DIR_MODE = 0o750;
const FILE_MODE = 0o640;

export interface FileCheckpointStoreOptions {
  directory: string;
  now?: () => Date;
  logger?: Logger;
}

/** Serialize checkpoint metadata as KEY="value" lines. */
export function formatCheckpoint(checkpoint: Checkpoint): string {
  const lines = [
    `CHECKPOINT_NAME="${checkpoint.moduleId}"`,
    `CREATED_AT="${checkpoint.createdAt}"`,
  ];
  if (checkpoint.hostname) lines.push(`HOSTNAME="${checkpoint.hostname}"`);
  if (checkpoint.user) lines.push(`USER="${checkpoint.user}"`);
  return `${lines.join('\n')}\n`;
}

/** Parse KEY="value" checkpoint metadata. Missing fields fall back to the file name and mtime. */
export function parseCheckpoint(moduleId: string, text: string, fallbackCreatedAt: string): Checkpoint {
  const fields: Record<string, string> = {};
  for (const line of text.split('\n')) {
    const match = /^([A-Z_]+)="(.*)"$/.exec(line.trim());
    if (match) fields[match[1]] = match[2];
  }
  return {
    moduleId: fields.CHECKPOINT_NAME || moduleId,
    createdAt: fields.CREATED_AT || fallbackCreatedAt,
    hostname: fields.HOSTNAME,
    user: fields.USER,
  };
}

function currentUser(): string | undefined {
  try {
    return os.userInfo().username;
  } catch {
    return process.env.USER;
  }
}

export class FileCheckpointStore implements CheckpointStore {
  private readonly directory: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: FileCheckpointStoreOptions) {
    this.directory = options.directory;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ component: 'checkpoint-store' });
  }

  async init(): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true, mode: DIR_MODE });
      await fs.chmod(this.directory, DIR_MODE);
    } catch (err) {
      throw new EngineError(storageError('CHECKPOINT_INIT', `Cannot prepare checkpoint directory ${this.directory}: ${describeThrown(err)}`, { directory: this.directory }));
    }
    this.log.debug('Checkpoint store initialized', { directory: this.directory });
  }

  async exists(moduleId: string): Promise<boolean> {
    const file = this.fileFor(moduleId);
    try {
      await fs.access(file);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new EngineError(storageError('CHECKPOINT_READ', `Cannot read checkpoint ${moduleId}: ${describeThrown(err)}`, { moduleId }));
    }
  }

  async get(moduleId: string): Promise<Checkpoint | null> {
    const file = this.fileFor(moduleId);
    try {
      const [text, stat] = await Promise.all([fs.readFile(file, 'utf8'), fs.stat(file)]);
      return parseCheckpoint(moduleId, text, stat.mtime.toISOString());
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new EngineError(storageError('CHECKPOINT_READ', `Cannot read checkpoint ${moduleId}: ${describeThrown(err)}`, { moduleId }));
    }
  }

  async create(moduleId: string): Promise<Checkpoint> {
    const file = this.fileFor(moduleId);
    const existing = await this.get(moduleId);
    if (existing) {
      this.log.debug('Checkpoint already present', { moduleId });
      return existing;
    }

    const checkpoint: Checkpoint = {
      moduleId,
      createdAt: this.now().toISOString(),
      hostname: os.hostname(),
      user: currentUser(),
    };
    const temp = path.join(this.directory, `.${moduleId}.${uuid()}.tmp`);

    try {
      await fs.writeFile(temp, formatCheckpoint(checkpoint), { mode: FILE_MODE, flag: 'wx' });
      try {
        await fs.link(temp, file);
      } catch (err) {
        if (!isAlreadyExists(err)) throw err;
        this.log.debug('Checkpoint appeared concurrently', { moduleId });
        return (await this.get(moduleId)) ?? checkpoint;
      }
    } catch (err) {
      throw new EngineError(storageError('CHECKPOINT_WRITE', `Cannot write checkpoint ${moduleId}: ${describeThrown(err)}`, { moduleId, file }));
    } finally {
      await fs.rm(temp, { force: true });
    }

    this.log.debug('Checkpoint created', { moduleId });
    return checkpoint;
  }

  async remove(moduleId: string): Promise<boolean> {
    const file = this.fileFor(moduleId);
    try {
      await fs.unlink(file);
    } catch (err) {
      if (isNotFound(err)) {
        this.log.warn('Checkpoint not found', { moduleId });
        return false;
      }
      throw new EngineError(storageError('CHECKPOINT_WRITE', `Cannot remove checkpoint ${moduleId}: ${describeThrown(err)}`, { moduleId }));
    }
    this.log.debug('Checkpoint removed', { moduleId });
    return true;
  }

  async list(): Promise<Set<string>> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (err) {
      if (isNotFound(err)) return new Set();
      throw new EngineError(storageError('CHECKPOINT_READ', `Cannot list checkpoints: ${describeThrown(err)}`, { directory: this.directory }));
    }
    return new Set(
      names
        .filter((name) => name.endsWith(CHECKPOINT_SUFFIX) && !name.startsWith('.'))
        .map((name) => name.slice(0, -CHECKPOINT_SUFFIX.length)),
    );
  }

  async clearAll(): Promise<number> {
    let removed = 0;
    for (const moduleId of await this.list()) {
      if (await this.remove(moduleId)) removed += 1;
    }
    if (removed > 0) this.log.info('Cleared checkpoints', { count: removed });
    return removed;
  }

  private fileFor(moduleId: string): string {
    if (!isValidModuleId(moduleId)) {
      throw new EngineError(invalidModuleIdError(moduleId));
    }
    return path.join(this.directory, `${moduleId}${CHECKPOINT_SUFFIX}`);
  }
}
