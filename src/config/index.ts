/**
 * Engine configuration.
 *
 * Layers, later overriding earlier: defaults, `key=value` files in the
 * order given, PROVISION_* environment variables, explicit overrides.
 * Every key read from a file is also exposed to modules as a setting.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { EngineError, describeThrown, invalidConfigError } from '../domain/errors';
import { LogLevel, Logger, logger as rootLogger } from '../logger';
import { isNotFound } from '../storage/fs-errors';

export const DEFAULT_STATE_DIR = '/var/lib/host-provisioner';

const logLevelSchema = z.preprocess(
  (value) => {
    if (typeof value !== 'string') return value;
    const lower = value.trim().toLowerCase();
    return lower === 'warning' ? LogLevel.Warn : lower;
  },
  z.nativeEnum(LogLevel),
);

export const engineConfigSchema = z
  .object({
    stateDir: z.string().min(1).refine((p) => path.isAbsolute(p), 'must be an absolute path').default(DEFAULT_STATE_DIR),
    checkpointDir: z.string().min(1).optional(),
    transactionLog: z.string().min(1).optional(),
    lockFile: z.string().min(1).optional(),
    logLevel: logLevelSchema.default(LogLevel.Info),
    maxParallel: z.coerce.number().int().min(1).max(64).default(4),
    rollbackCommandTimeoutMs: z.coerce.number().int().positive().default(300_000),
    shell: z.string().min(1).default('/bin/sh'),
    monitorIntervalMs: z.coerce.number().int().positive().default(5000),
    settings: z.record(z.string()).default({}),
  })
  .transform((config) => ({
    ...config,
    checkpointDir: config.checkpointDir ?? path.join(config.stateDir, 'checkpoints'),
    transactionLog: config.transactionLog ?? path.join(config.stateDir, 'transactions.log'),
    lockFile: config.lockFile ?? path.join(config.stateDir, 'provision.lock'),
  }));

export type EngineConfig = z.output<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/** Configuration file keys that also set engine fields. */
const FILE_KEYS: Record<string, keyof EngineConfigInput> = {
  STATE_DIR: 'stateDir',
  CHECKPOINT_DIR: 'checkpointDir',
  TRANSACTION_LOG: 'transactionLog',
  LOCK_FILE: 'lockFile',
  LOG_LEVEL: 'logLevel',
  MAX_PARALLEL: 'maxParallel',
  ROLLBACK_TIMEOUT_MS: 'rollbackCommandTimeoutMs',
  SHELL: 'shell',
  MONITOR_INTERVAL_MS: 'monitorIntervalMs',
};

const ENV_KEYS: Record<string, keyof EngineConfigInput> = {
  PROVISION_STATE_DIR: 'stateDir',
  PROVISION_LOG_LEVEL: 'logLevel',
  PROVISION_MAX_PARALLEL: 'maxParallel',
  PROVISION_ROLLBACK_TIMEOUT_MS: 'rollbackCommandTimeoutMs',
  PROVISION_SHELL: 'shell',
};

const LINE_PATTERN = /^([A-Za-z_][A-Za-z0-9_.]*)\s*=\s*(.*)$/;

/** Parse `key=value` text. Blank lines and `#` comments are ignored. */
export function parseConfText(text: string, log: Logger = rootLogger): Record<string, string> {
  const values: Record<string, string> = {};
  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) return;
    const match = LINE_PATTERN.exec(line);
    if (!match) {
      log.warn('Ignoring malformed configuration line', { line: index + 1 });
      return;
    }
    values[match[1]] = unquote(match[2].trim());
  });
  return values;
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value[value.length - 1] === first) {
      return value.slice(1, -1);
    }
  }
  return value;
}

export interface LoadConfigOptions {
  files?: string[];
  env?: NodeJS.ProcessEnv;
  overrides?: EngineConfigInput;
  logger?: Logger;
}

/** Resolve and validate the layered configuration. */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<EngineConfig> {
  const log = (options.logger ?? rootLogger).child({ component: 'config' });
  const layered: Record<string, unknown> = {};
  const settings: Record<string, string> = {};

  for (const file of options.files ?? []) {
    let text: string;
    try {
      text = await fs.readFile(file, 'utf8');
    } catch (err) {
      if (isNotFound(err)) {
        log.debug('Configuration file not found', { file });
        continue;
      }
      throw new EngineError(invalidConfigError([{ path: file, message: `cannot read: ${describeThrown(err)}` }]));
    }
    const values = parseConfText(text, log);
    for (const [key, value] of Object.entries(values)) {
      settings[key] = value;
      const field = FILE_KEYS[key];
      if (field) layered[field] = value;
    }
    log.debug('Configuration file loaded', { file, keys: Object.keys(values).length });
  }

  const env = options.env ?? process.env;
  for (const [name, field] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== '') layered[field] = value;
  }

  const { settings: overrideSettings, ...overrides } = options.overrides ?? {};
  return parseConfig({ ...layered, ...overrides, settings: { ...settings, ...overrideSettings } });
}

/** Validate an already-layered configuration object. */
export function parseConfig(input: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new EngineError(
      invalidConfigError(parsed.error.issues.map((issue) => ({ path: issue.path.join('.') || '(root)', message: issue.message }))),
    );
  }
  return parsed.data;
}
