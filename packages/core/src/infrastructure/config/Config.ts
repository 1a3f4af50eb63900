import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { RecordFileError } from '../../domain/model/RecordFileError.js';
import type { ReaderOptions } from '../../Reader.js';
import { createLogger } from '../logging/logger.js';

/** Environment variable naming the configuration file. */
export const CONFIG_ENV = 'FIXEDREC_CONF';

/** File looked up in the working directory when neither an argument nor the environment names one. */
export const DEFAULT_CONFIG_FILE = 'fixedrec.json';

const ConfigSchema = z.object({
  log: z
    .object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
      file: z.string().min(1).optional(),
    })
    .default({}),
  reader: z
    .object({
      readMode: z.enum(['lazy', 'strict']).default('lazy'),
      encoding: z.enum(['utf-8', 'utf8', 'latin1', 'ascii']).default('utf-8'),
    })
    .default({}),
  export: z
    .object({
      csvDelimiter: z.string().min(1).default(';'),
    })
    .default({}),
});

/** Validated configuration with defaults applied. */
export type FixedrecConfig = z.infer<typeof ConfigSchema>;

/** Defaults used when no configuration file exists. */
export function defaultConfig(): FixedrecConfig {
  return ConfigSchema.parse({});
}

/** Validate an already-parsed configuration object. */
export function parseConfig(raw: unknown, origin = 'configuration'): FixedrecConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new RecordFileError('INVALID_CONFIG', `Invalid ${origin}: ${issues.join('; ')}`, {
      metadata: { origin, issues },
    });
  }
  return result.data;
}

/**
 * Load the configuration.
 *
 * Lookup order: `path`, then the file named by `FIXEDREC_CONF`, then
 * `./fixedrec.json`. An explicitly named file must exist; a missing default
 * file yields the defaults.
 */
export function loadConfig(path?: string): FixedrecConfig {
  const explicit = path ?? process.env[CONFIG_ENV];

  if (explicit === undefined || explicit === '') {
    const fallback = resolve(DEFAULT_CONFIG_FILE);
    return existsSync(fallback) ? readConfigFile(fallback) : defaultConfig();
  }

  if (!existsSync(explicit)) {
    throw new RecordFileError('INVALID_CONFIG', `Configuration file '${explicit}' not found`, {
      metadata: { path: explicit },
    });
  }
  return readConfigFile(explicit);
}

function readConfigFile(file: string): FixedrecConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new RecordFileError('INVALID_CONFIG', `Configuration file '${file}' is not valid JSON`, {
      cause: err,
      metadata: { path: file },
    });
  }
  return parseConfig(raw, `configuration file '${file}'`);
}

/** Reader options (read mode, encoding, logger) described by a configuration. */
export function readerOptionsFrom(config: FixedrecConfig): ReaderOptions {
  return {
    readMode: config.reader.readMode,
    encoding: config.reader.encoding,
    logger: createLogger({ level: config.log.level, file: config.log.file }),
  };
}
