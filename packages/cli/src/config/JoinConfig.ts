/**
 * Run configuration
 *
 * Loads a JSON file, validates it with zod and applies environment overrides.
 *
 * Precedence for the database connection string (highest first):
 * 1. `PIPJOIN_DATABASE_URL`
 * 2. `index.connectionString` in the file
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { PipJoinError, errorMessage } from '@pipjoin/core';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DATABASE_URL_VARIABLE = 'PIPJOIN_DATABASE_URL';

const positiveInt = z.number().int().positive();

const polygonServiceSchema = z.object({
  endpoint: z.string().url(),
  layer: z.string().min(1),
  geometryField: z.string().min(1),
  identifierField: z.string().min(1),
  namespace: z.object({
    prefix: z.string().min(1),
    url: z.string().url(),
  }),
  srsName: z.string().min(1).optional(),
  timeoutMs: positiveInt.optional(),
});

const databaseIndexSchema = z.object({
  backend: z.literal('database'),
  connectionString: z.string().min(1).optional(),
  countQuery: z.string().min(1).optional(),
  pageQuery: z.string().min(1).optional(),
  pointQuery: z.string().min(1).optional(),
});

const linkedDataIndexSchema = z.object({
  backend: z.literal('linked-data-api'),
  endpoint: z.string().url(),
  timeoutMs: positiveInt.optional(),
});

export const joinConfigSchema = z.object({
  polygonService: polygonServiceSchema,
  index: z.discriminatedUnion('backend', [databaseIndexSchema, linkedDataIndexSchema]),
  /** Filter element name of the spatial relation, e.g. `Contains`, `Intersects`. */
  predicate: z.string().regex(/^[A-Za-z]+$/, 'must be an OGC filter element name').default('Contains'),
  startPage: positiveInt.default(1),
  stopPage: z.number().int(),
  pageSize: positiveInt.default(100),
  concurrency: positiveInt.default(1),
  firstSequence: z.number().int().default(1),
  outputFile: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

type ParsedConfig = z.infer<typeof joinConfigSchema>;

export type DatabaseIndexConfig = z.infer<typeof databaseIndexSchema> & { readonly connectionString: string };
export type LinkedDataIndexConfig = z.infer<typeof linkedDataIndexSchema>;
export type IndexConfig = DatabaseIndexConfig | LinkedDataIndexConfig;

export type JoinConfig = Omit<ParsedConfig, 'index'> & { readonly index: IndexConfig };

/** The configuration file is unreadable or invalid. `issues` lists each problem as `path: message`. */
export class ConfigurationError extends PipJoinError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message, 'CONFIGURATION', { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** Validate an already-parsed configuration object. */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): JoinConfig {
  const parsed = joinConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const { index, ...rest } = parsed.data;
  if (index.backend === 'linked-data-api') {
    return { ...rest, index };
  }

  const connectionString = env[DATABASE_URL_VARIABLE] || index.connectionString;
  if (!connectionString) {
    throw new ConfigurationError('Invalid configuration', [
      `index.connectionString: Required unless ${DATABASE_URL_VARIABLE} is set`,
    ]);
  }
  return { ...rest, index: { ...index, connectionString } };
}

/** Read and validate a JSON configuration file. */
export async function loadConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<JoinConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${filePath}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${filePath} is not JSON: ${errorMessage(error)}`);
  }

  return parseConfig(raw, env);
}
