/**
 * Bulk Load Configuration
 *
 * Explicit per-backend bulk load settings, validated with zod, plus
 * environment readers for deployments that configure loaders through
 * environment variables.
 * @module sql-table-insert/config
 */

import { z } from 'zod';
import { BulkLoadCredentialsError, ConfigurationError } from '../errors/index.js';

// ============================================================================
// Schemas
// ============================================================================

/**
 * Server-side encryption types accepted for staged S3 objects.
 */
export const SSE_TYPES = ['AES256', 'aws:kms', 'aws:kms:dsse'] as const;

export type SseType = (typeof SSE_TYPES)[number];

/**
 * Redshift staging through S3.
 */
export const RedshiftBulkConfigSchema = z.object({
  /** AWS access key id */
  accessKeyId: z.string().min(1),
  /** AWS secret access key */
  secretAccessKey: z.string().min(1),
  /** Region of the bucket */
  region: z.string().min(1),
  /** Staging bucket */
  bucketName: z.string().min(1),
  /** Key prefix for staged objects */
  objectKey: z.string().default(''),
  /** Server-side encryption of staged objects */
  sseType: z.enum(SSE_TYPES).optional(),
  /** Custom S3 endpoint */
  endpoint: z.string().url().optional(),
});

const PdwBulkConfigBaseSchema = z.object({
  /** Full path of the dwloader executable */
  dwloaderPath: z.string().min(1),
  /** Appliance control node */
  server: z.string().min(1),
  /** Login, unless Windows authentication is used */
  user: z.string().min(1).optional(),
  /** Password, unless Windows authentication is used */
  password: z.string().min(1).optional(),
  /** Use Windows authentication (`-W`) */
  windowsAuth: z.boolean().default(false),
});

/**
 * PDW staging through dwloader.
 */
export const PdwBulkConfigSchema = PdwBulkConfigBaseSchema.superRefine((config, ctx) => {
  if (config.windowsAuth) return;
  if (config.user === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['user'], message: 'Required without windowsAuth' });
  }
  if (config.password === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['password'], message: 'Required without windowsAuth' });
  }
});

/**
 * PostgreSQL staging through psql `\copy`.
 */
export const PostgresqlBulkConfigSchema = z.object({
  /** Directory holding the psql executable */
  binPath: z.string().min(1),
  /** Server host */
  host: z.string().min(1),
  /** Server port */
  port: z.number().int().positive().default(5432),
  /** Database name */
  database: z.string().min(1),
  /** Login */
  user: z.string().min(1),
  /** Password, passed to psql as PGPASSWORD */
  password: z.string().optional(),
});

/**
 * Hive staging through HDFS.
 */
export const HiveBulkConfigSchema = z.object({
  /** Directory holding the hdfs executable */
  hadoopPath: z.string().min(1),
  /** HDFS directory under which staged files are placed */
  stagingDir: z.string().min(1).default('/tmp/table-insert'),
  /** Passed to the hdfs client as HADOOP_USER_NAME */
  hadoopUser: z.string().min(1).optional(),
});

export type RedshiftBulkConfig = z.infer<typeof RedshiftBulkConfigSchema>;
export type PdwBulkConfig = z.infer<typeof PdwBulkConfigSchema>;
export type PostgresqlBulkConfig = z.infer<typeof PostgresqlBulkConfigSchema>;
export type HiveBulkConfig = z.infer<typeof HiveBulkConfigSchema>;

/**
 * Bulk load configuration for all backends. Sections hold raw, possibly
 * incomplete values; each bulk loader validates its own section.
 */
export interface BulkLoadConfig {
  /** `sseType` may hold any text here; it is checked against {@link SSE_TYPES} on validation */
  redshift?: Partial<Omit<z.input<typeof RedshiftBulkConfigSchema>, 'sseType'>> & { sseType?: string };
  pdw?: Partial<z.input<typeof PdwBulkConfigBaseSchema>>;
  postgresql?: Partial<z.input<typeof PostgresqlBulkConfigSchema>>;
  hive?: Partial<z.input<typeof HiveBulkConfigSchema>>;
  /** Local directory for staging files (default: the OS temp directory) */
  localStagingDir?: string;
}

/**
 * Backends with a bulk load section.
 */
export type BulkLoadSection = 'redshift' | 'pdw' | 'postgresql' | 'hive';

const BulkLoadConfigSchema = z.object({
  redshift: RedshiftBulkConfigSchema.partial().optional(),
  pdw: PdwBulkConfigBaseSchema.partial().optional(),
  postgresql: PostgresqlBulkConfigSchema.partial().optional(),
  hive: HiveBulkConfigSchema.partial().optional(),
  localStagingDir: z.string().min(1).optional(),
});

// ============================================================================
// Validation
// ============================================================================

/**
 * Validates the shape of a bulk load configuration without requiring any
 * section to be complete.
 *
 * @throws {ConfigurationError} If a value has the wrong type
 */
export function validateBulkLoadConfig(config: BulkLoadConfig): void {
  const result = BulkLoadConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid bulk load configuration: ${issues.join(', ')}`, { issues });
  }
}

function parseSection<S extends z.ZodTypeAny>(section: BulkLoadSection, schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value ?? {});
  if (result.success) {
    return result.data;
  }

  const fields = [...new Set(result.error.issues.map((i) => [section, ...i.path].join('.')))];
  throw new BulkLoadCredentialsError(
    `Bulk load credentials could not be confirmed. Missing or invalid: ${fields.join(', ')}`,
    fields
  );
}

/**
 * Validates the Redshift section.
 *
 * @throws {BulkLoadCredentialsError} Listing every missing or invalid field
 */
export function parseRedshiftBulkConfig(config: BulkLoadConfig): RedshiftBulkConfig {
  return parseSection('redshift', RedshiftBulkConfigSchema, config.redshift);
}

/**
 * Validates the PDW section.
 *
 * @throws {BulkLoadCredentialsError} Listing every missing or invalid field
 */
export function parsePdwBulkConfig(config: BulkLoadConfig): PdwBulkConfig {
  return parseSection('pdw', PdwBulkConfigSchema, config.pdw);
}

/**
 * Validates the PostgreSQL section.
 *
 * @throws {BulkLoadCredentialsError} Listing every missing or invalid field
 */
export function parsePostgresqlBulkConfig(config: BulkLoadConfig): PostgresqlBulkConfig {
  return parseSection('postgresql', PostgresqlBulkConfigSchema, config.postgresql);
}

/**
 * Validates the Hive section.
 *
 * @throws {BulkLoadCredentialsError} Listing every missing or invalid field
 */
export function parseHiveBulkConfig(config: BulkLoadConfig): HiveBulkConfig {
  return parseSection('hive', HiveBulkConfigSchema, config.hive);
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Fluent builder for {@link BulkLoadConfig}.
 *
 * @example
 * ```typescript
 * const config = new BulkLoadConfigBuilder()
 *   .redshift({ accessKeyId: 'test-key', secretAccessKey: 'test-secret', region: 'us-east-1', bucketName: 'staging' })
 *   .build();
 * ```
 */
export class BulkLoadConfigBuilder {
  private config: BulkLoadConfig;

  constructor(initial: BulkLoadConfig = {}) {
    this.config = { ...initial };
  }

  /**
   * Merges Redshift settings.
   */
  redshift(value: NonNullable<BulkLoadConfig['redshift']>): this {
    this.config = { ...this.config, redshift: { ...this.config.redshift, ...value } };
    return this;
  }

  /**
   * Merges PDW settings.
   */
  pdw(value: NonNullable<BulkLoadConfig['pdw']>): this {
    this.config = { ...this.config, pdw: { ...this.config.pdw, ...value } };
    return this;
  }

  /**
   * Merges PostgreSQL settings.
   */
  postgresql(value: NonNullable<BulkLoadConfig['postgresql']>): this {
    this.config = { ...this.config, postgresql: { ...this.config.postgresql, ...value } };
    return this;
  }

  /**
   * Merges Hive settings.
   */
  hive(value: NonNullable<BulkLoadConfig['hive']>): this {
    this.config = { ...this.config, hive: { ...this.config.hive, ...value } };
    return this;
  }

  /**
   * Sets the local staging directory.
   */
  localStagingDir(value: string): this {
    this.config = { ...this.config, localStagingDir: value };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): BulkLoadConfig {
    validateBulkLoadConfig(this.config);
    return { ...this.config };
  }
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Environment variable map, e.g. `process.env`.
 */
export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Interprets a boolean option that may arrive as text. Only `true` and the
 * text `TRUE` (any case) enable it.
 */
export function parseFlag(value: boolean | string | undefined): boolean {
  if (typeof value === 'boolean') return value;
  return value !== undefined && value.trim().toUpperCase() === 'TRUE';
}

function pick(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

function section<T extends Record<string, unknown>>(values: T): T | undefined {
  return Object.values(values).some((value) => value !== undefined) ? values : undefined;
}

/**
 * Reads bulk load settings from environment variables. A section is present
 * only when at least one of its variables is set.
 *
 * | Section    | Variables |
 * |------------|-----------|
 * | redshift   | AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_DEFAULT_REGION, AWS_BUCKET_NAME, AWS_OBJECT_KEY, AWS_SSE_TYPE |
 * | pdw        | DWLOADER_PATH, PDW_SERVER, PDW_USER, PDW_PASSWORD, PDW_WINDOWS_AUTH |
 * | postgresql | POSTGRES_PATH, PGHOST, PGPORT, PGDATABASE, PGUSER, PGPASSWORD |
 * | hive       | HADOOP_PATH, HIVE_STAGING_DIR, HADOOP_USER_NAME |
 *
 * `TABLE_INSERT_STAGING_DIR` sets the local staging directory.
 */
export function bulkLoadConfigFromEnv(env: Env = process.env): BulkLoadConfig {
  const config: BulkLoadConfig = {};
  const port = pick(env, 'PGPORT');
  const windowsAuth = pick(env, 'PDW_WINDOWS_AUTH');

  const redshift = section({
    accessKeyId: pick(env, 'AWS_ACCESS_KEY_ID'),
    secretAccessKey: pick(env, 'AWS_SECRET_ACCESS_KEY'),
    region: pick(env, 'AWS_DEFAULT_REGION'),
    bucketName: pick(env, 'AWS_BUCKET_NAME'),
    objectKey: pick(env, 'AWS_OBJECT_KEY'),
    sseType: pick(env, 'AWS_SSE_TYPE'),
  });
  if (redshift) config.redshift = redshift;

  const pdw = section({
    dwloaderPath: pick(env, 'DWLOADER_PATH'),
    server: pick(env, 'PDW_SERVER'),
    user: pick(env, 'PDW_USER'),
    password: pick(env, 'PDW_PASSWORD'),
    windowsAuth: windowsAuth === undefined ? undefined : parseFlag(windowsAuth),
  });
  if (pdw) config.pdw = pdw;

  const postgresql = section({
    binPath: pick(env, 'POSTGRES_PATH'),
    host: pick(env, 'PGHOST'),
    port: port === undefined ? undefined : Number(port),
    database: pick(env, 'PGDATABASE'),
    user: pick(env, 'PGUSER'),
    password: pick(env, 'PGPASSWORD'),
  });
  if (postgresql) config.postgresql = postgresql;

  const hive = section({
    hadoopPath: pick(env, 'HADOOP_PATH'),
    stagingDir: pick(env, 'HIVE_STAGING_DIR'),
    hadoopUser: pick(env, 'HADOOP_USER_NAME'),
  });
  if (hive) config.hive = hive;

  const localStagingDir = pick(env, 'TABLE_INSERT_STAGING_DIR');
  if (localStagingDir) config.localStagingDir = localStagingDir;

  return config;
}

/**
 * Insert defaults taken from the environment.
 */
export interface InsertDefaults {
  /** From `TABLE_INSERT_BULK_LOAD` */
  bulkLoad?: boolean;
  /** From the deprecated `USE_MPP_BULK_LOAD`; only set when the variable is */
  useMppBulkLoad?: boolean;
}

/**
 * Reads insert defaults from environment variables.
 */
export function insertDefaultsFromEnv(env: Env = process.env): InsertDefaults {
  const defaults: InsertDefaults = {};
  const bulkLoad = pick(env, 'TABLE_INSERT_BULK_LOAD');
  if (bulkLoad !== undefined) {
    defaults.bulkLoad = parseFlag(bulkLoad);
  }
  const mpp = pick(env, 'USE_MPP_BULK_LOAD');
  if (mpp !== undefined) {
    defaults.useMppBulkLoad = parseFlag(mpp);
  }
  return defaults;
}
