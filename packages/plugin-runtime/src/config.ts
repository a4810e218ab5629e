/**
 * @module @publishkit/plugin-runtime/config
 * Pipeline configuration: defaults, environment, explicit overrides
 */

import { z } from 'zod';
import { ConfigError } from '@publishkit/plugin-contracts';
import { DEFAULT_HOST_EXECUTABLES, type HostExecutableTable } from './host/resolvers.js';

/**
 * Stages run by `PublishPipeline.run()` when none are given.
 */
export const DEFAULT_STAGES: readonly string[] = ['validators', 'extractors', 'conformers'];

const stageNameSchema = z.string().regex(/^\S+$/, 'Stage names must be non-empty and contain no whitespace');

export const publishConfigSchema = z.object({
  host: z.string().min(1).optional(),
  hostExecutables: z
    .record(z.string().min(1), z.array(z.string().min(1)).min(1))
    .default(() => copyTable(DEFAULT_HOST_EXECUTABLES)),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  stages: z.array(stageNameSchema).min(1).default(() => [...DEFAULT_STAGES]),
  haltOnError: z.boolean().default(true),
});

export type PublishConfig = z.infer<typeof publishConfigSchema>;
export type PublishConfigInput = z.input<typeof publishConfigSchema>;

export interface LoadPublishConfigOptions {
  /** Default: process.env */
  env?: Record<string, string | undefined>;
  overrides?: PublishConfigInput;
}

/**
 * Build the pipeline configuration.
 *
 * Precedence: overrides > environment > defaults.
 *
 * | Env var                 | Key          |
 * |-------------------------|--------------|
 * | PUBLISH_HOST            | host         |
 * | PUBLISH_LOG_LEVEL       | logLevel     |
 * | PUBLISH_STAGES          | stages (comma separated) |
 * | PUBLISH_HALT_ON_ERROR   | haltOnError (true/false/1/0) |
 *
 * @throws ConfigError with zod issues in `details.issues`
 */
export function loadPublishConfig(options: LoadPublishConfigOptions = {}): PublishConfig {
  const env = options.env ?? process.env;
  const raw: Record<string, unknown> = {
    ...fromEnv(env),
    ...stripUndefined(options.overrides ?? {}),
  };

  const result = publishConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid publish configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { issues }
    );
  }
  return result.data;
}

function fromEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  const raw: Record<string, unknown> = {};

  if (env.PUBLISH_HOST) {
    raw.host = env.PUBLISH_HOST;
  }
  if (env.PUBLISH_LOG_LEVEL) {
    raw.logLevel = env.PUBLISH_LOG_LEVEL.toLowerCase();
  }
  if (env.PUBLISH_STAGES) {
    raw.stages = env.PUBLISH_STAGES.split(',')
      .map((stage) => stage.trim())
      .filter((stage) => stage.length > 0);
  }
  if (env.PUBLISH_HALT_ON_ERROR) {
    raw.haltOnError = parseBoolean(env.PUBLISH_HALT_ON_ERROR);
  }

  return raw;
}

/**
 * Unrecognized values are passed through unchanged so the schema reports them.
 */
function parseBoolean(value: string): boolean | string {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return value;
  }
}

function stripUndefined(input: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

function copyTable(table: HostExecutableTable): Record<string, string[]> {
  return Object.fromEntries(Object.entries(table).map(([host, markers]) => [host, [...markers]]));
}
