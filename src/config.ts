import { z } from 'zod';

import { ConfigurationError } from './errors';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(flag => flag === 'true' || flag === '1');

/**
 * Environment variables read by {@link loadConfig}.
 */
const BridgeEnvironmentSchema = z.object({
  BRIDGE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  BRIDGE_PREVIEW_COLOR: booleanFlag.optional(),
  NO_COLOR: z.string().optional()
});

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Host-layer configuration.
 */
export type BridgeConfig = {
  logLevel: LogLevel;
  /**
   * Colour preview markers. Defaults to on unless `NO_COLOR` is set.
   */
  previewColor: boolean;
};

/**
 * Reads the host configuration from environment variables.
 *
 * - `BRIDGE_LOG_LEVEL`: a pino level, default `info`.
 * - `BRIDGE_PREVIEW_COLOR`: `true`/`false`/`1`/`0`; wins over `NO_COLOR`.
 * - `NO_COLOR`: any non-empty value turns colour off.
 *
 * @param env - Defaults to `process.env`.
 * @throws {ConfigurationError} listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = BridgeEnvironmentSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      variable: issue.path.join('.'),
      message: issue.message
    }));
    throw new ConfigurationError(
      `invalid bridge configuration: ${issues.map(issue => `${issue.variable} (${issue.message})`).join(', ')}`,
      { issues }
    );
  }

  const { BRIDGE_LOG_LEVEL, BRIDGE_PREVIEW_COLOR, NO_COLOR } = parsed.data;

  return {
    logLevel: BRIDGE_LOG_LEVEL,
    previewColor: BRIDGE_PREVIEW_COLOR ?? !NO_COLOR
  };
}
