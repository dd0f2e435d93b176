/**
 * Configuration validation and resolution
 */

import { hostname as osHostname } from 'node:os';
import { z } from 'zod';
import type { Logger, ResolvedConfig } from '../types/index.js';
import { Mode, MODES } from '../types/index.js';
import {
  HostnameResolutionError,
  InvalidConfigurationError,
  InvalidModeError,
  toError,
} from '../errors/index.js';
import { applyDefaults } from './defaults.js';
import { readStackName } from './env.js';

/**
 * Options for resolving a configuration
 */
export interface ResolveOptions {
  /** Hostname lookup (defaults to `os.hostname`) */
  resolveHostname?: () => string;
  /** Environment used for the stack name (defaults to `process.env`) */
  env?: NodeJS.ProcessEnv;
}

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'debug' in value &&
    typeof value.debug === 'function' &&
    'info' in value &&
    typeof value.info === 'function' &&
    'warn' in value &&
    typeof value.warn === 'function' &&
    'error' in value &&
    typeof value.error === 'function'
  );
}

/**
 * Zod schema for the service identity
 */
const identitySchema = z.object({
  service: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  mode: z.unknown(),
});

/**
 * Zod schema for the mode
 */
const modeSchema = z.nativeEnum(Mode);

/**
 * Zod schema for the optional settings
 */
const optionsSchema = z.object({
  searchIndex: z.string().optional(),
  flushIntervalMs: z.number().finite().optional(),
  timeoutMs: z.number().finite().optional(),
  port: z
    .string()
    .regex(/^\d{0,5}$/, 'must be a numeric port')
    .refine((port) => port === '' || (Number(port) >= 1 && Number(port) <= 65535), {
      message: 'must be between 1 and 65535',
    })
    .optional(),
  defaultFields: z.record(z.string(), z.string()).optional(),
  logQueueSize: z.number().int().positive().optional(),
  histogramBuckets: z.array(z.number().finite()).optional(),
  hostname: z.string().optional(),
  stack: z.string().optional(),
  logger: z.custom<Logger>(isLogger, 'must implement debug, info, warn and error').optional(),
});

function issuePath(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
}

function lookupHostname(configured: string | undefined, resolve: () => string): string {
  if (configured) {
    return configured;
  }

  let name: string;
  try {
    name = resolve();
  } catch (error) {
    const cause = toError(error);
    throw new HostnameResolutionError(cause.message, cause);
  }

  if (!name) {
    throw new HostnameResolutionError('hostname lookup returned an empty name');
  }
  return name;
}

/**
 * Validate a configuration and fill in every default
 *
 * Checks, in order:
 * - service name and version are present and non-empty
 * - mode is one of the known modes
 * - optional settings have the right shape
 *
 * The hostname is resolved once here. Feeding a resolved configuration back
 * in returns the same values.
 *
 * @throws InvalidConfigurationError if a required field is missing or a setting is malformed
 * @throws InvalidModeError if the mode is unknown
 * @throws HostnameResolutionError if the hostname cannot be resolved
 */
export function resolveConfig(input: unknown, options: ResolveOptions = {}): ResolvedConfig {
  const identity = identitySchema.safeParse(input);
  if (!identity.success) {
    throw InvalidConfigurationError.missingRequiredField(issuePath(identity.error));
  }

  const mode = modeSchema.safeParse(identity.data.mode);
  if (!mode.success) {
    throw new InvalidModeError(identity.data.mode, MODES);
  }

  const settings = optionsSchema.safeParse(input);
  if (!settings.success) {
    const field = issuePath(settings.error);
    throw InvalidConfigurationError.invalidFieldValue(
      field,
      undefined,
      settings.error.issues[0]?.message
    );
  }

  const hostname = lookupHostname(
    settings.data.hostname,
    options.resolveHostname ?? osHostname
  );

  return applyDefaults(
    {
      ...settings.data,
      service: identity.data.service,
      mode: mode.data,
    },
    hostname,
    readStackName(options.env ?? process.env)
  );
}
