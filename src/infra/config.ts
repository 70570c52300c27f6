import { z } from 'zod';

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`problem parsing config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface Config {
  port: number;
  logDir: string;
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  requestTimeoutMs: number;
  trustProxy: boolean;
}

export type Env = Record<string, string | undefined>;

// Unset and empty variables both fall back to the default.
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

// Largest delay setTimeout honours; anything above fires after 1ms.
export const MAX_TIMEOUT_MS = 2_147_483_647;

// Plain decimal digits only: Number() would also take ' ', '1e3' or '0x10'.
const integer = (fallback: string, min: number, max: number) =>
  z
    .string()
    .regex(/^\d+$/, 'Expected a decimal integer')
    .default(fallback)
    .pipe(z.coerce.number().int().min(min).max(max));

const envSchema = z.object({
  PORT: optional(integer('4000', 1, 65535)),
  LOGDIR: optional(z.string().default('${HOME}/tmp')),
  LOG_LEVEL: optional(
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
  REQUEST_TIMEOUT_MS: optional(integer('60000', 1, MAX_TIMEOUT_MS)),
  TRUST_PROXY: optional(z.enum(['true', 'false']).default('true')),
});

/**
 * Expand `$VAR` and `${VAR}` references from the given environment.
 * Unknown variables expand to the empty string.
 */
export function expandEnv(value: string, env: Env): string {
  return value.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_match, braced: string | undefined, bare: string | undefined) =>
      env[braced ?? bare ?? ''] ?? ''
  );
}

export function loadConfig(env: Env = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    logDir: expandEnv(vars.LOGDIR, env),
    logLevel: vars.LOG_LEVEL,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    trustProxy: vars.TRUST_PROXY === 'true',
  };
}
