import { BadRequestError } from 'helpful-errors';
import { z } from 'zod';

/**
 * .what = the shape of a session's configuration
 * .why = validated once at startup, so the dispatchers can trust every field
 */
export const SessionConfigSchema = z.object({
  /**
   * how the two processes are connected
   */
  mode: z.enum(['child-process', 'parent-process', 'in-memory']),

  /**
   * which peer issues the first call once the handshake is done
   */
  driver: z.enum(['process', 'engine']),

  /**
   * bound on every process-side read after the handshake
   */
  timeoutMs: z.number().int().positive(),

  /**
   * bound on the wait for the identity line
   */
  handshakeTimeoutMs: z.number().int().positive(),

  /**
   * inbound lines equal to this (after trimming trailing whitespace) are dropped;
   * engines that can only flush by filling a pipe buffer pad with it
   */
  fillerLine: z.string().min(1).nullable(),

  /**
   * the wire encoding for engines that read unicode; bytes-only engines always get latin1
   */
  encoding: z.enum(['utf8', 'latin1']),
  logLevel: z.enum([
    'fatal',
    'error',
    'warn',
    'info',
    'debug',
    'trace',
    'silent',
  ]),

  /**
   * how many of the latest lines the session transcript keeps
   */
  transcriptLimit: z.number().int().positive(),

  /**
   * child-process mode only: what to spawn
   */
  executable: z.string().min(1).nullable(),
  args: z.array(z.string()),
  cwd: z.string().nullable(),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  mode: 'child-process',
  driver: 'process',
  timeoutMs: 30_000,
  handshakeTimeoutMs: 5_000,
  fillerLine: null,
  encoding: 'utf8',
  logLevel: 'warn',
  transcriptLimit: 1_000,
  executable: null,
  args: [],
  cwd: null,
};

/**
 * .what = the environment variables a session honors
 */
const SessionEnvSchema = z.object({
  MACROLINK_MODE: SessionConfigSchema.shape.mode.optional(),
  MACROLINK_TIMEOUT_MS: z.coerce.number().optional(),
  MACROLINK_HANDSHAKE_TIMEOUT_MS: z.coerce.number().optional(),
  MACROLINK_LOG_LEVEL: SessionConfigSchema.shape.logLevel.optional(),
  MACROLINK_EXECUTABLE: z.string().optional(),
});

/**
 * .what = resolve the session config: defaults, then env, then explicit overrides
 * .why = fail fast at startup with every invalid field named, instead of mid-session
 */
export const getOneSessionConfig = (input: {
  overrides?: Partial<SessionConfig>;
  env?: Record<string, string | undefined>;
}): SessionConfig => {
  // read env
  const envParsed = SessionEnvSchema.safeParse(input.env ?? {});
  if (!envParsed.success)
    BadRequestError.throw('invalid session environment', {
      issues: envParsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  const env = envParsed.data;
  const fromEnv: Partial<SessionConfig> = {};
  if (env.MACROLINK_MODE !== undefined) fromEnv.mode = env.MACROLINK_MODE;
  if (env.MACROLINK_TIMEOUT_MS !== undefined)
    fromEnv.timeoutMs = env.MACROLINK_TIMEOUT_MS;
  if (env.MACROLINK_HANDSHAKE_TIMEOUT_MS !== undefined)
    fromEnv.handshakeTimeoutMs = env.MACROLINK_HANDSHAKE_TIMEOUT_MS;
  if (env.MACROLINK_LOG_LEVEL !== undefined)
    fromEnv.logLevel = env.MACROLINK_LOG_LEVEL;
  if (env.MACROLINK_EXECUTABLE !== undefined)
    fromEnv.executable = env.MACROLINK_EXECUTABLE;

  // merge and validate
  const parsed = SessionConfigSchema.safeParse({
    ...DEFAULT_SESSION_CONFIG,
    ...fromEnv,
    ...input.overrides,
  });
  if (!parsed.success)
    BadRequestError.throw('invalid session config', {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  return parsed.data;
};
