import { config as loadDotenv } from 'dotenv';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

/** Load .env file from daemon directory */
const currentFile = fileURLToPath(import.meta.url);
const daemonDir = dirname(currentFile);
const envPath = join(daemonDir, '../.env');
loadDotenv({ path: envPath });

/**
 * Validate a source of environment variables against a Zod schema,
 * collecting every issue into one readable error.
 */
function loadEnv<T extends z.ZodTypeAny>(
  schema: T,
  source: Record<string, string | undefined>
): z.infer<T> {
  try {
    return schema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errorMessages = error.issues
        .map((err) => ` - ${err.path.join('.')}: ${err.message}`)
        .join('\n');
      throw new Error(
        `Environment variable validation failed:\n${errorMessages}\n\nSet these in .env file or environment.`
      );
    }
    throw error;
  }
}

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof logLevelSchema>;

function integerSetting(name: string, fallback: number, min: number) {
  return z
    .string()
    .optional()
    .transform((val, ctx) => {
      if (val === undefined || val.trim() === '') return fallback;
      const parsed = Number.parseInt(val, 10);
      if (Number.isNaN(parsed) || parsed < min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${name} must be an integer >= ${min}`,
        });
        return z.NEVER;
      }
      return parsed;
    });
}

const schema = z.object({
  /**
   * Explicit path to the claude executable.
   * When unset the binary is looked up on PATH and in common install locations.
   */
  SQUADRON_CLAUDE_PATH: z.string().optional(),
  /**
   * Extra arguments appended to every CLI invocation, space separated
   * (e.g. "--model sonnet").
   */
  SQUADRON_CLAUDE_ARGS: z
    .string()
    .optional()
    .transform((val) => (val ? val.split(/\s+/).filter((arg) => arg.length > 0) : [])),
  /**
   * Log level for the daemon.
   * Valid values: "debug", "info", "warn", "error"
   * Defaults to "info"
   */
  LOG_LEVEL: logLevelSchema.default('info'),
  /**
   * State directory for logs.
   * Defaults to ~/.squadron
   */
  SQUADRON_STATE_DIR: z.string().default(join(homedir(), '.squadron')),
  /**
   * Grace period before a fully completed team is disbanded.
   * Defaults to 8000ms.
   */
  SQUADRON_DISBAND_DELAY_MS: integerSetting('SQUADRON_DISBAND_DELAY_MS', 8000, 0),
  /**
   * Number of sub-agents created under each new commander.
   * Defaults to 2.
   */
  SQUADRON_TEAM_SIZE: integerSetting('SQUADRON_TEAM_SIZE', 2, 0),
  /**
   * Tool calls that correspond to full progress in the running estimate.
   * Defaults to 20.
   */
  SQUADRON_PROGRESS_TOOL_CALLS: integerSetting('SQUADRON_PROGRESS_TOOL_CALLS', 20, 1),
  /**
   * Kill and fail a process that writes nothing to stdout for this long.
   * 0 disables the watchdog (default).
   */
  SQUADRON_STALL_TIMEOUT_MS: integerSetting('SQUADRON_STALL_TIMEOUT_MS', 0, 0),
  /**
   * Directory where the CLI writes plan files in plan mode.
   * Defaults to ~/.claude/plans
   */
  CLAUDE_PLANS_DIR: z.string().default(join(homedir(), '.claude', 'plans')),
});

export type DaemonConfig = z.infer<typeof schema>;

export function parseDaemonConfig(source: Record<string, string | undefined>): DaemonConfig {
  return loadEnv(schema, source);
}

export const daemonConfig = parseDaemonConfig(process.env);
