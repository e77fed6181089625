import { z } from 'zod';

export const DEFAULT_MODEL = 'llama3.2-cybersec:latest';
export const DEFAULT_LOOKBACK_DAYS = 10;

// scp-like remote, e.g. git@host:org/repo.git
const SCP_REMOTE = /^[^@\s/:]+@[^\s/:]+:\S+$/;

function isRepositoryRemote(value: string): boolean {
  if (SCP_REMOTE.test(value)) return true;
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export const RepositoryConfigSchema = z.object({
  /** Remote of the repository to watch: a URL or an scp-style `user@host:path` */
  url: z.string().refine(isRepositoryRemote, {
    message: 'Repository must be a URL or an scp-style remote (user@host:path)',
  }),
  branch: z.string().min(1).default('main'),
  /** Personal access token used only for clone and pull */
  token: z.string().min(1).optional(),
  /** Directory that holds local mirrors, one sub-directory per repository */
  mirrorDir: z.string().min(1).default('./repos'),
});

export const GitConfigSchema = z
  .object({
    timeoutMs: z.coerce.number().int().positive().default(300_000),
  })
  .default({});

export const CheckpointConfigSchema = z.object({
  dbPath: z.string().min(1),
  /** Scan window used right after a fresh clone */
  lookbackDays: z.coerce.number().int().min(0).default(DEFAULT_LOOKBACK_DAYS),
});

export const AnalysisConfigSchema = z.object({
  baseUrl: z.string().url(),
  endpoint: z.string().min(1).default('/v1/chat/completions'),
  apiKey: z.string().min(1),
  model: z.string().min(1).default(DEFAULT_MODEL),
  timeoutMs: z.coerce.number().int().positive().default(120_000),
});

export const ProjectConfigSchema = z
  .object({
    description: z.string().default(''),
  })
  .default({});

export const SmtpConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535).default(587),
  username: z.string().min(1),
  password: z.string().min(1),
  from: z.string().min(1),
  timeoutMs: z.coerce.number().int().positive().default(60_000),
});

export const NotificationConfigSchema = z.object({
  to: z.string().min(1),
});

export const ConfigSchema = z.object({
  repository: RepositoryConfigSchema,
  git: GitConfigSchema,
  checkpoint: CheckpointConfigSchema,
  analysis: AnalysisConfigSchema,
  project: ProjectConfigSchema,
  smtp: SmtpConfigSchema,
  notification: NotificationConfigSchema,
});

export type RepositoryConfig = z.infer<typeof RepositoryConfigSchema>;
export type GitConfig = z.infer<typeof GitConfigSchema>;
export type CheckpointConfig = z.infer<typeof CheckpointConfigSchema>;
export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type SmtpConfig = z.infer<typeof SmtpConfigSchema>;
export type NotificationConfig = z.infer<typeof NotificationConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
/** Shape accepted before defaults and coercion are applied */
export type ConfigInput = z.input<typeof ConfigSchema>;

/** The subset needed to locate a repository's scan history */
export const HistoryConfigSchema = ConfigSchema.pick({ repository: true, checkpoint: true });
export type HistoryConfig = z.infer<typeof HistoryConfigSchema>;
