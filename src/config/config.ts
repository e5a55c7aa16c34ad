import { z } from 'zod';
import { ConfigurationError } from '../core/errors';

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .default('0')
  .transform((v) => v === '1' || v === 'true');

const envSchema = z
  .object({
    JIRA_URL: z.string().url(),
    JIRA_USER: z.string().min(1),
    JIRA_PASS: z.string().min(1),
    API_LIB: z.string().default('config/jira-api.json'),
    EXTRACT_PROFILE: z.string().default('config/service-desk-extract.json'),
    SINK: z.enum(['sqlite', 'postgres']).default('sqlite'),
    SQLITE_PATH: z.string().default('data/service-desk.db'),
    SQL_ENDPOINT: z.string().optional(),
    DB_USER: z.string().optional(),
    DB_PASS: z.string().optional(),
    AUDIT_ENABLED: flag,
    AUDIT_LOG_FILE: z.string().default('logs/audit.log'),
    AUDIT_HMAC_KEY: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.SINK !== 'postgres') return;
    for (const key of ['SQL_ENDPOINT', 'DB_USER', 'DB_PASS'] as const) {
      if (!env[key]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'requis lorsque SINK=postgres' });
      }
    }
  });

export type SinkConfig = { kind: 'sqlite'; path: string } | { kind: 'postgres'; connectionString: string };

export interface AppConfig {
  jira: {
    url: string;
    user: string;
    password: string;
  };
  apiLibPath: string;
  profilePath: string;
  sink: SinkConfig;
  audit: {
    enabled: boolean;
    logFile: string;
    hmacKey?: string;
  };
}

/**
 * Chaîne de connexion Postgres ; identifiants encodés (caractères spéciaux des mots de passe).
 * @param endpoint hôte[:port][/base]
 */
export function postgresConnectionString(endpoint: string, user: string, password: string): string {
  return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${endpoint}`;
}

/**
 * Valide l'environnement et construit la configuration de l'exécution.
 * @throws ConfigurationError en listant les variables invalides
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Configuration invalide : ${problems}`);
  }
  const e = parsed.data;

  const sink: SinkConfig =
    e.SINK === 'postgres' && e.SQL_ENDPOINT && e.DB_USER && e.DB_PASS
      ? { kind: 'postgres', connectionString: postgresConnectionString(e.SQL_ENDPOINT, e.DB_USER, e.DB_PASS) }
      : { kind: 'sqlite', path: e.SQLITE_PATH };

  return {
    jira: { url: e.JIRA_URL, user: e.JIRA_USER, password: e.JIRA_PASS },
    apiLibPath: e.API_LIB,
    profilePath: e.EXTRACT_PROFILE,
    sink,
    audit: { enabled: e.AUDIT_ENABLED, logFile: e.AUDIT_LOG_FILE, hmacKey: e.AUDIT_HMAC_KEY || undefined },
  };
}
