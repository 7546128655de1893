import { z } from 'zod';

const JwkJsonSchema = z
  .string()
  .transform((value, ctx): unknown => {
    try {
      return JSON.parse(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'ISSUER_PUBLIC_JWK must be valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(
    z.object({
      kty: z.literal('EC'),
      crv: z.literal('P-256'),
      x: z.string(),
      y: z.string(),
      kid: z.string().optional(),
    }),
  );

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4100),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATA_FILE: z.string().min(1).default('./data/cooldowns.json'),
  SETTINGS_FILE: z.string().min(1).default('./settings.json'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ISSUER_URL: z.string().url().default('http://localhost:4000'),
  AUDIENCE: z.string().min(1).default('action-cooldown'),
  ISSUER_PUBLIC_JWK: JwkJsonSchema.optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return ConfigSchema.parse({
    PORT: env.PORT,
    HOST: env.HOST,
    DATA_FILE: env.DATA_FILE,
    SETTINGS_FILE: env.SETTINGS_FILE,
    LOG_LEVEL: env.LOG_LEVEL,
    ISSUER_URL: env.ISSUER_URL,
    AUDIENCE: env.AUDIENCE,
    ISSUER_PUBLIC_JWK: env.ISSUER_PUBLIC_JWK || undefined,
  });
}

export const config: AppConfig = loadConfig();
