import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().optional(),
  PGHOST: z.string().optional(),
  PGDATABASE: z.string().optional(),
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),
  PGPORT: z.coerce.number().int().positive().default(5432),
  PGSSL: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  FRONTEND_URL: z.string().default('http://localhost:5173'),
  APP_VERSION: z.string().default('0.1.0'),
  DEFAULT_USER_ID: z.string().min(1).default('demo-user'),
  PUBLIC_DIR: z.string().default(path.join(process.cwd(), 'public')),
  NODE_ENV: z.string().default('development'),
});

export type AppConfig = z.infer<typeof envSchema>;

// Throws a ZodError on an invalid environment
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}
