import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  MONGO_URI: z.string().min(1).default('mongodb://localhost:27017/restaurant'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_CLIENT_EMAIL: z.string().optional(),
  FIREBASE_PRIVATE_KEY: z.string().optional(),
  MENU_PAGE_SIZE: z.coerce.number().int().positive().default(2),
  MENU_MAX_PAGE_SIZE: z.coerce.number().int().positive().default(100),
});

export type AppConfig = {
  env: 'development' | 'production' | 'test';
  port: number;
  mongoUri: string;
  logLevel: string;
  firebase: {
    projectId?: string;
    clientEmail?: string;
    privateKey?: string;
  };
  menu: {
    pageSize: number;
    maxPageSize: number;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    mongoUri: e.MONGO_URI,
    logLevel: e.LOG_LEVEL,
    firebase: {
      projectId: e.FIREBASE_PROJECT_ID,
      clientEmail: e.FIREBASE_CLIENT_EMAIL,
      // Keys pasted into .env keep their newlines escaped
      privateKey: e.FIREBASE_PRIVATE_KEY?.replace(/\\n/g, '\n'),
    },
    menu: {
      pageSize: e.MENU_PAGE_SIZE,
      maxPageSize: e.MENU_MAX_PAGE_SIZE,
    },
  };
}

export const config: Readonly<AppConfig> = Object.freeze(loadConfig());
