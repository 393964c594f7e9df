import "dotenv/config";
import path from "node:path";
import { z } from "zod";

export enum PostStorage {
  FILE = "file",
  MEMORY = "memory",
}

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5002),
  HOST: z.string().min(1).default("0.0.0.0"),
  POST_STORAGE: z.nativeEnum(PostStorage).default(PostStorage.FILE),
  DATA_FILE: z.string().min(1).default("data/blog_storage.json"),
  CORS_ALLOW_ORIGIN: z.string().min(1).default("*"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  CREATE_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 1000),
  CREATE_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse({
  PORT: process.env.PORT,
  HOST: process.env.HOST,
  POST_STORAGE: process.env.POST_STORAGE,
  DATA_FILE: process.env.DATA_FILE,
  CORS_ALLOW_ORIGIN: process.env.CORS_ALLOW_ORIGIN,
  RATE_LIMIT_WINDOW_MS: process.env.RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX: process.env.RATE_LIMIT_MAX,
  CREATE_RATE_LIMIT_WINDOW_MS: process.env.CREATE_RATE_LIMIT_WINDOW_MS,
  CREATE_RATE_LIMIT_MAX: process.env.CREATE_RATE_LIMIT_MAX,
  LOG_LEVEL: process.env.LOG_LEVEL || undefined,
});

// Relative paths are taken from the working directory the server starts in
export function getDataFilePath(): string {
  return path.resolve(process.cwd(), env.DATA_FILE);
}

export interface HttpConfig {
  corsAllowOrigin: string;
  rateLimit: {
    windowMs: number;
    max: number;
  };
  createRateLimit: {
    windowMs: number;
    max: number;
  };
}

export function getHttpConfig(): HttpConfig {
  return {
    corsAllowOrigin: env.CORS_ALLOW_ORIGIN,
    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX,
    },
    createRateLimit: {
      windowMs: env.CREATE_RATE_LIMIT_WINDOW_MS,
      max: env.CREATE_RATE_LIMIT_MAX,
    },
  };
}
