import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  KYC_STORE_PATH: z.string().min(1).default('kyc_database.xlsx'),
  GEMINI_MODELS: z
    .string()
    .default('gemini-2.5-pro,gemini-2.5-flash')
    .transform((value) =>
      value
        .split(',')
        .map((model) => model.trim())
        .filter((model) => model.length > 0)
    )
    .pipe(z.array(z.string()).min(1, 'GEMINI_MODELS must name at least one model')),
  EARLY_EXIT_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.98),
  MAX_IMAGE_DIMENSION: z.coerce.number().int().positive().default(2048),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10485760),
  SESSION_IDLE_MINUTES: z.coerce.number().positive().default(60),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}

export const config = loadConfig();
