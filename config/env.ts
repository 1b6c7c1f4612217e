import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const environmentSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  FETCH_USER_AGENT: z
    .string()
    .min(1)
    .default("Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7)")
});

export type Environment = z.infer<typeof environmentSchema>;

export const parseEnvironment = (
  rawEnv: NodeJS.ProcessEnv = process.env
): Environment => environmentSchema.parse(rawEnv);

export const env = parseEnvironment();
