// lib/config.ts
import { z } from "zod";
import { ConfigError } from "./errors";

const envSchema = z.object({
  DB_HOST: z.string().min(1),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_NAME: z.string().min(1),
  DB_USER: z.string().min(1),
  DB_PASSWORD: z.string(),
});

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
}

/**
 * Read the database connection settings from the environment.
 *
 * @throws {ConfigError} naming every missing or invalid variable (code: CONFIG_ENV_INVALID)
 */
export function loadDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [
      ...new Set(parsed.error.issues.map((issue) => issue.path.join("."))),
    ];
    throw new ConfigError(
      `Invalid database configuration: ${variables.join(", ")}`,
      "CONFIG_ENV_INVALID",
      { variables },
    );
  }

  return {
    host: parsed.data.DB_HOST,
    port: parsed.data.DB_PORT,
    database: parsed.data.DB_NAME,
    username: parsed.data.DB_USER,
    password: parsed.data.DB_PASSWORD,
  };
}
