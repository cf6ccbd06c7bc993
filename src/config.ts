import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors/error.js";
import { LogLevelSchema, type LevelWithSilent } from "./logger.js";
import {
  DEFAULT_CLOCK_TOLERANCE_SECONDS,
  DEFAULT_ISSUER,
  DEFAULT_TOKEN_TTL_SECONDS,
} from "./token/jwtTokenIssuer.js";
import { DEFAULT_MANAGER_ROLES } from "./employees/employeeManagement.js";

const EnvSchema = z.object({
  JWT_SIGNING_KEY: z.string().trim().min(1, "is required"),
  JWT_ISSUER: z.string().trim().min(1).default(DEFAULT_ISSUER),
  JWT_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TOKEN_TTL_SECONDS),
  JWT_CLOCK_SKEW_SECONDS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_CLOCK_TOLERANCE_SECONDS),
  MANAGER_ROLES: z
    .string()
    .default(DEFAULT_MANAGER_ROLES.join(","))
    .transform((v) =>
      v
        .split(",")
        .map((r) => r.trim())
        .filter((r) => r.length > 0),
    )
    .pipe(z.array(z.string()).min(1, "must name at least one role")),
  LOG_LEVEL: LogLevelSchema.default("info"),
});

export type AppConfig = {
  signingKey: string;
  issuer: string;
  tokenTtlSeconds: number;
  clockSkewSeconds: number;
  managerRoles: string[];
  logLevel: LevelWithSilent;
};

/**
 * Copies the variables of a dotenv file into `env` (process.env unless given).
 * Variables already set in `env` win. A missing file is not an error.
 */
export function loadEnvFile(
  path = ".env",
  env: NodeJS.ProcessEnv = process.env,
): void {
  const scratch: Record<string, string> = {};
  const result = dotenv.config({ path, processEnv: scratch });
  if (result.error) {
    const missing =
      "code" in result.error && result.error.code === "ENOENT";
    if (!missing) {
      throw new ConfigError(`Cannot read ${path}: ${result.error.message}`);
    }
    return;
  }

  for (const [key, value] of Object.entries(result.parsed ?? {})) {
    if (env[key] === undefined) env[key] = value;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError(
      `Invalid configuration: ${problems.join("; ")}`,
      problems,
    );
  }

  const e = parsed.data;
  return {
    signingKey: e.JWT_SIGNING_KEY,
    issuer: e.JWT_ISSUER,
    tokenTtlSeconds: e.JWT_TTL_SECONDS,
    clockSkewSeconds: e.JWT_CLOCK_SKEW_SECONDS,
    managerRoles: e.MANAGER_ROLES,
    logLevel: e.LOG_LEVEL,
  };
}
