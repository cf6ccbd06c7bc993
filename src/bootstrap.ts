import type { Logger } from "pino";
import type { EmployeeRepository, PasswordHasher } from "./adapters/types.js";
import { loadConfig, loadEnvFile, type AppConfig } from "./config.js";
import {
  createBearerAccessGuard,
  createEmployeeCredentialChecker,
  createEmployeeRoleProvider,
} from "./employees/adapters.js";
import { BcryptPasswordHasher } from "./employees/bcryptPasswordHasher.js";
import {
  createEmployeeManagement,
  type EmployeeManagement,
} from "./employees/employeeManagement.js";
import { createAuthCore } from "./framework.js";
import { createLogger } from "./logger.js";
import { createTokenIssuer, type JwtTokenIssuer } from "./token/jwtTokenIssuer.js";
import type { AuthCore } from "./types.js";

export type EmployeeAuthDeps = {
  employees: EmployeeRepository;
  passwordHasher?: PasswordHasher;
  logger?: Logger;
  clock?: () => Date;
};

export type EmployeeAuthService = {
  config: AppConfig;
  logger: Logger;
  tokenIssuer: JwtTokenIssuer;
  authCore: AuthCore;
  employeeManagement: EmployeeManagement;
};

/**
 * Wires issuer, auth core and employee management from explicit config.
 * The signing key is decoded here, so a bad key (InvalidKeyError) stops
 * startup before anything is served.
 */
export function createEmployeeAuthService(
  config: AppConfig,
  deps: EmployeeAuthDeps,
): EmployeeAuthService {
  const logger = deps.logger ?? createLogger(config.logLevel);
  const passwordHasher = deps.passwordHasher ?? new BcryptPasswordHasher();

  const tokenIssuer = createTokenIssuer({
    signingKey: config.signingKey,
    issuer: config.issuer,
    tokenTtlSeconds: config.tokenTtlSeconds,
    clock: deps.clock,
  });

  const authCore = createAuthCore(
    { clockSkewSeconds: config.clockSkewSeconds, clock: deps.clock },
    {
      credentialChecker: createEmployeeCredentialChecker(
        deps.employees,
        passwordHasher,
      ),
      roleProvider: createEmployeeRoleProvider(deps.employees),
      tokenIssuer,
      logger,
    },
  );

  const employeeManagement = createEmployeeManagement(
    { managerRoles: config.managerRoles },
    {
      employees: deps.employees,
      passwordHasher,
      accessGuard: createBearerAccessGuard(authCore, config.managerRoles),
      authCore,
      logger,
    },
  );

  logger.info(
    {
      issuer: tokenIssuer.issuer,
      tokenTtlSeconds: tokenIssuer.tokenTtlSeconds,
      managerRoles: config.managerRoles,
    },
    "employee auth service ready",
  );

  return { config, logger, tokenIssuer, authCore, employeeManagement };
}

/** Loads `envFile` (default `.env`) into `env`, then builds the service from it. */
export function createEmployeeAuthServiceFromEnv(
  deps: EmployeeAuthDeps,
  env: NodeJS.ProcessEnv = process.env,
  envFile?: string,
): EmployeeAuthService {
  loadEnvFile(envFile, env);
  return createEmployeeAuthService(loadConfig(env), deps);
}
