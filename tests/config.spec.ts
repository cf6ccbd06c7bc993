import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig, loadEnvFile } from "../src/config.js";
import {
  createEmployeeAuthService,
  createEmployeeAuthServiceFromEnv,
} from "../src/bootstrap.js";
import { InMemoryEmployeeRepository } from "../src/employees/memoryRepository.js";
import { ConfigError, InvalidKeyError } from "../src/errors/error.js";
import { parseLogLevel } from "../src/logger.js";
import { TEST_KEY, silentLogger } from "./helpers.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ JWT_SIGNING_KEY: TEST_KEY })).toEqual({
      signingKey: TEST_KEY,
      issuer: "employee-management",
      tokenTtlSeconds: 360_000,
      clockSkewSeconds: 60,
      managerRoles: ["ADMIN"],
      logLevel: "info",
    });
  });

  it("reads overrides", () => {
    const cfg = loadConfig({
      JWT_SIGNING_KEY: TEST_KEY,
      JWT_ISSUER: "hr-backend",
      JWT_TTL_SECONDS: "900",
      JWT_CLOCK_SKEW_SECONDS: "0",
      MANAGER_ROLES: "ADMIN, HR ,",
      LOG_LEVEL: "DEBUG",
    });

    expect(cfg.issuer).toBe("hr-backend");
    expect(cfg.tokenTtlSeconds).toBe(900);
    expect(cfg.clockSkewSeconds).toBe(0);
    expect(cfg.managerRoles).toEqual(["ADMIN", "HR"]);
    expect(cfg.logLevel).toBe("debug");
  });

  it("requires the signing key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(/JWT_SIGNING_KEY/);
  });

  it("lists every invalid variable", () => {
    try {
      loadConfig({
        JWT_SIGNING_KEY: TEST_KEY,
        JWT_TTL_SECONDS: "-5",
        LOG_LEVEL: "loud",
      });
      expect.unreachable("invalid config accepted");
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) {
        expect(e.code).toBe("AUTH_CONFIG_ERROR");
        expect(e.message).toMatch(/JWT_TTL_SECONDS/);
        expect(e.message).toMatch(/LOG_LEVEL/);
      }
    }
  });

  it("rejects an empty manager role list", () => {
    expect(() =>
      loadConfig({ JWT_SIGNING_KEY: TEST_KEY, MANAGER_ROLES: " , " }),
    ).toThrow(/MANAGER_ROLES/);
  });
});

describe("loadEnvFile", () => {
  let dir: string;
  let envFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "employee-auth-env-"));
    envFile = join(dir, ".env");
    writeFileSync(
      envFile,
      [
        `JWT_SIGNING_KEY=${TEST_KEY}`,
        "JWT_ISSUER=from-file",
        "JWT_TTL_SECONDS=1234",
        "",
      ].join("\n"),
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("fills unset variables from the file and keeps the ones already set", () => {
    const env: NodeJS.ProcessEnv = { JWT_ISSUER: "from-env" };
    loadEnvFile(envFile, env);

    const cfg = loadConfig(env);
    expect(cfg.signingKey).toBe(TEST_KEY);
    expect(cfg.issuer).toBe("from-env");
    expect(cfg.tokenTtlSeconds).toBe(1234);
  });

  it("writes only into the env it is given", () => {
    const env: NodeJS.ProcessEnv = {};
    loadEnvFile(envFile, env);

    expect(env.JWT_ISSUER).toBe("from-file");
    expect(process.env.JWT_ISSUER).toBeUndefined();
  });

  it("ignores a missing file", () => {
    const env: NodeJS.ProcessEnv = { JWT_ISSUER: "from-env" };
    loadEnvFile(join(dir, "absent.env"), env);
    expect(env).toEqual({ JWT_ISSUER: "from-env" });
  });

  it("starts the service from the file", () => {
    const service = createEmployeeAuthServiceFromEnv(
      { employees: new InMemoryEmployeeRepository(), logger: silentLogger },
      { LOG_LEVEL: "silent" },
      envFile,
    );

    expect(service.tokenIssuer.issuer).toBe("from-file");
    expect(service.tokenIssuer.tokenTtlSeconds).toBe(1234);
    expect(service.config.logLevel).toBe("silent");
  });
});

describe("createEmployeeAuthService", () => {
  it("refuses to start with an undersized key", () => {
    const cfg = loadConfig({
      JWT_SIGNING_KEY: Buffer.alloc(8, 1).toString("base64"),
    });
    expect(() =>
      createEmployeeAuthService(cfg, {
        employees: new InMemoryEmployeeRepository(),
        logger: silentLogger,
      }),
    ).toThrow(InvalidKeyError);
  });
});

describe("parseLogLevel", () => {
  it("falls back to info", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(" WARN ")).toBe("warn");
  });
});
