import type {
  AuthCore,
  AuthCoreAdapters,
  AuthCoreConfig,
  AuthenticateInput,
  AuthenticateResult,
  AuthorizeInput,
  AuthorizeResult,
} from "./types.js";
import { err, toAuthError } from "./errors/error.js";
import {
  authoritiesFromRoles,
  canonicalizeAuthorities,
  parseAuthorities,
} from "./token/authorities.js";
import {
  DEFAULT_CLOCK_TOLERANCE_SECONDS,
  tokenWindow,
} from "./token/jwtTokenIssuer.js";
import type { VerifiedToken } from "./token/types.js";
import { logger as defaultLogger } from "./logger.js";

function hasAllRoles(userRoles: string[], all: string[]) {
  const set = new Set(userRoles);
  return all.every((r) => set.has(r));
}

function hasAnyRole(userRoles: string[], any: string[]) {
  const set = new Set(userRoles);
  return any.some((r) => set.has(r));
}

function mapCredentialFailure(reason?: string) {
  switch (reason) {
    case "USER_LOCKED":
      return err("AUTH_USER_LOCKED", "User is locked");
    case "USER_DISABLED":
      return err("AUTH_USER_DISABLED", "User is disabled");
    default:
      return err("AUTH_INVALID_CREDENTIALS", "Invalid credentials");
  }
}

function isoFromEpochSeconds(seconds: number) {
  return new Date(seconds * 1000).toISOString();
}

export function createAuthCore(
  config: AuthCoreConfig,
  adapters: AuthCoreAdapters,
): AuthCore {
  const clockSkewSeconds = config.clockSkewSeconds ?? DEFAULT_CLOCK_TOLERANCE_SECONDS;
  if (!Number.isFinite(clockSkewSeconds) || clockSkewSeconds < 0) {
    throw new Error("AuthCoreConfig.clockSkewSeconds must be >= 0");
  }

  const requireRoles = config.requireRoles ?? true;
  const clock = config.clock ?? (() => new Date());
  const log = (adapters.logger ?? defaultLogger).child({
    component: "auth-core",
  });
  const { tokenIssuer } = adapters;

  async function doAuthenticate(
    input: AuthenticateInput,
  ): Promise<AuthenticateResult> {
    try {
      const principal = String(input.principal ?? "").trim();
      const password = String(input.password ?? "");

      if (!principal) {
        return {
          ok: false,
          error: err("AUTH_INVALID_IDENTITY", "principal is required"),
        };
      }

      const cred = await adapters.credentialChecker.checkUserNamePassword(
        principal,
        password,
      );
      if (!cred.ok) {
        log.info({ principal, reason: cred.reason }, "login rejected");
        return { ok: false, error: mapCredentialFailure(cred.reason) };
      }

      const { userId, username } = cred;
      const roles = await adapters.roleProvider.getUserRoles(userId);

      // An employee without roles cannot be granted a session.
      if (requireRoles && roles.length === 0) {
        log.warn({ userId }, "login rejected: user holds no roles");
        return {
          ok: false,
          error: err("AUTH_NO_ROLES", "User holds no roles", { userId }),
        };
      }

      const now = clock();
      const accessToken = await tokenIssuer.issueForRoles(username, roles, now);
      const { iat, exp } = tokenWindow(now, tokenIssuer.tokenTtlSeconds);
      const authorities = parseAuthorities(
        canonicalizeAuthorities(authoritiesFromRoles(roles)),
      );

      log.debug({ userId, username, authorities }, "token issued");

      return {
        ok: true,
        accessToken,
        userId,
        username,
        authorities,
        issuedAt: isoFromEpochSeconds(iat),
        expiresAt: isoFromEpochSeconds(exp),
      };
    } catch (e) {
      log.error({ err: e }, "authenticate failed");
      return { ok: false, error: toAuthError(e) };
    }
  }

  async function doAuthorize(input: AuthorizeInput): Promise<AuthorizeResult> {
    let verified: VerifiedToken;
    try {
      verified = await tokenIssuer.verify(input.token, {
        now: clock(),
        clockToleranceSeconds: clockSkewSeconds,
      });
    } catch (e) {
      log.debug({ code: toAuthError(e).code }, "token rejected");
      return { ok: false, error: toAuthError(e) };
    }

    const { username, authorities } = verified;

    const reqAny = input.required?.anyRoles ?? [];
    const reqAll = input.required?.allRoles ?? [];

    if (reqAll.length > 0 && !hasAllRoles(authorities, reqAll)) {
      return {
        ok: false,
        error: err("AUTH_FORBIDDEN", "Missing required roles (allRoles)", {
          requiredAll: reqAll,
          actual: authorities,
        }),
      };
    }

    if (reqAny.length > 0 && !hasAnyRole(authorities, reqAny)) {
      return {
        ok: false,
        error: err("AUTH_FORBIDDEN", "Missing required roles (anyRoles)", {
          requiredAny: reqAny,
          actual: authorities,
        }),
      };
    }

    return {
      ok: true,
      username,
      authorities,
      expiresAt: verified.expiresAt.toISOString(),
    };
  }

  return { doAuthenticate, doAuthorize };
}
