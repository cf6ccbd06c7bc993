import { SignJWT, jwtVerify, errors } from "jose";
import { z } from "zod";
import {
  AuthCoreError,
  ConfigError,
  InvalidIdentityError,
  InvalidTokenError,
  TokenExpiredError,
} from "../errors/error.js";
import {
  authoritiesFromRoles,
  canonicalizeAuthorities,
  parseAuthorities,
} from "./authorities.js";
import { loadSigningKey, type SigningKey } from "./signingKey.js";
import type {
  Authority,
  RoleRecord,
  SessionContext,
  TokenClaims,
  TokenIssuer,
  VerifiedToken,
  VerifyTokenOptions,
} from "./types.js";

export const DEFAULT_ISSUER = "employee-management";
export const DEFAULT_TOKEN_TTL_SECONDS = 360_000; // 100 hours
export const DEFAULT_CLOCK_TOLERANCE_SECONDS = 60;

const ALG = "HS256";

export type JwtTokenIssuerConfig = {
  key: SigningKey;
  issuer?: string;
  tokenTtlSeconds?: number;
  clock?: () => Date;
};

const TokenClaimsSchema = z.object({
  iss: z.string(),
  iat: z.number().int(),
  exp: z.number().int(),
  username: z.string().min(1),
  authorities: z.string(),
});

function isNonEmptyString(x: unknown): x is string {
  return typeof x === "string" && x.trim().length > 0;
}

export function toEpochSeconds(d: Date): number {
  return Math.floor(d.getTime() / 1000);
}

export function tokenWindow(now: Date, tokenTtlSeconds: number) {
  const iat = toEpochSeconds(now);
  return { iat, exp: iat + tokenTtlSeconds };
}

function mapVerifyError(e: unknown): AuthCoreError {
  if (e instanceof AuthCoreError) return e;
  if (e instanceof errors.JWTExpired) return new TokenExpiredError();
  const cause = e instanceof Error ? e.message : String(e);
  return new InvalidTokenError("Token invalid", { cause });
}

export class JwtTokenIssuer implements TokenIssuer {
  readonly issuer: string;
  readonly tokenTtlSeconds: number;

  private readonly key: SigningKey;
  private readonly clock: () => Date;

  constructor(cfg: JwtTokenIssuerConfig) {
    const ttl = cfg.tokenTtlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS;
    if (!Number.isInteger(ttl) || ttl <= 0) {
      throw new ConfigError("tokenTtlSeconds must be a positive integer", {
        tokenTtlSeconds: ttl,
      });
    }
    const issuer = cfg.issuer ?? DEFAULT_ISSUER;
    if (!isNonEmptyString(issuer)) {
      throw new ConfigError("issuer must be a non-empty string");
    }

    this.key = cfg.key;
    this.issuer = issuer;
    this.tokenTtlSeconds = ttl;
    this.clock = cfg.clock ?? (() => new Date());
  }

  /**
   * Signs `{ username, authorities }` with issuer, issued-at and expiry.
   * `now` is read per call; identical inputs produce an identical token.
   */
  async issue(
    identity: string,
    authorities: Iterable<Authority>,
    now: Date = this.clock(),
  ): Promise<string> {
    if (!isNonEmptyString(identity)) throw new InvalidIdentityError();

    const { iat, exp } = tokenWindow(now, this.tokenTtlSeconds);

    return new SignJWT({
      username: identity,
      authorities: canonicalizeAuthorities(authorities),
    })
      .setProtectedHeader({ alg: ALG, typ: "JWT" })
      .setIssuer(this.issuer)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .sign(this.key);
  }

  issueForSession(session: SessionContext, now?: Date): Promise<string> {
    return this.issue(session.username, session.authorities, now);
  }

  issueForRoles(
    username: string,
    roles: Iterable<RoleRecord>,
    now?: Date,
  ): Promise<string> {
    return this.issue(username, authoritiesFromRoles(roles), now);
  }

  async verify(
    token: string,
    options: VerifyTokenOptions = {},
  ): Promise<VerifiedToken> {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, this.key, {
        algorithms: [ALG],
        issuer: this.issuer,
        clockTolerance:
          options.clockToleranceSeconds ?? DEFAULT_CLOCK_TOLERANCE_SECONDS,
        currentDate: options.now ?? this.clock(),
        requiredClaims: ["iat", "exp"],
      }));
    } catch (e) {
      throw mapVerifyError(e);
    }

    const parsed = TokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidTokenError("Token missing required claims", {
        issues: parsed.error.issues.map((i) => i.path.join(".")),
      });
    }

    const claims: TokenClaims = parsed.data;
    return {
      username: claims.username,
      authorities: parseAuthorities(claims.authorities),
      issuedAt: new Date(claims.iat * 1000),
      expiresAt: new Date(claims.exp * 1000),
      claims,
    };
  }
}

export type CreateTokenIssuerOptions = Omit<JwtTokenIssuerConfig, "key"> & {
  /** base64-encoded HMAC secret */
  signingKey: string;
};

/** Loads the key and builds the issuer; throws InvalidKeyError on bad key material. */
export function createTokenIssuer(
  options: CreateTokenIssuerOptions,
): JwtTokenIssuer {
  const { signingKey, ...rest } = options;
  return new JwtTokenIssuer({ ...rest, key: loadSigningKey(signingKey) });
}
