export type Authority = string;

/** Persisted form of an authority granted to an employee. */
export type RoleRecord = {
  roleName: string;
};

/** An identity whose authorities have already been resolved. */
export type SessionContext = {
  username: string;
  authorities: Iterable<Authority>;
};

export type TokenClaims = {
  iss: string;
  iat: number; // epoch seconds
  exp: number; // epoch seconds
  username: string;
  authorities: string; // canonical, comma-joined
};

export type VerifyTokenOptions = {
  now?: Date;
  clockToleranceSeconds?: number;
};

export type VerifiedToken = {
  username: string;
  authorities: Authority[];
  issuedAt: Date;
  expiresAt: Date;
  claims: TokenClaims;
};

export interface TokenIssuer {
  readonly issuer: string;
  readonly tokenTtlSeconds: number;

  issue(
    identity: string,
    authorities: Iterable<Authority>,
    now?: Date,
  ): Promise<string>;
  issueForSession(session: SessionContext, now?: Date): Promise<string>;
  issueForRoles(
    username: string,
    roles: Iterable<RoleRecord>,
    now?: Date,
  ): Promise<string>;
  verify(token: string, options?: VerifyTokenOptions): Promise<VerifiedToken>;
}
