import type { Logger } from "pino";
import type { AuthError } from "./errors/error.js";
import type { CredentialChecker, RoleProvider } from "./adapters/types.js";
import type { TokenIssuer } from "./token/types.js";

export type AuthCoreConfig = {
  clockSkewSeconds?: number;
  /** reject logins for users that hold no role (default true) */
  requireRoles?: boolean;
  clock?: () => Date;
};

export type AuthCoreAdapters = {
  credentialChecker: CredentialChecker;
  roleProvider: RoleProvider;
  tokenIssuer: TokenIssuer;
  logger?: Logger;
};

export type AuthenticateInput = {
  principal: string;
  password: string;
};

export type AuthenticateResult =
  | {
      ok: true;
      accessToken: string;
      userId: string;
      username: string;
      authorities: string[];
      issuedAt: string;
      expiresAt: string;
    }
  | {
      ok: false;
      error: AuthError;
    };

export type AuthorizeInput = {
  token: string;
  required?: {
    anyRoles?: string[];
    allRoles?: string[];
  };
};

export type AuthorizeResult =
  | {
      ok: true;
      username: string;
      authorities: string[];
      expiresAt: string;
    }
  | {
      ok: false;
      error: AuthError;
    };

export interface AuthCore {
  doAuthenticate(input: AuthenticateInput): Promise<AuthenticateResult>;
  doAuthorize(input: AuthorizeInput): Promise<AuthorizeResult>;
}
