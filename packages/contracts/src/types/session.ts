export interface SessionIdentity {
  readonly host: string;
  readonly username: string;
  readonly password: string;
}

export interface SessionRecord {
  readonly identity: SessionIdentity;
  readonly token: string;
  readonly createdAt: string;
  readonly renewedAt: string;
  readonly renewals: number;
}

export const sessionKey = (identity: SessionIdentity): string =>
  JSON.stringify([identity.host, identity.username, identity.password]);
