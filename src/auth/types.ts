export interface TokenRecord {
  accessToken: string;
  refreshToken: string;
  /** Epoch milliseconds */
  expiresAt: number;
  scopes: string[];
}

export interface TokenStore {
  load(): Promise<TokenRecord | null>;
  save(record: TokenRecord): Promise<void>;
}

/** Token exchanges against the target catalog's accounts service */
export interface AuthClient {
  exchangeAuthCode(code: string): Promise<TokenRecord>;
  refresh(refreshToken: string): Promise<TokenRecord>;
}

/**
 * Human-in-the-loop step that yields an authorization code.
 * Receives the scopes the code must grant.
 */
export type AuthorizationCodeProvider = (scopes: readonly string[]) => Promise<string>;

export type TokenState =
  | { status: 'unauthorized' }
  | { status: 'authorized'; expiresAt: number; scopes: string[] };

export const REQUIRED_SCOPES: readonly string[] = [
  'playlist-modify-public',
  'playlist-modify-private',
  'ugc-image-upload'
];
