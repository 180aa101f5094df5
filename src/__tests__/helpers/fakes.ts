/**
 * In-process stand-ins for the catalogs, the token store and the accounts service
 */

import type { AuthClient, TokenRecord, TokenStore } from '../../auth/types.js';
import { SourceNotFoundError } from '../../errors.js';
import type {
  AccessTokenProvider,
  Candidate,
  SourceCatalog,
  SourcePlaylist,
  TargetCatalog
} from '../../migration/types.js';

export class FakeSourceCatalog implements SourceCatalog {
  readonly calls: Array<{ playlistId: string; limit?: number }> = [];
  private readonly playlists = new Map<string, SourcePlaylist>();

  constructor(playlists: SourcePlaylist[] = []) {
    for (const playlist of playlists) {
      this.playlists.set(playlist.id, playlist);
    }
  }

  async fetchPlaylist(playlistId: string, options: { limit?: number } = {}): Promise<SourcePlaylist> {
    this.calls.push({ playlistId, limit: options.limit });
    const playlist = this.playlists.get(playlistId);
    if (!playlist) {
      throw new SourceNotFoundError(playlistId);
    }
    return { ...playlist, tracks: [...playlist.tracks] };
  }
}

type SearchHandler = (query: string, limit: number, call: number) => Promise<Candidate[]> | Candidate[];

export class FakeTargetCatalog implements TargetCatalog {
  readonly searches: string[] = [];
  readonly created: Array<{ id: string; name: string; description?: string }> = [];
  readonly covers: Array<{ playlistId: string; bytes: number }> = [];
  readonly appendCalls: Array<{ playlistId: string; targetIds: string[] }> = [];
  /** Track ids per playlist, in append order */
  readonly playlists = new Map<string, string[]>();

  private nextPlaylist = 1;
  private searchHandler: SearchHandler = () => [];
  appendHandler: (playlistId: string, targetIds: string[], call: number) => Promise<void> | void = () => undefined;
  createHandler: (name: string) => Promise<void> | void = () => undefined;
  coverHandler: (playlistId: string) => Promise<void> | void = () => undefined;

  /**
   * Answer searches from a table of query fragment -> candidates
   */
  withResults(table: Record<string, Candidate[]>): this {
    this.searchHandler = query => {
      const key = Object.keys(table).find(fragment => query.includes(fragment));
      return key ? table[key] : [];
    };
    return this;
  }

  onSearch(handler: SearchHandler): this {
    this.searchHandler = handler;
    return this;
  }

  async search(query: string, limit: number): Promise<Candidate[]> {
    this.searches.push(query);
    return this.searchHandler(query, limit, this.searches.length);
  }

  async createPlaylist(name: string, options: { description?: string } = {}): Promise<string> {
    await this.createHandler(name);
    const id = `pl-${this.nextPlaylist++}`;
    this.created.push({ id, name, description: options.description });
    this.playlists.set(id, []);
    return id;
  }

  async uploadCover(playlistId: string, image: Buffer): Promise<void> {
    await this.coverHandler(playlistId);
    this.covers.push({ playlistId, bytes: image.length });
  }

  async appendTracks(playlistId: string, targetIds: string[]): Promise<void> {
    this.appendCalls.push({ playlistId, targetIds: [...targetIds] });
    await this.appendHandler(playlistId, targetIds, this.appendCalls.length);
    this.playlists.get(playlistId)?.push(...targetIds);
  }
}

export class MemoryTokenStore implements TokenStore {
  saved: TokenRecord[] = [];

  constructor(private record: TokenRecord | null = null) {}

  async load(): Promise<TokenRecord | null> {
    return this.record ? { ...this.record, scopes: [...this.record.scopes] } : null;
  }

  async save(record: TokenRecord): Promise<void> {
    this.record = { ...record, scopes: [...record.scopes] };
    this.saved.push(this.record);
  }
}

export class FakeAuthClient implements AuthClient {
  readonly refreshCalls: string[] = [];
  readonly codes: string[] = [];
  refreshHandler: (refreshToken: string, call: number) => Promise<TokenRecord> | TokenRecord;
  exchangeHandler: (code: string) => Promise<TokenRecord> | TokenRecord;

  constructor(issue: (label: string) => TokenRecord) {
    this.refreshHandler = (_token, call) => issue(`refreshed-${call}`);
    this.exchangeHandler = code => issue(`exchanged-${code}`);
  }

  async refresh(refreshToken: string): Promise<TokenRecord> {
    this.refreshCalls.push(refreshToken);
    return this.refreshHandler(refreshToken, this.refreshCalls.length);
  }

  async exchangeAuthCode(code: string): Promise<TokenRecord> {
    this.codes.push(code);
    return this.exchangeHandler(code);
  }
}

export class StaticTokenProvider implements AccessTokenProvider {
  calls = 0;

  constructor(private readonly token = 'test-access-token') {}

  async getValidToken(): Promise<string> {
    this.calls++;
    return this.token;
  }
}

/** Retry options that never wait */
export const instantRetry = { sleep: async () => undefined, random: () => 0 };
