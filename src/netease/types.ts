export interface NeteaseTrackId {
  id: number;
}

export interface NeteasePlaylistDetail {
  id: number;
  name: string;
  coverImgUrl?: string | null;
  trackIds: NeteaseTrackId[];
}

export interface NeteasePlaylistResponse {
  code: number;
  playlist?: NeteasePlaylistDetail | null;
}

export interface NeteaseArtist {
  id?: number;
  name?: string | null;
}

export interface NeteaseSong {
  id: number;
  name?: string | null;
  ar?: NeteaseArtist[] | null;
  al?: { name?: string | null } | null;
  /** Duration in milliseconds */
  dt?: number | null;
  /** Epoch milliseconds; sometimes absent or implausible */
  publishTime?: number | null;
}

export interface NeteaseSongDetailResponse {
  code: number;
  songs?: NeteaseSong[] | null;
}
