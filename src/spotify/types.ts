export interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
}

export interface SpotifyArtistRef {
  id: string;
  name: string;
}

export interface SpotifyTrack {
  id: string;
  name: string;
  artists: SpotifyArtistRef[];
  album?: { name?: string };
  duration_ms: number;
  popularity?: number;
}

export interface SpotifyTrackSearchResponse {
  tracks: {
    items: Array<SpotifyTrack | null>;
    total: number;
  };
}

export interface SpotifyUser {
  id: string;
  display_name?: string | null;
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
}
