import { Player } from '@/modules/matchmaking/types/matchmaking.types';

export interface TwitchTokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
  scope?: string[];
  token_type?: string;
}

export interface TwitchUser {
  id: string;
  login: string;
  display_name: string;
  profile_image_url: string;
}

export interface TwitchStream {
  user_id: string;
  viewer_count: number;
}

/** Envelope of every helix list endpoint */
export interface TwitchListResponse<T> {
  data: T[];
}

export interface TwitchValidateResponse {
  client_id: string;
  login: string;
  user_id: string;
  scopes: string[];
  expires_in: number;
}

export interface LoginResult {
  user: Required<Player>;
  access_token: string;
}

export interface ValidateResult {
  valid: true;
  data: TwitchValidateResponse;
}
