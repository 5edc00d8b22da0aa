/**
 * Google Calendar REST helpers
 *
 * Token exchange and authenticated requests. Every JSON response is parsed
 * through the zod schema supplied by the caller.
 */

import type { z } from 'zod';
import type { GoogleCredentials } from '../../schemas/index.js';
import { GoogleTokenResponseSchema } from './types.js';
import type { FetchFn } from './types.js';

export const GOOGLE_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';
export const GOOGLE_CALENDAR_API = 'https://www.googleapis.com/calendar/v3';

/**
 * Non-2xx response from a Google endpoint
 */
export class GoogleApiError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'GoogleApiError';
    this.statusCode = statusCode;
  }
}

/**
 * Get access token from refresh token
 */
export async function getAccessToken(
  fetchFn: FetchFn,
  credentials: GoogleCredentials
): Promise<string> {
  const params = new URLSearchParams({
    client_id: credentials.clientId,
    client_secret: credentials.clientSecret,
    refresh_token: credentials.refreshToken,
    grant_type: 'refresh_token',
  });

  const response = await fetchFn(GOOGLE_TOKEN_ENDPOINT, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
    },
    body: params.toString(),
  });

  if (!response.ok) {
    throw new GoogleApiError(
      `Google OAuth error: ${response.status} ${response.statusText}`,
      response.status
    );
  }

  const data = GoogleTokenResponseSchema.parse(await response.json());
  return data.access_token;
}

export interface CalendarRequest {
  method?: 'GET' | 'POST' | 'PATCH' | 'DELETE';
  params?: Record<string, string>;
  body?: unknown;
}

/**
 * Execute a Calendar API request and validate the JSON response
 */
export async function requestCalendarAPI<S extends z.ZodTypeAny>(
  fetchFn: FetchFn,
  accessToken: string,
  endpoint: string,
  schema: S,
  request: CalendarRequest = {}
): Promise<z.output<S>> {
  const response = await sendCalendarRequest(fetchFn, accessToken, endpoint, request);
  return schema.parse(await response.json());
}

/**
 * Execute a Calendar API request whose response body is ignored (DELETE, PATCH)
 */
export async function sendCalendarRequest(
  fetchFn: FetchFn,
  accessToken: string,
  endpoint: string,
  request: CalendarRequest = {}
): Promise<Response> {
  const url = new URL(`${GOOGLE_CALENDAR_API}${endpoint}`);
  for (const [key, value] of Object.entries(request.params ?? {})) {
    url.searchParams.set(key, value);
  }

  const init: RequestInit = {
    method: request.method ?? 'GET',
    headers: {
      Authorization: `Bearer ${accessToken}`,
      'Content-Type': 'application/json',
    },
  };
  if (request.body !== undefined) {
    init.body = JSON.stringify(request.body);
  }

  const response = await fetchFn(url.toString(), init);

  if (!response.ok) {
    throw new GoogleApiError(
      `Google Calendar API error: ${response.status} ${response.statusText}`,
      response.status
    );
  }

  return response;
}
