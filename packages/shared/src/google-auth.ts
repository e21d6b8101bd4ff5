import { google, type Auth } from 'googleapis';
import type { ServiceAccountCredentials } from './config.js';

export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
] as const;

/** Service-account auth shared by the Sheets queue store and the Drive upload strategy. */
export function createServiceAccountAuth(
  credentials: ServiceAccountCredentials,
  scopes: readonly string[] = GOOGLE_SCOPES,
): Auth.GoogleAuth {
  return new google.auth.GoogleAuth({
    credentials: {
      client_email: credentials.client_email,
      private_key: credentials.private_key,
    },
    projectId: credentials.project_id,
    scopes: [...scopes],
  });
}
