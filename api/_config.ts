import { z } from 'zod';
import { ConfigError, errorMessage } from './_errors';
import { DEFAULT_SHEET_NAME } from '../src/lib/constants';

// Shape of a Google service-account key file. Unknown keys are rejected.
export const serviceAccountSchema = z.object({
  type: z.literal('service_account'),
  project_id: z.string().optional(),
  private_key_id: z.string().optional(),
  // Keys pasted into env dashboards often arrive with literal "\n" sequences.
  private_key: z.string().min(1).transform((k) => k.replace(/\\n/g, '\n')),
  client_email: z.string().email(),
  client_id: z.string().optional(),
  auth_uri: z.string().url().optional(),
  token_uri: z.string().url().optional(),
  auth_provider_x509_cert_url: z.string().url().optional(),
  client_x509_cert_url: z.string().url().optional(),
  universe_domain: z.string().optional(),
}).strict();

export type ServiceAccountCredential = z.infer<typeof serviceAccountSchema>;

export interface MoodConfig {
  credential: ServiceAccountCredential;
  sheetName: string;
}

export function parseCredential(raw: string | undefined): ServiceAccountCredential {
  if (!raw || !raw.trim()) throw new ConfigError('missing-credentials', 'Google credentials not found!');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError('invalid-credentials', `Credential document is not valid JSON: ${errorMessage(e)}`, e);
  }
  const parsed = serviceAccountSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError('invalid-credentials', `Credential document rejected: ${issues}`, parsed.error);
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MoodConfig {
  return {
    credential: parseCredential(env.GOOGLE_CREDENTIALS_JSON),
    sheetName: env.MOOD_SHEET_NAME?.trim() || DEFAULT_SHEET_NAME,
  };
}
