/**
 * Firebase Authentication configuration schema
 *
 * With an API key the identity-provider token is traded for a Firebase
 * ID token, which then authorizes document calls.
 */

import { z } from 'zod';

export const FirebaseConfigSchema = z.object({
  // host:port of the Auth emulator, e.g. 127.0.0.1:9099
  FIREBASE_AUTH_EMULATOR_HOST: z.string().optional(),
});

export const FirebaseSecretsSchema = z.object({
  FIREBASE_API_KEY: z.string().min(1).optional(),
});

export type FirebaseConfig = z.infer<typeof FirebaseConfigSchema>;
export type FirebaseSecrets = z.infer<typeof FirebaseSecretsSchema>;
