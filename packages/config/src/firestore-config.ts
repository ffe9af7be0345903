/**
 * Firestore configuration schema
 */

import { z } from 'zod';

export const FirestoreConfigSchema = z.object({
  FIRESTORE_PROJECT_ID: z.string().min(1).optional(),
  FIRESTORE_DATABASE_ID: z.string().min(1).default('(default)'),

  // host:port of a local emulator, e.g. 127.0.0.1:8080
  FIRESTORE_EMULATOR_HOST: z.string().optional(),

  // Interval between document polls for watch streams
  FIRESTORE_WATCH_POLL_MS: z.number().int().min(50).default(1000),
});

export type FirestoreConfig = z.infer<typeof FirestoreConfigSchema>;
