import { ClientSession, mongo } from 'mongoose';

export type SessionRef = ClientSession | null;

/**
 * Wraps every patch value in `$literal` for use inside an update pipeline, so a
 * user-supplied string such as "$amount" is stored as text rather than read as a field path.
 */
export function literalSet(patch: object): Record<string, { $literal: unknown }> {
  const stage: Record<string, { $literal: unknown }> = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      stage[key] = { $literal: value };
    }
  }
  return stage;
}

export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongo.MongoServerError && error.code === 11000;
}
