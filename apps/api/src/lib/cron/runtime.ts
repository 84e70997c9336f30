import { closeDatabase } from '@tracklane/db';

export type Command = (args: string[]) => Promise<void>;

/** Runs a command body and releases the pg pool afterwards, success or not. */
export async function withDatabase<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } finally {
    await closeDatabase();
  }
}
