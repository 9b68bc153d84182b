import type { IProviderSession } from '@quarry/schemas';

/**
 * Scoped session acquisition: connect once, run `work`, always disconnect.
 * A failed connect propagates before `work` starts.
 */
export async function withSession<T>(
  session: IProviderSession,
  work: (session: IProviderSession) => Promise<T>
): Promise<T> {
  await session.connect();
  try {
    return await work(session);
  } finally {
    await session.disconnect();
  }
}
