import type { VcdSession } from '../client/types';
import type { Logger } from '../logging';

/**
 * Log in, run `body`, and log out exactly once whichever way `body` exits.
 * When both `body` and the logout fail, the error from `body` wins.
 */
export async function withSession<T>(
  session: VcdSession,
  body: (session: VcdSession) => Promise<T>,
  logger?: Logger
): Promise<T> {
  await session.login();

  let result: T;
  try {
    result = await body(session);
  } catch (error) {
    try {
      await session.logout();
    } catch (logoutError) {
      const { username, org } = session.credentials;
      logger?.warn(`Logout of ${username}@${org} failed: ${logoutError instanceof Error ? logoutError.message : String(logoutError)}`);
    }
    throw error;
  }

  await session.logout();
  return result;
}
