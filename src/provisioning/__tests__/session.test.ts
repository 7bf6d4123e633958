import { describe, it, expect, beforeEach } from 'vitest';
import { withSession } from '../session';
import type { VcdSession } from '../../client/types';
import { InMemoryVcd } from '../../__tests__/fixtures/in-memory-vcd';
import { MemoryLogger } from '../../__tests__/fixtures/memory-logger';

describe('withSession', () => {
  let vcd: InMemoryVcd;
  let session: VcdSession;

  beforeEach(() => {
    vcd = new InMemoryVcd();
    session = vcd.createSession({ org: 'System', username: 'administrator', password: 'test-secret' });
  });

  it('should log in, run the body and log out', async () => {
    const result = await withSession(session, async client => {
      expect(client.isLoggedIn).toBe(true);
      return (await client.listResources('pvdc')).map(pvdc => pvdc.name);
    });

    expect(result).toEqual(['pvdc-a']);
    expect(vcd.logins).toEqual(['administrator@System']);
    expect(vcd.logouts).toEqual(['administrator@System']);
    expect(session.isLoggedIn).toBe(false);
  });

  it('should log out and rethrow when the body fails', async () => {
    const failure = new Error('body failed');

    await expect(withSession(session, async () => Promise.reject(failure))).rejects.toBe(failure);
    expect(vcd.activeSessions).toBe(0);
  });

  it('should keep the error of the body when the logout fails too', async () => {
    const logger = new MemoryLogger();
    const failure = new Error('body failed');
    session.logout = async () => Promise.reject(new Error('logout failed'));

    await expect(withSession(session, async () => Promise.reject(failure), logger)).rejects.toBe(failure);
    expect(logger.messages('warn')).toEqual(['Logout of administrator@System failed: logout failed']);
  });

  it('should not run the body when the login is rejected', async () => {
    const user = vcd.createSession({ org: 'test_org', username: 'vapp_user', password: 'test-secret' });
    let ran = false;

    await expect(
      withSession(user, async () => {
        ran = true;
      })
    ).rejects.toThrow('Login of vapp_user@test_org was rejected');
    expect(ran).toBe(false);
    expect(vcd.logins).toEqual([]);
  });
});
