import { RepositoryProvisioner } from './repository_provisioner';
import { MemoryRemoteClient } from '../memory';
import { ProvisionError, TransportError } from '../errors';
import type { RemoteClient } from '../remote_client';

const ref = { owner: 'octo', name: 'my-repo' };

describe('RepositoryProvisioner', () => {
  let github: MemoryRemoteClient;
  let sleep: jest.Mock<Promise<void>, [number]>;
  let provisioner: RepositoryProvisioner;

  beforeEach(() => {
    github = new MemoryRemoteClient({ login: 'octo', publicKey: { key: 'unused', key_id: 'kid-1' } });
    sleep = jest.fn().mockResolvedValue(undefined);
    provisioner = new RepositoryProvisioner({ settleDelayMs: 2000, sleep });
  });

  describe('ensure', () => {
    it('should reuse an existing repository without mutating it', async () => {
      github.seedRepository('octo', 'my-repo');

      const outcome = await provisioner.ensure(github, ref);

      expect(outcome).toBe('reused');
      expect(github.calls).toEqual([{ method: 'GET', path: '/repos/octo/my-repo', body: undefined }]);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should create a missing repository with public visibility and auto-init', async () => {
      const outcome = await provisioner.ensure(github, ref);

      expect(outcome).toBe('created');
      expect(github.callsTo('POST', '/user/repos')).toEqual([{
        method: 'POST',
        path: '/user/repos',
        body: {
          name: 'my-repo',
          private: false,
          description: '24/7 YouTube Auto Streamer',
          auto_init: true,
        },
      }]);
      expect(github.hasRepository('octo', 'my-repo')).toBe(true);
    });

    it('should wait the settling delay after creation', async () => {
      await provisioner.ensure(github, ref);

      expect(sleep).toHaveBeenCalledWith(2000);
    });

    it('should skip the delay when it is zero', async () => {
      const immediate = new RepositoryProvisioner({ settleDelayMs: 0, sleep });

      await immediate.ensure(github, ref);

      expect(sleep).not.toHaveBeenCalled();
    });

    it('should report reused on a second run against the same name', async () => {
      const first = await provisioner.ensure(github, ref);
      const second = await provisioner.ensure(github, ref);

      expect([first, second]).toEqual(['created', 'reused']);
      expect(github.callsTo('POST', '/user/repos')).toHaveLength(1);
    });
  });

  describe('errors', () => {
    it('should throw ProvisionError with the body when creation is rejected', async () => {
      github.respondWith('POST', '/user/repos', 422, { message: 'name already exists on this account' });

      const error = await provisioner.ensure(github, ref).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProvisionError);
      expect(error).toMatchObject({
        operation: 'POST /user/repos',
        status: 422,
        responseBody: { message: 'name already exists on this account' },
      });
    });

    it('should throw ProvisionError when the probe answers neither 200 nor 404', async () => {
      github.respondWith('GET', '/repos/octo/my-repo', 403);

      await expect(provisioner.ensure(github, ref)).rejects.toThrow(
        'Could not check repository octo/my-repo (HTTP 403)',
      );
      expect(github.callsTo('POST', '/user/repos')).toHaveLength(0);
    });

    it('should propagate transport errors', async () => {
      const failing: RemoteClient = {
        call: jest.fn().mockRejectedValue(new TransportError('Network error during GET /repos/octo/my-repo: fetch failed')),
      };

      await expect(provisioner.ensure(failing, ref)).rejects.toBeInstanceOf(TransportError);
    });
  });
});
