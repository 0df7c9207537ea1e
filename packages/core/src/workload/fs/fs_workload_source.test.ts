import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsWorkloadSource } from './fs_workload_source';
import { ConfigError } from '../../errors';

describe('FsWorkloadSource', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-workload-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function createFile(relativePath: string, content: string) {
    const fullPath = path.join(tempDir, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content, 'utf-8');
  }

  describe('check', () => {
    it('should report every tracked file as found', async () => {
      await createFile('streamer.py', 'print("live")\n');
      await createFile('requirements.txt', 'requests\n');
      await createFile('.github/workflows/youtube-live.yml', 'name: live\n');

      const result = await new FsWorkloadSource({ cwd: tempDir }).check();

      expect(result).toEqual({
        found: ['streamer.py', 'requirements.txt', '.github/workflows/youtube-live.yml'],
        missing: [],
      });
    });

    it('should list missing files in tracked order', async () => {
      await createFile('requirements.txt', 'requests\n');

      const result = await new FsWorkloadSource({ cwd: tempDir }).check();

      expect(result).toEqual({
        found: ['requirements.txt'],
        missing: ['streamer.py', '.github/workflows/youtube-live.yml'],
      });
    });

    it('should not count a directory as a file', async () => {
      await fs.mkdir(path.join(tempDir, 'streamer.py'));

      const result = await new FsWorkloadSource({ cwd: tempDir, trackedFiles: ['streamer.py'] }).check();

      expect(result.missing).toEqual(['streamer.py']);
    });
  });

  describe('read', () => {
    it('should return the raw bytes under the repository path', async () => {
      await createFile('.github/workflows/youtube-live.yml', 'on: push\n');

      const artifact = await new FsWorkloadSource({ cwd: tempDir }).read('.github/workflows/youtube-live.yml');

      expect(artifact.path).toBe('.github/workflows/youtube-live.yml');
      expect(Buffer.from(artifact.content).toString('utf-8')).toBe('on: push\n');
      expect(artifact.revisionMarker).toBeUndefined();
    });

    it('should raise ConfigError for an unreadable file', async () => {
      await expect(new FsWorkloadSource({ cwd: tempDir }).read('streamer.py')).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
