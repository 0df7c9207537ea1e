import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsSetupConfigSource } from './fs_setup_config_source';
import { ConfigError } from '../../errors';

describe('FsSetupConfigSource', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-setup-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should load setup_github.txt from the working directory by default', async () => {
    await fs.writeFile(
      path.join(tempDir, 'setup_github.txt'),
      'sk_test_placeholder\nhttps://example.test/v.mp4\n720p\n9:16\ntest-token\nshorts-stream\n',
      'utf-8',
    );

    const config = await new FsSetupConfigSource({ cwd: tempDir }).load();

    expect(config).toEqual({
      streamKey: 'sk_test_placeholder',
      videoUrl: 'https://example.test/v.mp4',
      quality: '720p',
      aspectRatio: '9:16',
      token: 'test-token',
      repoName: 'shorts-stream',
    });
  });

  it('should honour a custom file name', async () => {
    await fs.writeFile(path.join(tempDir, 'other.txt'), 'a\nhttps://example.test\nb\nc\nd\ne', 'utf-8');

    const source = new FsSetupConfigSource({ cwd: tempDir, fileName: 'other.txt' });

    expect(source.filePath).toBe(path.join(tempDir, 'other.txt'));
    await expect(source.load()).resolves.toMatchObject({ repoName: 'e' });
  });

  it('should raise ConfigError when the file is missing', async () => {
    const source = new FsSetupConfigSource({ cwd: tempDir });

    await expect(source.load()).rejects.toThrow(
      new ConfigError(`Setup file ${path.join(tempDir, 'setup_github.txt')} not found`),
    );
  });

  it('should raise ConfigError when the file is incomplete', async () => {
    await fs.writeFile(path.join(tempDir, 'setup_github.txt'), 'only-one-line\n', 'utf-8');

    await expect(new FsSetupConfigSource({ cwd: tempDir }).load()).rejects.toBeInstanceOf(ConfigError);
  });
});
