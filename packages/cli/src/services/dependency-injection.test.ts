import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { SetupOrchestrator } from '@streamhost/core';
import { DependencyInjectionService } from './dependency-injection';

describe('DependencyInjectionService', () => {
  const originalApiUrl = process.env['STREAMHOST_API_URL'];
  let tempDir: string;

  beforeEach(async () => {
    DependencyInjectionService.reset();
    delete process.env['STREAMHOST_API_URL'];
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'streamhost-di-test-'));
  });

  afterEach(async () => {
    if (originalApiUrl === undefined) {
      delete process.env['STREAMHOST_API_URL'];
    } else {
      process.env['STREAMHOST_API_URL'] = originalApiUrl;
    }
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function createFile(relativePath: string, content: string) {
    const fullPath = path.join(tempDir, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content, 'utf-8');
  }

  it('should return the same instance', () => {
    expect(DependencyInjectionService.getInstance()).toBe(DependencyInjectionService.getInstance());
  });

  describe('resolveApiBaseUrl', () => {
    it('should prefer the flag over the environment', () => {
      process.env['STREAMHOST_API_URL'] = 'http://env.example.test';

      expect(DependencyInjectionService.getInstance().resolveApiBaseUrl('http://flag.example.test'))
        .toBe('http://flag.example.test');
    });

    it('should fall back to STREAMHOST_API_URL, then the public API', () => {
      const service = DependencyInjectionService.getInstance();

      expect(service.resolveApiBaseUrl()).toBe('https://api.github.com');
      process.env['STREAMHOST_API_URL'] = 'http://env.example.test';
      expect(service.resolveApiBaseUrl()).toBe('http://env.example.test');
    });
  });

  describe('getSetupOrchestrator', () => {
    it('should wire the filesystem sources of the workspace', async () => {
      await createFile('streamer.py', 'print("live")\n');
      await createFile('requirements.txt', 'requests\n');
      await createFile('.github/workflows/youtube-live.yml', 'name: live\n');
      await createFile(
        'setup_github.txt',
        'sk_test_placeholder\nhttps://example.test/video.mp4\n1080p\n16:9\ntest-token\nlive-stream\n',
      );

      const orchestrator = DependencyInjectionService.getInstance().getSetupOrchestrator({
        cwd: tempDir,
        logLevel: 'silent',
      });
      const result = await orchestrator.check();

      expect(orchestrator).toBeInstanceOf(SetupOrchestrator);
      expect(result.state).toBe('ConfigLoaded');
      expect(result.context.config?.repoName).toBe('live-stream');
    });

    it('should read a custom setup file name', async () => {
      await createFile('streamer.py', 'x');
      await createFile('requirements.txt', 'x');
      await createFile('.github/workflows/youtube-live.yml', 'x');

      const orchestrator = DependencyInjectionService.getInstance().getSetupOrchestrator({
        cwd: tempDir,
        configFile: 'missing.txt',
        logLevel: 'silent',
      });
      const result = await orchestrator.check();

      expect(result.state).toBe('FilesChecked.Failed');
      expect(result.error?.message).toBe(`Setup file ${path.join(tempDir, 'missing.txt')} not found`);
    });
  });
});
