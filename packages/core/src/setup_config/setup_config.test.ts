import { parseSetupConfig, secretsFromConfig, validateSetupConfig } from './setup_config';
import { ConfigError } from '../errors';
import type { SetupConfig } from './setup_config.types';

const validText = [
  'sk_test_placeholder',
  'https://example.test/video.mp4',
  '1080p',
  '16:9',
  'test-token',
  'my-stream',
].join('\n');

const validConfig: SetupConfig = {
  streamKey: 'sk_test_placeholder',
  videoUrl: 'https://example.test/video.mp4',
  quality: '1080p',
  aspectRatio: '16:9',
  token: 'test-token',
  repoName: 'my-stream',
};

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error: unknown) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseSetupConfig', () => {
  it('should map the six lines in order', () => {
    expect(parseSetupConfig(validText)).toEqual(validConfig);
  });

  it('should ignore blank lines, surrounding whitespace and CRLF endings', () => {
    const messy = `\n  sk_test_placeholder  \r\n\r\nhttps://example.test/video.mp4\r\n1080p\n\n16:9\n\ttest-token\nmy-stream\n\n`;

    expect(parseSetupConfig(messy)).toEqual(validConfig);
  });

  it('should reject fewer than six lines', () => {
    const error = configError(() => parseSetupConfig('a\nb\nc'));

    expect(error.message).toBe(
      'Setup file must have exactly 6 non-empty lines ' +
      '(streamKey, videoUrl, quality, aspectRatio, token, repoName), found 3',
    );
  });

  it('should reject more than six lines', () => {
    expect(() => parseSetupConfig(`${validText}\nextra`)).toThrow(ConfigError);
  });

  it('should reject an empty file', () => {
    expect(() => parseSetupConfig('')).toThrow('found 0');
  });
});

describe('validateSetupConfig', () => {
  it('should return a valid config unchanged', () => {
    expect(validateSetupConfig(validConfig)).toEqual(validConfig);
  });

  it('should name the field of a malformed video URL without echoing it', () => {
    const error = configError(() => validateSetupConfig({ ...validConfig, videoUrl: 'not a url' }));

    expect(error.field).toBe('videoUrl');
    expect(error.code).toBe('CONFIG');
    expect(error.message).not.toContain('not a url');
  });

  it('should reject a repository name with characters GitHub does not allow', () => {
    const error = configError(() => validateSetupConfig({ ...validConfig, repoName: 'my stream!' }));

    expect(error.field).toBe('repoName');
  });

  it('should reject an empty value', () => {
    const error = configError(() => validateSetupConfig({ ...validConfig, quality: '' }));

    expect(error.field).toBe('quality');
  });

  it('should name a missing field', () => {
    const withoutToken = Object.fromEntries(Object.entries(validConfig).filter(([key]) => key !== 'token'));

    const error = configError(() => validateSetupConfig(withoutToken));

    expect(error.field).toBe('token');
    expect(error.message).not.toContain('sk_test_placeholder');
  });

  it('should reject non-objects', () => {
    expect(() => validateSetupConfig('sk_test_placeholder')).toThrow(ConfigError);
  });
});

describe('secretsFromConfig', () => {
  it('should map the config onto the four secret slots', () => {
    expect(secretsFromConfig(validConfig)).toEqual({
      YOUTUBE_STREAM_KEY: 'sk_test_placeholder',
      VIDEO_URL: 'https://example.test/video.mp4',
      VIDEO_QUALITY: '1080p',
      ASPECT_RATIO: '16:9',
    });
  });
});
