/**
 * Defaults for a provisioning run.
 * The CLI overrides the tunable ones (base URL, timeouts, workspace paths).
 */

export const DEFAULT_API_BASE_URL = 'https://api.github.com';

/** Accept header that pins the REST v3 media type */
export const GITHUB_ACCEPT_HEADER = 'application/vnd.github.v3+json';
export const GITHUB_API_VERSION = '2022-11-28';

/** Upper bound for a single request; the provider applies none of its own */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Pause after creating a repository before its contents are writable */
export const DEFAULT_SETTLE_DELAY_MS = 2_000;

export const DEFAULT_BRANCH = 'main';

export const REPOSITORY_DESCRIPTION = '24/7 YouTube Auto Streamer';

export const SETUP_FILE_NAME = 'setup_github.txt';

/** Workload files synced into the repository, relative to the workspace */
export const TRACKED_FILES: readonly string[] = [
  'streamer.py',
  'requirements.txt',
  '.github/workflows/youtube-live.yml',
];

export const SECRET_NAMES = [
  'YOUTUBE_STREAM_KEY',
  'VIDEO_URL',
  'VIDEO_QUALITY',
  'ASPECT_RATIO',
] as const;

export type SecretName = typeof SECRET_NAMES[number];
