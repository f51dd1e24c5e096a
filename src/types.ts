export interface Logger {
  info(message: string): void;
}

export interface UpdateCheckerConfig {
  author: string;
  repo: string;
  currentVersion: string;
  autoNotify?: boolean;
  logger?: Logger;
  token?: string;
  message?: string;
}

export type CheckState = 'not-checked' | 'checking' | 'resolved' | 'failed';

export interface VersionCheckResult {
  updateAvailable: boolean;
  currentVersion: string;
  latestVersion: string;
  prerelease: boolean;
}

export interface GitHubReleaseResponse {
  tag_name: string;
  prerelease: boolean;
}
