import { UpdateCheckerError, isUpdateCheckerError } from './errors';
import { Version, VersionKind, normalizeVersion } from './version';
import type { CheckState, GitHubReleaseResponse, Logger, UpdateCheckerConfig, VersionCheckResult } from './types';

export type { CheckState, GitHubReleaseResponse, Logger, UpdateCheckerConfig, VersionCheckResult } from './types';
export type { ParsedVersion } from './version';
export type { UpdateCheckerErrorCode } from './errors';
export { Version, VersionKind, normalizeVersion, parseVersion } from './version';
export { UpdateCheckerError, isUpdateCheckerError } from './errors';

export class UpdateChecker {
  private readonly author: string;
  private readonly repo: string;
  private readonly uri: string;
  private readonly currentVersion: Version;
  private readonly token: string | null;
  private readonly autoNotify: boolean;
  private readonly logger: Logger | null;
  private message: string | null;
  private state: CheckState = 'not-checked';
  private latestVersion: Version | null = null;
  private updateAvailable: boolean = false;
  private lastError: UpdateCheckerError | null = null;

  /**
   * Creates a checker for the latest release of `author/repo`.
   * Without a token the public release page is used, which only works for public repositories;
   * with a token the GitHub REST API is queried and private repositories work too.
   * @throws UpdateCheckerError with code INVALID_FORMAT when `currentVersion` cannot be parsed
   * @throws UpdateCheckerError with code MISSING_LOGGER when `autoNotify` is set without a logger
   */
  constructor(config: UpdateCheckerConfig) {
    this.author = config.author;
    this.repo = config.repo;
    this.currentVersion = new Version(normalizeVersion(config.currentVersion));
    this.token = config.token ?? null;
    this.autoNotify = config.autoNotify ?? false;
    this.logger = config.logger ?? null;
    this.message = config.message ?? null;

    if (this.autoNotify && this.logger === null) {
      throw new UpdateCheckerError(
        'MISSING_LOGGER',
        'autoNotify is enabled but no logger was provided',
      );
    }

    this.uri = this.token !== null
      ? `https://api.github.com/repos/${this.author}/${this.repo}/releases/latest`
      : `https://github.com/${this.author}/${this.repo}/releases/latest`;
  }

  /**
   * Looks up the latest release and compares it with the current version.
   * Only one check may run at a time. A failed check leaves the previous result in place.
   * @returns Version check result with update availability information
   */
  async check(): Promise<VersionCheckResult> {
    if (this.state === 'checking') {
      throw new UpdateCheckerError(
        'CHECK_IN_PROGRESS',
        `A check for ${this.author}/${this.repo} is already in progress`,
      );
    }

    this.state = 'checking';
    let latest: Version;
    try {
      latest = this.token !== null
        ? await this.fetchFromApi(this.token)
        : await this.fetchFromReleasePage();
    }
    catch (error) {
      const failure = isUpdateCheckerError(error)
        ? error
        : new UpdateCheckerError('TRANSPORT_FAILURE', `Failed to check for updates: ${errorMessage(error)}`, { cause: error });
      this.state = 'failed';
      this.lastError = failure;
      throw failure;
    }

    this.state = 'resolved';
    this.lastError = null;
    this.compareAndStore(this.currentVersion, latest);

    return {
      updateAvailable: this.updateAvailable,
      currentVersion: this.currentVersion.raw,
      latestVersion: latest.raw,
      prerelease: latest.kind !== VersionKind.Release,
    };
  }

  /**
   * Logs the update message if the last check found a newer version.
   * The message is either the default one or the template set with `setMessage`.
   * @returns true if a message was logged
   * @throws UpdateCheckerError with code NO_PRIOR_CHECK before the first successful check
   * @throws UpdateCheckerError with code NO_LOGGER when no logger was provided
   */
  notify(): boolean {
    if (this.latestVersion === null) {
      throw new UpdateCheckerError(
        'NO_PRIOR_CHECK',
        'There is no version to compare to. Run check() before notify()',
      );
    }
    if (this.logger === null) {
      throw new UpdateCheckerError('NO_LOGGER', 'There is no logger provided');
    }
    if (!this.updateAvailable) {
      return false;
    }

    this.logger.info(this.formatMessage(this.latestVersion));
    return true;
  }

  /**
   * Sets the message logged when an update is available.
   * Placeholders: `@name` (repository name), `@latestVersion`, `@currentVersion`
   * @param message Template to use, or null to go back to the default message
   */
  setMessage(message: string | null): void {
    this.message = message;
  }

  getMessage(): string | null {
    return this.message;
  }

  isUpdateAvailable(): boolean {
    return this.updateAvailable;
  }

  /**
   * @returns The full latest version string, or null if no check has resolved yet
   */
  getLatestVersion(): string | null {
    return this.latestVersion?.raw ?? null;
  }

  getLatestRelease(): Version | null {
    return this.latestVersion;
  }

  getCurrentVersion(): Version {
    return this.currentVersion;
  }

  getState(): CheckState {
    return this.state;
  }

  getLastError(): UpdateCheckerError | null {
    return this.lastError;
  }

  private compareAndStore(current: Version, latest: Version): void {
    this.latestVersion = latest;
    this.updateAvailable = current.compare(latest) < 0;

    if (this.autoNotify) {
      try {
        this.notify();
      }
      catch (error) {
        throw new UpdateCheckerError(
          'NOTIFY_FAILURE',
          `Failed to notify about ${this.repo} update: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    }
  }

  private formatMessage(latest: Version): string {
    if (this.message === null) {
      return `There is a newer version of ${this.repo} (${latest.raw})! Current version: ${this.currentVersion.raw}`;
    }

    return this.message
      .replaceAll('@name', () => this.repo)
      .replaceAll('@latestVersion', () => latest.raw)
      .replaceAll('@currentVersion', () => this.currentVersion.raw);
  }

  /**
   * Reads the release tag from the redirect of the public "latest release" page
   */
  private async fetchFromReleasePage(): Promise<Version> {
    const response = await this.request({ redirect: 'manual' });
    const location = response.headers.get('location');
    // Only the status and headers are needed; release the connection
    await response.body?.cancel();

    if (response.status === 404) {
      throw new UpdateCheckerError(
        'REPOSITORY_NOT_FOUND',
        `GitHub error: 404 for ${this.author}/${this.repo}. The repository does not exist or is private; use a token for private repositories`,
      );
    }

    if (location === null) {
      throw new UpdateCheckerError('MISSING_TAG_DATA', 'No release found: the response has no Location header');
    }

    return new Version(normalizeVersion(lastSegment(location, 'Location header')));
  }

  /**
   * Reads the release tag and prerelease flag from the GitHub REST API
   */
  private async fetchFromApi(token: string): Promise<Version> {
    const response = await this.request({
      headers: {
        'Accept': 'application/vnd.github+json',
        'Authorization': `Bearer ${token}`,
        'X-GitHub-Api-Version': '2022-11-28',
      },
    });

    let body: string;
    try {
      body = await response.text();
    }
    catch (error) {
      throw new UpdateCheckerError(
        'TRANSPORT_FAILURE',
        `Failed to read response from ${this.uri}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (response.status !== 200 || body.length === 0) {
      throw new UpdateCheckerError(
        'REPOSITORY_NOT_FOUND',
        `GitHub API error: ${response.status} ${response.statusText}. The repository does not exist or the token cannot read its releases`,
      );
    }

    let release: unknown;
    try {
      release = JSON.parse(body);
    }
    catch (error) {
      throw new UpdateCheckerError('MISSING_TAG_DATA', `Failed to parse release: ${errorMessage(error)}`, { cause: error });
    }

    if (!isReleaseResponse(release)) {
      throw new UpdateCheckerError('MISSING_TAG_DATA', 'Release response is missing tag_name or prerelease');
    }

    return new Version(normalizeVersion(lastSegment(release.tag_name, 'tag_name')), release.prerelease);
  }

  private async request(init: RequestInit): Promise<Response> {
    try {
      return await fetch(this.uri, init);
    }
    catch (error) {
      throw new UpdateCheckerError(
        'TRANSPORT_FAILURE',
        `Failed to fetch ${this.uri}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function lastSegment(value: string, source: string): string {
  const segment = value.split('/').filter(part => part.length > 0).pop();
  if (segment === undefined) {
    throw new UpdateCheckerError('MISSING_TAG_DATA', `No release tag found in ${source} "${value}"`);
  }
  return segment;
}

function isReleaseResponse(value: unknown): value is GitHubReleaseResponse {
  return typeof value === 'object'
    && value !== null
    && 'tag_name' in value
    && typeof value.tag_name === 'string'
    && 'prerelease' in value
    && typeof value.prerelease === 'boolean';
}
