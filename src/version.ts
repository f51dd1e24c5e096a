import { UpdateCheckerError } from './errors';

export const VersionKind = {
  Release: 'release',
  Snapshot: 'snapshot',
  Dev: 'dev',
} as const;

export type VersionKind = typeof VersionKind[keyof typeof VersionKind];

export interface ParsedVersion {
  numeric: string;
  kind: VersionKind;
}

const NUMERIC_PATTERN = /^\d+(\.\d+)*$/;
const PRERELEASE_LABEL_PATTERN = /^(.*?)-[0-9A-Za-z.-]+$/;

/**
 * Normalizes a version string by removing a leading lowercase 'v'
 */
export function normalizeVersion(version: string): string {
  return version.replace(/^v/, '');
}

function stripSuffix(raw: string, suffix: string): string {
  return raw.slice(0, raw.length - suffix.length).replace(/[-.]$/, '');
}

/**
 * Splits a raw version string into its numeric part and its kind.
 * Suffixes are matched case-insensitively: "snapshot" wins over "dev", and
 * `forcePrerelease` turns anything else into a dev version, dropping a
 * trailing pre-release label such as "-rc" or "-beta.1".
 * @throws UpdateCheckerError with code INVALID_FORMAT
 */
export function parseVersion(raw: string, forcePrerelease: boolean = false): ParsedVersion {
  const lower = raw.toLowerCase();
  let parsed: ParsedVersion;

  if (lower.endsWith('snapshot')) {
    parsed = { numeric: stripSuffix(raw, 'snapshot'), kind: VersionKind.Snapshot };
  }
  else if (lower.endsWith('dev')) {
    parsed = { numeric: stripSuffix(raw, 'dev'), kind: VersionKind.Dev };
  }
  else if (forcePrerelease) {
    parsed = { numeric: raw.replace(PRERELEASE_LABEL_PATTERN, '$1'), kind: VersionKind.Dev };
  }
  else {
    parsed = { numeric: raw, kind: VersionKind.Release };
  }

  if (!NUMERIC_PATTERN.test(parsed.numeric)) {
    throw new UpdateCheckerError(
      'INVALID_FORMAT',
      `Invalid version format: "${raw}". Expected dot-separated integers with an optional -snapshot or -dev suffix`,
    );
  }

  return parsed;
}

export class Version {
  readonly raw: string;
  readonly numeric: string;
  readonly kind: VersionKind;

  constructor(raw: string, forcePrerelease: boolean = false) {
    const { numeric, kind } = parseVersion(raw, forcePrerelease);
    this.raw = raw;
    this.numeric = numeric;
    this.kind = kind;
  }

  /**
   * Compares the numeric parts of two versions, padding the shorter one with zeros.
   * The kind is ignored, so "1.0-snapshot" and "1.0" compare equal.
   * @returns -1 if this version is older than `other`, 1 if newer, 0 if equal
   */
  compare(other: Version): -1 | 0 | 1 {
    const ours = this.numeric.split('.').map(part => BigInt(part));
    const theirs = other.numeric.split('.').map(part => BigInt(part));
    const length = Math.max(ours.length, theirs.length);

    for (let i = 0; i < length; i++) {
      const a = i < ours.length ? ours[i] : 0n;
      const b = i < theirs.length ? theirs[i] : 0n;
      if (a < b) return -1;
      if (a > b) return 1;
    }
    return 0;
  }

  equals(other: unknown): boolean {
    return other instanceof Version && this.compare(other) === 0;
  }

  toString(): string {
    return this.raw;
  }
}
