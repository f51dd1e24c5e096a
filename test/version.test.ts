import { describe, expect, it } from 'vitest';
import { UpdateCheckerError } from '../src/errors';
import { Version, VersionKind, normalizeVersion, parseVersion } from '../src/version';

function captureError(fn: () => unknown): UpdateCheckerError {
  try {
    fn();
  }
  catch (error) {
    if (error instanceof UpdateCheckerError) return error;
    throw error;
  }
  throw new Error('Expected function to throw');
}

describe('Version', () => {
  describe('parsing', () => {
    it('should parse a plain release version', () => {
      const version = new Version('1.2.3');

      expect(version.raw).toBe('1.2.3');
      expect(version.numeric).toBe('1.2.3');
      expect(version.kind).toBe(VersionKind.Release);
    });

    it('should detect snapshot suffix case-insensitively', () => {
      const version = new Version('1.0.0-SNAPSHOT');

      expect(version.raw).toBe('1.0.0-SNAPSHOT');
      expect(version.numeric).toBe('1.0.0');
      expect(version.kind).toBe('snapshot');
    });

    it('should detect dev suffix', () => {
      expect(parseVersion('2.1-dev')).toEqual({ numeric: '2.1', kind: 'dev' });
      expect(parseVersion('2.1.Dev')).toEqual({ numeric: '2.1', kind: 'dev' });
      expect(parseVersion('2.1dev')).toEqual({ numeric: '2.1', kind: 'dev' });
    });

    it('should classify as dev when prerelease is forced', () => {
      const version = new Version('3.0.0', true);

      expect(version.kind).toBe('dev');
      expect(version.numeric).toBe('3.0.0');
    });

    it('should keep snapshot over a forced prerelease', () => {
      expect(new Version('1.0.0-snapshot', true).kind).toBe('snapshot');
    });

    it('should drop an unrecognized label when prerelease is forced', () => {
      expect(parseVersion('1.0.0-rc', true)).toEqual({ numeric: '1.0.0', kind: 'dev' });
      expect(parseVersion('2.0.0-beta.1', true)).toEqual({ numeric: '2.0.0', kind: 'dev' });
    });

    it('should reject an unrecognized label on a release', () => {
      const error = captureError(() => new Version('1.0.0-rc'));

      expect(error.code).toBe('INVALID_FORMAT');
      expect(error.message).toContain('"1.0.0-rc"');
      expect(error.recoverable).toBe(false);
    });

    it.each(['', 'abc', '1.a', '1..2', '1.2.', '.1', 'dev', '-snapshot', '1.0-beta', 'v1.0'])(
      'should reject malformed version "%s"',
      (raw) => {
        expect(captureError(() => new Version(raw)).code).toBe('INVALID_FORMAT');
      },
    );
  });

  describe('compare', () => {
    it('should pad missing components with zeros', () => {
      expect(new Version('1.2').compare(new Version('1.2.0'))).toBe(0);
      expect(new Version('1.2.0').compare(new Version('1.2'))).toBe(0);
    });

    it('should compare components as integers', () => {
      expect(new Version('1.10').compare(new Version('1.9'))).toBe(1);
      expect(new Version('1.9').compare(new Version('1.10'))).toBe(-1);
    });

    it('should ignore the suffix', () => {
      expect(new Version('1.0.0-dev').compare(new Version('1.0.1'))).toBe(-1);
      expect(new Version('2.0-snapshot').compare(new Version('1.9.9'))).toBe(1);
    });

    it('should decide on the first differing component', () => {
      expect(new Version('2.0.0').compare(new Version('1.99.99'))).toBe(1);
      expect(new Version('1.2.3.4').compare(new Version('1.2.3.5'))).toBe(-1);
    });

    it('should compare components beyond the safe integer range exactly', () => {
      expect(new Version('1.9007199254740993').compare(new Version('1.9007199254740992'))).toBe(1);
      expect(new Version('20260101120000000000').compare(new Version('20260101120000000001'))).toBe(-1);
    });

    it('should ignore leading zeros in components', () => {
      expect(new Version('1.010').compare(new Version('1.10'))).toBe(0);
    });
  });

  describe('equals', () => {
    it('should ignore the suffix', () => {
      expect(new Version('1.0-snapshot').equals(new Version('1.0'))).toBe(true);
      expect(new Version('1.0.0-dev').equals(new Version('1.0', true))).toBe(true);
    });

    it('should be false for different versions', () => {
      expect(new Version('1.0.1').equals(new Version('1.0'))).toBe(false);
    });

    it('should be false for values that are not versions', () => {
      expect(new Version('1.0').equals('1.0')).toBe(false);
      expect(new Version('1.0').equals(null)).toBe(false);
    });
  });

  it('should return the raw string from toString', () => {
    expect(`${new Version('4.5-dev')}`).toBe('4.5-dev');
  });
});

describe('normalizeVersion', () => {
  it('should strip a leading v', () => {
    expect(normalizeVersion('v1.2.3')).toBe('1.2.3');
  });

  it('should leave other versions untouched', () => {
    expect(normalizeVersion('1.2.3-dev')).toBe('1.2.3-dev');
    expect(normalizeVersion('V2')).toBe('V2');
    expect(normalizeVersion(' v1.0')).toBe(' v1.0');
  });
});
