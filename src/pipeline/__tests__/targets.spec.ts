import type { SyncTarget } from '../../config/sync-target.js';
import { ConfigurationError } from '../../raw/errors.js';
import { parsePlatform, selectTargets } from '../targets.js';

const targets: SyncTarget[] = [
  { platform: 'bitbucket', scope: 'workspace', workspace: 'acme' },
  { platform: 'sonarcloud', scope: 'organization', organization: 'acme-org' },
];

describe('parsePlatform', () => {
  it('accepts known platforms', () => {
    expect(parsePlatform('bitbucket')).toBe('bitbucket');
    expect(parsePlatform('sonarcloud')).toBe('sonarcloud');
  });

  it('treats a missing value as all platforms', () => {
    expect(parsePlatform(undefined)).toBeUndefined();
    expect(parsePlatform('')).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(() => parsePlatform('gitlab')).toThrow(
      new ConfigurationError('Unknown platform "gitlab", expected one of: bitbucket, sonarcloud'),
    );
  });
});

describe('selectTargets', () => {
  it('keeps every target without a platform filter', () => {
    expect(selectTargets(targets)).toEqual(targets);
  });

  it('filters by platform', () => {
    expect(selectTargets(targets, 'sonarcloud')).toEqual([targets[1]]);
  });

  it('rejects an empty selection', () => {
    expect(() => selectTargets([targets[0]], 'sonarcloud')).toThrow('No sonarcloud targets configured');
    expect(() => selectTargets([])).toThrow('No sync targets configured');
  });
});
