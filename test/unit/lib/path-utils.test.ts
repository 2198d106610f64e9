import { describe, it, expect } from '@jest/globals';
import { homedir } from 'node:os';
import * as path from 'node:path';
import { normalizePath } from '@/lib/path-utils';

describe('normalizePath', () => {
  it('expands the home directory', () => {
    expect(normalizePath('~')).toBe(homedir());
    expect(normalizePath('~/deploy/app.yaml')).toBe(path.join(homedir(), 'deploy/app.yaml'));
  });

  it('resolves relative paths against the working directory', () => {
    expect(normalizePath(' deploy ')).toBe(path.resolve(process.cwd(), 'deploy'));
  });

  it('keeps absolute paths', () => {
    expect(normalizePath('/srv/manifests')).toBe('/srv/manifests');
  });
});
