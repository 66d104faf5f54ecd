import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { CascadingGitignore, StaticGitignore } from '../../../src/context/index.js';

describe('CascadingGitignore', () => {
  let root: string;
  let resolver: CascadingGitignore;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'prompt-bundle-gitignore-'));
    writeFileSync(join(root, '.gitignore'), 'ignored.txt\nlogs/\n');
    writeFileSync(join(root, 'ignored.txt'), 'x');
    writeFileSync(join(root, 'kept.txt'), 'x');
    mkdirSync(join(root, 'logs'));
    mkdirSync(join(root, 'nested'));
    writeFileSync(join(root, 'nested', '.gitignore'), '*');
    writeFileSync(join(root, 'nested', 'file.txt'), 'x');
    mkdirSync(join(root, 'sub'));
    writeFileSync(join(root, 'sub', '.gitignore'), '!ignored.txt\n');
    writeFileSync(join(root, 'sub', 'ignored.txt'), 'x');
    mkdirSync(join(root, 'deep', 'er'), { recursive: true });
    writeFileSync(join(root, 'deep', 'er', 'ignored.txt'), 'x');
    resolver = new CascadingGitignore();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('drops a file listed in the root .gitignore', () => {
    expect(resolver.allowed(root, join(root, 'ignored.txt'), root)).toBe(false);
  });

  it('allows files no rule matches', () => {
    expect(resolver.allowed(root, join(root, 'kept.txt'), root)).toBe(true);
  });

  it('applies directory-only rules to directories', () => {
    expect(resolver.allowed(root, join(root, 'logs'), root)).toBe(false);
  });

  it('does not apply a directory\'s own .gitignore to the directory itself', () => {
    expect(resolver.allowed(root, join(root, 'nested'), root)).toBe(true);
  });

  it('applies a nested .gitignore to the entries under it', () => {
    expect(resolver.allowed(join(root, 'nested'), join(root, 'nested', 'file.txt'), root)).toBe(false);
  });

  it('cascades root rules into subdirectories', () => {
    expect(resolver.allowed(join(root, 'deep', 'er'), join(root, 'deep', 'er', 'ignored.txt'), root)).toBe(false);
  });

  it('lets the closest .gitignore override an ancestor rule', () => {
    expect(resolver.allowed(join(root, 'sub'), join(root, 'sub', 'ignored.txt'), root)).toBe(true);
  });

  it('never reads .gitignore files above the traversal root', () => {
    const deep = join(root, 'deep');
    expect(resolver.allowed(join(deep, 'er'), join(deep, 'er', 'ignored.txt'), deep)).toBe(true);
  });

  it('applies the traversal root\'s own .gitignore', () => {
    const sub = join(root, 'sub');
    writeFileSync(join(sub, 'local.txt'), 'x');
    writeFileSync(join(sub, '.gitignore'), 'local.txt\n');
    expect(resolver.allowed(sub, join(sub, 'local.txt'), sub)).toBe(false);
    expect(resolver.allowed(sub, join(sub, 'ignored.txt'), sub)).toBe(true);
  });
});

describe('StaticGitignore', () => {
  it('denies exactly the listed paths', () => {
    const resolver = new StaticGitignore(['/repo/secret.txt']);
    expect(resolver.allowed('/repo', '/repo/secret.txt', '/repo')).toBe(false);
    expect(resolver.allowed('/repo', '/repo/public.txt', '/repo')).toBe(true);
  });
});
