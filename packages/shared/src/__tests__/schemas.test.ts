import { describe, expect, it } from 'vitest';
import { mirrorConfigSchema, repoConfigSchema, webConfigSchema } from '../schemas';

describe('mirrorConfigSchema', () => {
  it('fills every optional setting with its default', () => {
    const config = mirrorConfigSchema.parse({ repo: { git_url: 'https://git.example.com/index.git' } });

    expect(config).toEqual({
      repo: {
        git_url: 'https://git.example.com/index.git',
        path: './index-mirror',
        update_interval: 3600,
        retain_snapshots: 2,
      },
      web: {
        address: '0.0.0.0',
        port: 8080,
        list_directories: true,
        cache_max_age: 60,
      },
      log_level: 'info',
      shutdown_timeout_ms: 10000,
    });
  });

  it('rejects unknown log levels', () => {
    const result = mirrorConfigSchema.safeParse({
      repo: { git_url: 'https://git.example.com/index.git' },
      log_level: 'verbose',
    });

    expect(result.success).toBe(false);
  });
});

describe('repoConfigSchema', () => {
  it('requires the git URL', () => {
    const result = repoConfigSchema.safeParse({});

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['git_url']);
  });

  it('coerces numeric strings', () => {
    const repo = repoConfigSchema.parse({
      git_url: 'https://git.example.com/index.git',
      update_interval: '90',
      retain_snapshots: '5',
    });

    expect(repo.update_interval).toBe(90);
    expect(repo.retain_snapshots).toBe(5);
  });

  it.each(['0', '-5', '1.5', 'hourly'])('rejects update interval %s', (update_interval) => {
    const result = repoConfigSchema.safeParse({ git_url: 'https://git.example.com/index.git', update_interval });

    expect(result.success).toBe(false);
  });

  it('caps the update interval at the longest timer delay', () => {
    const accepted = repoConfigSchema.safeParse({
      git_url: 'https://git.example.com/index.git',
      update_interval: '2147483',
    });
    const rejected = repoConfigSchema.safeParse({
      git_url: 'https://git.example.com/index.git',
      update_interval: '2592000',
    });

    expect(accepted.success).toBe(true);
    expect(rejected.success).toBe(false);
    expect(rejected.error?.issues[0]?.message).toBe('Update interval must not exceed 2147483 seconds');
  });

  it('keeps at least two snapshots', () => {
    const result = repoConfigSchema.safeParse({
      git_url: 'https://git.example.com/index.git',
      retain_snapshots: 1,
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('At least 2 snapshots must be retained');
  });
});

describe('webConfigSchema', () => {
  it.each([
    ['true', true],
    ['1', true],
    ['yes', true],
    ['false', false],
    ['0', false],
    ['no', false],
  ])('reads list_directories=%s as %s', (value, expected) => {
    expect(webConfigSchema.parse({ list_directories: value }).list_directories).toBe(expected);
  });

  it('rejects out-of-range ports', () => {
    expect(webConfigSchema.safeParse({ port: '70000' }).success).toBe(false);
    expect(webConfigSchema.safeParse({ port: '0' }).success).toBe(false);
  });
});
