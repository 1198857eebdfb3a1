import { ConfigError } from '@index-mirror/core';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('maps environment variables onto the configuration', () => {
    const config = loadConfig({
      MIRROR_GIT_URL: 'https://git.example.com/index.git',
      MIRROR_PATH: '/var/lib/index-mirror',
      MIRROR_BRANCH: 'main',
      MIRROR_UPDATE_INTERVAL: '300',
      MIRROR_RETAIN_SNAPSHOTS: '3',
      WEB_ADDRESS: '127.0.0.1',
      WEB_PORT: '9000',
      WEB_LIST_DIRECTORIES: 'false',
      WEB_CACHE_MAX_AGE: '0',
      LOG_LEVEL: 'debug',
      SHUTDOWN_TIMEOUT_MS: '5000',
    });

    expect(config).toEqual({
      repo: {
        git_url: 'https://git.example.com/index.git',
        path: '/var/lib/index-mirror',
        branch: 'main',
        update_interval: 300,
        retain_snapshots: 3,
      },
      web: {
        address: '127.0.0.1',
        port: 9000,
        list_directories: false,
        cache_max_age: 0,
      },
      log_level: 'debug',
      shutdown_timeout_ms: 5000,
    });
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({
      MIRROR_GIT_URL: 'https://git.example.com/index.git',
      MIRROR_BRANCH: '',
      WEB_PORT: '   ',
    });

    expect(config.repo.branch).toBeUndefined();
    expect(config.web.port).toBe(8080);
  });

  it('fails with ConfigError when the git URL is missing', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('Invalid configuration:\n  repo.git_url: Required');
  });

  it('lists every invalid setting', () => {
    let caught: unknown;
    try {
      loadConfig({
        MIRROR_GIT_URL: 'https://git.example.com/index.git',
        MIRROR_UPDATE_INTERVAL: '0',
        LOG_LEVEL: 'verbose',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      details: {
        issues: [
          'repo.update_interval: Update interval must be a positive number of seconds',
          expect.stringMatching(/^log_level: Invalid enum value/),
        ],
      },
    });
  });
});
