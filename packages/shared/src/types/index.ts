// Shared TypeScript types

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RepoConfig {
  git_url: string;
  path: string;
  branch?: string;
  update_interval: number; // seconds
  retain_snapshots: number;
}

export interface WebConfig {
  address: string;
  port: number;
  list_directories: boolean;
  cache_max_age: number; // seconds
}

export interface MirrorConfig {
  repo: RepoConfig;
  web: WebConfig;
  log_level: LogLevel;
  shutdown_timeout_ms: number;
}
