// Core package exports

export * from './errors';
export * from './ports';
export * from './utils/logger';
export * from './vcs/git-cli';
export * from './mirror/types';
export * from './mirror/repository-mirror';
export * from './sync/scheduler';
export * from './serving/request-path';
export * from './serving/listing';
export * from './serving/index-file-server';
export * from './middleware/request-id';
export * from './routes/index-files';
export * from './factory';
