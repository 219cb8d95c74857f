export const name = '@cartwright/shared';

export * from './errors';
export * from './logger';
export * from './config/schema';
export * from './fs/io';
export * from './fs/path';
