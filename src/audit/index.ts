export * from './types';
export * from './audit-log';
