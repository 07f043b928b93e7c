export * from './identity';
export * from './check-in-api';
export * from './server';
