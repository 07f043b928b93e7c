export * from './check-in-protocol';
