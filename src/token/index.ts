export * from './token-codec';
export * from './qr-renderer';
