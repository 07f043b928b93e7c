export * from './types';
export * from './report-builder';
export * from './encoders';
