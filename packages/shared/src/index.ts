export * from './schemas';
export * from './utils';
