export * from './disclaimer';
export * from './errors';
export * from './schemas';
export type * from './types';
