export * from './engine';
export * from './format';
