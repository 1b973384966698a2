export * from './classifier';
export * from './evaluator';
export * from './keywords';
export * from './loader';
export * from './schemas';
export * from './screening';
export * from './template-syntax';
