export * from './types';
export * from './pow';
export * from './proof-tags';
export * from './validator';
