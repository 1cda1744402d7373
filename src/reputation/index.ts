export * from './types';
export * from './reputation-store';
export * from './reputation-engine';
