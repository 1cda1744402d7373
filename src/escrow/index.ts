export * from './types';
export * from './escrow-manager';
