export * from './types';
export * from './transaction-state-machine';
