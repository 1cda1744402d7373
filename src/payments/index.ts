export * from './mock-lightning-node';
