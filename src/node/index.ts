export * from './notifier';
export * from './marketplace-node';
export * from './participant';
