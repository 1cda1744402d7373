export * from './structured-logger';
export * from './metrics';
export * from './keyed-executor';
export * from './worker-pool';
