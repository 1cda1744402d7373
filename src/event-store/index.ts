export * from './types';
export * from './event-store';
