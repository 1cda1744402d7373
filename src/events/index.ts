export * from './types';
export * from './tags';
export * from './codec';
export * from './content';
export * from './builders';
