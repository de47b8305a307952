export * from './constants';
export * from './interfaces';
export * from './types';
export * from './schema';
export * from './declaration-tree';
