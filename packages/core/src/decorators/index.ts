export * from './interfaces';
export * from './types';
export * from './decorator-result';
export * from './initializer-registry';
export * from './parameter-transforms';
export * from './context-factory';
