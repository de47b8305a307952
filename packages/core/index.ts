export * from './src/declaration';
export * from './src/ordering';
export * from './src/decorators';
export * from './src/metadata';
export * from './src/engine';
