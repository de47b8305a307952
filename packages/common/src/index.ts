export * from './enums';
export * from './types';
export * from './utils';

export { AdornError } from './errors/adorn.error';
export * from './errors/errors';
