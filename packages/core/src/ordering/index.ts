export * from './interfaces';
export * from './evaluation-order';
export * from './application-order';
export * from './application-plan';
export { describeMember, describeTarget } from './helpers';
