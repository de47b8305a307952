export * from './interfaces';
export { ClassBuilder } from './class-builder';
export { resolveMemberBindings } from './member-binding';
export { DecoratorEngine, decorateClass } from './decorator-engine';
