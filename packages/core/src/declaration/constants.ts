export const MEMBER_KINDS = ['constructor', 'method', 'setter', 'static-method', 'static-setter'] as const;

/**
 * Function shapes whose parameters never accept decorators.
 */
export const FUNCTION_KINDS = [
  'function',
  'arrow-function',
  'generator',
  'async-function',
  'async-generator',
  'object-method',
  'object-setter',
] as const;
