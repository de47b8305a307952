export enum ErrorCode {
  InvalidDeclaration = 'InvalidDeclaration',
  InvalidDecoratorTarget = 'InvalidDecoratorTarget',
  UnresolvedMember = 'UnresolvedMember',
  DecoratorEvaluationFailure = 'DecoratorEvaluationFailure',
  DecoratorInvocationFailure = 'DecoratorInvocationFailure',
  InvalidDecoratorReturnValue = 'InvalidDecoratorReturnValue',
  InvalidAddInitializerTiming = 'InvalidAddInitializerTiming',
  InvalidInitializer = 'InvalidInitializer',
  DecoratorApplicationFailure = 'DecoratorApplicationFailure',
  DefinitionSealed = 'DefinitionSealed',
}
