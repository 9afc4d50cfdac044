/**
 * Errors raised while registering or dispatching model-requested function calls.
 */

export class FunctionCallError extends Error {
  readonly code: string = 'function_call_error'

  constructor(
    message: string,
    readonly functionName: string
  ) {
    super(message)
    this.name = 'FunctionCallError'
  }
}

export class FunctionNotFoundError extends FunctionCallError {
  readonly code = 'function_not_found'

  constructor(functionName: string) {
    super(`Function not found: ${functionName}`, functionName)
    this.name = 'FunctionNotFoundError'
  }
}

export class SchemaMismatchError extends FunctionCallError {
  readonly code = 'schema_mismatch'

  constructor(
    functionName: string,
    readonly issues: string[]
  ) {
    super(
      `Arguments for function ${functionName} do not match its input schema: ${issues.join('; ')}`,
      functionName
    )
    this.name = 'SchemaMismatchError'
  }
}

export class FunctionDefinitionError extends FunctionCallError {
  readonly code = 'function_definition_error'

  constructor(functionName: string, reason: string) {
    super(`Invalid function ${functionName}: ${reason}`, functionName)
    this.name = 'FunctionDefinitionError'
  }
}
