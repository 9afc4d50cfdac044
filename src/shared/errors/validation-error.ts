export class ValidationError extends Error {
  readonly code: string = 'validation_error'

  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class ConfigurationError extends ValidationError {
  readonly code = 'configuration_error'

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
  }
}
