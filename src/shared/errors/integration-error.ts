export class IntegrationError extends Error {
  readonly code = 'integration_error'

  constructor(
    message: string,
    readonly context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'IntegrationError'
  }
}
