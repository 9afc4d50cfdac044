export class VectorStoreError extends Error {
  readonly code: string = 'vector_store_error'

  constructor(message: string) {
    super(message)
    this.name = 'VectorStoreError'
  }
}

export class SchemaNotInitializedError extends VectorStoreError {
  readonly code = 'schema_not_initialized'

  constructor(readonly indexName: string) {
    super(
      `Index ${indexName} does not exist; create it beforehand or enable schema initialization`
    )
    this.name = 'SchemaNotInitializedError'
  }
}

export class UnknownFilterFieldError extends VectorStoreError {
  readonly code = 'unknown_filter_field'

  constructor(
    readonly field: string,
    declaredFields: string[]
  ) {
    super(
      `Filter field ${field} is not a declared metadata field (declared: ${
        declaredFields.length > 0 ? declaredFields.join(', ') : 'none'
      })`
    )
    this.name = 'UnknownFilterFieldError'
  }
}

export class FilterSyntaxError extends VectorStoreError {
  readonly code = 'filter_syntax_error'

  constructor(
    message: string,
    readonly position: number
  ) {
    super(`${message} at position ${position}`)
    this.name = 'FilterSyntaxError'
  }
}

export class FilterTranslationError extends VectorStoreError {
  readonly code = 'filter_translation_error'

  constructor(message: string) {
    super(message)
    this.name = 'FilterTranslationError'
  }
}

export class DocumentTooLargeError extends VectorStoreError {
  readonly code = 'document_too_large'

  constructor(
    readonly tokenCount: number,
    readonly maxTokenCount: number
  ) {
    super(
      `Document has ${tokenCount} tokens, more than the ${maxTokenCount} allowed in one batch`
    )
    this.name = 'DocumentTooLargeError'
  }
}
