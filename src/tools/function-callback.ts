import { z } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'
import {
  FunctionDefinitionError,
  SchemaMismatchError
} from '@/shared/errors/function-call-errors.js'
import { JsonSchema, ToolDefinition } from './tool-dtos.js'

const FUNCTION_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/

export interface FunctionCallbackOptions<TSchema extends z.ZodTypeAny, TOutput> {
  name: string
  description: string
  inputSchema: TSchema
  handler: (input: z.output<TSchema>) => TOutput | Promise<TOutput>
  /** Serializes the handler result; defaults to JSON. */
  responseConverter?: (output: TOutput) => string
  /** Overrides the JSON schema otherwise derived from `inputSchema`. */
  jsonSchema?: JsonSchema
}

/** What the registry needs from a callback, independent of its input and output types. */
export interface RegisteredFunction {
  readonly name: string
  readonly description: string
  getToolDefinition(): ToolDefinition
  call(args: unknown): Promise<string>
}

export class FunctionCallback<TSchema extends z.ZodTypeAny, TOutput>
  implements RegisteredFunction
{
  readonly name: string
  readonly description: string
  readonly parameters: JsonSchema
  private readonly inputSchema: TSchema
  private readonly handler: (input: z.output<TSchema>) => TOutput | Promise<TOutput>
  private readonly responseConverter: (output: TOutput) => string

  constructor(options: FunctionCallbackOptions<TSchema, TOutput>) {
    if (!FUNCTION_NAME_PATTERN.test(options.name)) {
      throw new FunctionDefinitionError(
        options.name,
        'names must be 1-64 letters, digits, underscores or dashes'
      )
    }
    if (!options.description.trim()) {
      throw new FunctionDefinitionError(options.name, 'a description is required')
    }

    this.name = options.name
    this.description = options.description
    this.inputSchema = options.inputSchema
    this.handler = options.handler
    this.responseConverter = options.responseConverter ?? toJson
    this.parameters = options.jsonSchema ?? deriveJsonSchema(options.inputSchema)
  }

  getToolDefinition(): ToolDefinition {
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: this.parameters
      }
    }
  }

  /**
   * Validates the model-supplied arguments, runs the handler and returns its
   * serialized result.
   */
  async call(args: unknown): Promise<string> {
    const decoded = typeof args === 'string' ? this.decode(args) : args
    const parsed = this.inputSchema.safeParse(decoded ?? {})
    if (!parsed.success) {
      throw new SchemaMismatchError(
        this.name,
        parsed.error.issues.map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join('.')}: ${issue.message}`
            : issue.message
        )
      )
    }
    const output = await this.handler(parsed.data)
    return this.responseConverter(output)
  }

  private decode(text: string): unknown {
    if (!text.trim()) {
      return {}
    }
    try {
      return JSON.parse(text)
    } catch (error) {
      throw new SchemaMismatchError(this.name, [
        `arguments are not valid JSON (${
          error instanceof Error ? error.message : 'Unknown error'
        })`
      ])
    }
  }
}

function toJson(output: unknown): string {
  return output === undefined ? 'null' : JSON.stringify(output)
}

const jsonSchemaObject = z.record(z.unknown())

function deriveJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const jsonSchema = jsonSchemaObject.parse(
    zodToJsonSchema(schema, { $refStrategy: 'none' })
  )
  delete jsonSchema.$schema
  return jsonSchema
}
