import { ToolExecutor } from '@/providers/ai/ai-provider.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import {
  FunctionDefinitionError,
  FunctionNotFoundError
} from '@/shared/errors/function-call-errors.js'
import { RegisteredFunction } from './function-callback.js'
import { ToolCallRequest, ToolCallResult, ToolDefinition } from './tool-dtos.js'

const logger = getLogger()

/** A view of the registry limited to the functions enabled for one request. */
export interface FunctionScope extends ToolExecutor {
  names(): string[]
  getToolDefinitions(): ToolDefinition[]
}

export class FunctionCallbackRegistry implements FunctionScope {
  private readonly functions = new Map<string, RegisteredFunction>()

  constructor(functions: RegisteredFunction[] = []) {
    this.register(...functions)
  }

  register(...functions: RegisteredFunction[]): this {
    for (const fn of functions) {
      if (this.functions.has(fn.name)) {
        throw new FunctionDefinitionError(fn.name, 'a function with this name is already registered')
      }
      this.functions.set(fn.name, fn)
    }
    return this
  }

  resolve(name: string): RegisteredFunction {
    const fn = this.functions.get(name)
    if (!fn) {
      throw new FunctionNotFoundError(name)
    }
    return fn
  }

  names(): string[] {
    return [...this.functions.keys()]
  }

  getToolDefinitions(): ToolDefinition[] {
    return [...this.functions.values()].map((fn) => fn.getToolDefinition())
  }

  async executeTool(toolName: string, input: unknown): Promise<string> {
    const fn = this.resolve(toolName)
    logger.debug('Invoking function', { functionName: toolName })
    return fn.call(input)
  }

  /**
   * Resolves each requested call on its own, in order, and returns every
   * result once all of them are done.
   */
  async executeToolCalls(calls: ToolCallRequest[]): Promise<ToolCallResult[]> {
    return executeAll(this, calls)
  }

  /**
   * Restricts dispatch to `names`; all must be registered.
   */
  scope(names: string[]): FunctionScope {
    const enabled = new Map(
      [...new Set(names)].map(
        (name): [string, RegisteredFunction] => [name, this.resolve(name)]
      )
    )

    return {
      names: () => [...enabled.keys()],
      getToolDefinitions: () =>
        [...enabled.values()].map((fn) => fn.getToolDefinition()),
      executeTool: async (toolName, input) => {
        const fn = enabled.get(toolName)
        if (!fn) {
          throw new FunctionNotFoundError(toolName)
        }
        return fn.call(input)
      }
    }
  }
}

export async function executeAll(
  executor: ToolExecutor,
  calls: ToolCallRequest[]
): Promise<ToolCallResult[]> {
  const results: ToolCallResult[] = []
  for (const call of calls) {
    const result = await executor.executeTool(call.name, call.arguments)
    results.push({ name: call.name, input: call.arguments, result })
  }
  return results
}
