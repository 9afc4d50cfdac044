import { OllamaProvider } from '@/providers/ai/ollama-provider.js'
import { AppConfig, loadConfig } from '@/shared/config/env.js'
import { RegisteredFunction } from '@/tools/function-callback.js'
import { FunctionCallbackRegistry } from '@/tools/function-callback-registry.js'
import { makeCurrentWeatherFunction } from '@/tools/weather/current-weather-function.js'
import { ChatWithFunctionsUseCase } from '../chat-with-functions.js'

export function makeOllamaProvider(config: AppConfig = loadConfig()) {
  return new OllamaProvider({
    baseUrl: config.ollama.baseUrl,
    chatModel: config.ollama.chatModel,
    embeddingModel: config.ollama.embeddingModel,
    temperature: config.ollama.temperature,
    maxToolIterations: config.ollama.maxToolIterations
  })
}

export function makeChatWithFunctions(
  config: AppConfig = loadConfig(),
  functions: RegisteredFunction[] = [makeCurrentWeatherFunction()]
) {
  const registry = new FunctionCallbackRegistry(functions)
  return new ChatWithFunctionsUseCase(makeOllamaProvider(config), registry)
}
