import { z } from 'zod'
import { getLogger } from '@/shared/logger/get-logger.js'
import { FunctionCallback } from '../function-callback.js'

const logger = getLogger()

export const currentWeatherInputSchema = z.object({
  location: z
    .string()
    .min(1)
    .describe('The city and state, e.g. San Francisco, CA'),
  unit: z
    .enum(['C', 'F'])
    .default('C')
    .describe('Temperature unit')
})

export type CurrentWeatherInput = z.infer<typeof currentWeatherInputSchema>

export interface CurrentWeatherOutput {
  location: string
  temperature: number
  unit: 'C' | 'F'
}

// Mock readings in Celsius; unknown locations report a mild 20 degrees.
const KNOWN_TEMPERATURES: Record<string, number> = {
  'san francisco': 30,
  tokyo: 10,
  paris: 15
}

export function currentWeather(input: CurrentWeatherInput): CurrentWeatherOutput {
  const city = input.location.split(',')[0].trim().toLowerCase()
  const celsius = KNOWN_TEMPERATURES[city] ?? 20
  const temperature =
    input.unit === 'F' ? Math.round((celsius * 9) / 5 + 32) : celsius

  logger.debug('Mock weather lookup', { location: input.location, temperature })

  return { location: input.location, temperature, unit: input.unit }
}

export const makeCurrentWeatherFunction = () =>
  new FunctionCallback({
    name: 'currentWeather',
    description: 'Get the current weather in a given location',
    inputSchema: currentWeatherInputSchema,
    handler: currentWeather
  })
