import { Logger } from '@aws-lambda-powertools/logger'
import { loadConfig } from '../config/env.js'

let logger: Logger | null = null

export const getLogger = (): Logger => {
  if (logger) {
    return logger
  }
  const { serviceName, logLevel } = loadConfig()
  logger = new Logger({
    serviceName,
    logLevel
  })
  return logger
}
