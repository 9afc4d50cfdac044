import { chatWithFunctionsHandler } from '@/handlers/chat-with-functions.js'
import { deleteDocumentsHandler } from '@/handlers/delete-documents.js'
import { HandlerResponse } from '@/handlers/handler-response.js'
import { ingestDocumentsHandler } from '@/handlers/ingest-documents.js'
import { searchDocumentsHandler } from '@/handlers/search-documents.js'
import { closeRedis } from '@/shared/clients/redis-client.js'
import { getLogger } from '@/shared/logger/get-logger.js'

const logger = getLogger()

const handlers: Record<string, (event: unknown) => Promise<HandlerResponse<unknown>>> = {
  'chat-with-functions': chatWithFunctionsHandler,
  'ingest-documents': ingestDocumentsHandler,
  'search-documents': searchDocumentsHandler,
  'delete-documents': deleteDocumentsHandler
}

const usage = `Usage: main <${Object.keys(handlers).join('|')}> '<json event>'`

async function main(argv: string[]): Promise<number> {
  const [command, payload = '{}'] = argv
  const handler = command ? handlers[command] : undefined
  if (!handler) {
    process.stderr.write(`${usage}\n`)
    return 2
  }

  let event: unknown
  try {
    event = JSON.parse(payload)
  } catch (error) {
    logger.error('Event is not valid JSON', { command, error })
    process.stderr.write(`${usage}\n`)
    return 2
  }

  try {
    const result = await handler(event)
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`)
    return result.success ? 0 : 1
  } finally {
    await closeRedis()
  }
}

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    logger.error('Unhandled error', { error })
    process.exitCode = 1
  })
