import { createClient } from 'redis'
import { getLogger } from '../logger/get-logger.js'

export type RedisClient = ReturnType<typeof createClient>

const logger = getLogger()

let connecting: Promise<RedisClient> | null = null

export const redis = (url: string): Promise<RedisClient> => {
  if (!connecting) {
    const created = createClient({ url })
    created.on('error', (error: unknown) => {
      logger.error('Redis client error', { error })
    })
    connecting = created
      .connect()
      .then(() => created)
      .catch((error: unknown) => {
        connecting = null
        throw error
      })
  }
  return connecting
}

export const closeRedis = async (): Promise<void> => {
  if (!connecting) {
    return
  }
  const pending = connecting
  connecting = null
  const client = await pending
  await client.quit()
}
