import type { Server } from 'http'
import type { Socket } from 'net'
import { logger } from '../../logger'
import { setDraining } from './readiness'

export function createDrainManager(server: Server, timeoutMs = 15000) {
  const sockets = new Set<Socket>()

  server.on('connection', (socket) => {
    sockets.add(socket)
    socket.on('close', () => sockets.delete(socket))
  })

  const drain = async () => {
    setDraining(true)
    logger.info({ openSockets: sockets.size }, 'Draining connections')

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        logger.warn({ openSockets: sockets.size }, 'Force closing lingering sockets after drain timeout')
        sockets.forEach((socket) => socket.destroy())
        resolve()
      }, timeoutMs)

      // Stop accepting new connections; the callback fires once every socket has closed
      server.close(() => {
        clearTimeout(timeout)
        logger.info('All connections drained')
        resolve()
      })
    })
  }

  return { drain }
}
