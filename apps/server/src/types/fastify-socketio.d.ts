import { Server as SocketIOServer } from 'socket.io'

// fastify-socket.io decorates the instance with the socket.io server
declare module 'fastify' {
  interface FastifyInstance {
    io: SocketIOServer
  }
}
