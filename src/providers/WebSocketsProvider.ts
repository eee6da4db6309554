// src/providers/WebSocketsProvider.ts
import { AcquisitionStatus } from '../services/AcquisitionStatusService';
import { Server as SocketIOServer } from 'socket.io';

/**
 * Creates the Socket.IO server on top of the status HTTP server and hands it
 * to the status service, which emits 'reading' events on it.
 */
export const initWebSockets = (
  server: import('http').Server,
): SocketIOServer => {
  const io = new SocketIOServer(server, {
    cors: {
      origin: true,
      methods: ['GET'],
    },
  });

  AcquisitionStatus.init(io);

  io.on('connection', socket => {
    console.log(`[Status] WebSocket client connected, id: ${socket.id}`);
    socket.on('disconnect', () => {
      console.log(`[Status] WebSocket client disconnected, id: ${socket.id}`);
    });
  });

  return io;
};
