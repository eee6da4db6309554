import cors, { CorsOptions } from 'cors';
import express from 'express';
import helmet from 'helmet';
import http from 'http';
import morgan from 'morgan';
import { Server as SocketIOServer } from 'socket.io';
import errorHandler from './middlewares/errorHandler';
import { initWebSockets } from './providers/WebSocketsProvider';
import { statusApiLimiter } from './rateLimiters/generalRateLimiter';
import statusRoutes from './routes/statusRoutes';
// ------------------------------------------------------------------------------

const maxBodySize = '16kb';

export interface StatusServer {
  app: express.Express;
  server: http.Server;
  io: SocketIOServer;
}

/**
 * Builds the optional status API (HTTP + Socket.IO). Nothing listens until the
 * caller invokes `server.listen`.
 */
export function createStatusServer(mode: string): StatusServer {
  const app = express();

  app.use(express.json({ limit: maxBodySize }));

  if (mode === 'production') {
    app.disable('x-powered-by');
    app.use(helmet());
    app.use(helmet.crossOriginResourcePolicy({ policy: 'cross-origin' }));
    // adding morgan to log HTTP requests
    app.use(morgan('common'));
    app.use(statusApiLimiter);
  }

  const corsOptions: CorsOptions = {
    methods: ['GET', 'POST'],
    origin: true,
  };
  app.use(cors(corsOptions));

  app.use('/', statusRoutes);

  app.use(errorHandler);

  const server = http.createServer(app);

  // Initialize Socket.IO in the HTTP server
  const io: SocketIOServer = initWebSockets(server);

  return { app, server, io };
}

/** Resolves with the bound port once the server listens. */
export function listenStatusServer(status: StatusServer, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    status.server.once('error', reject);
    status.server.listen(port, () => {
      status.server.off('error', reject);
      const address = status.server.address();
      resolve(typeof address === 'object' && address ? address.port : port);
    });
  });
}

/** Closes Socket.IO (and with it the HTTP server). */
export function closeStatusServer(status: StatusServer): Promise<void> {
  return new Promise(resolve => {
    status.io.close(() => resolve());
  });
}
