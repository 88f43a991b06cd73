import express from 'express';
import cors from 'cors';
import http from 'http';
import { ILogger } from './logger';
import { ConversationState } from './agent/state/conversation.state';

export function createDebugApp(state: ConversationState, logger: ILogger): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/state', (_req, res) => {
    res.json(state.getDebugState());
  });

  app.post('/clear-state', (_req, res) => {
    state.clearMessages();
    void logger.info('DEBUG_SERVER', 'Conversation state cleared via API');
    res.status(200).send({ message: 'Conversation state cleared' });
  });

  app.get('/logs', (_req, res) => {
    res.json(logger.getArchivedLogs());
  });

  return app;
}

/**
 * Read-only window into the running client: current conversation and recent
 * log entries. Falls back to a random port when the preferred one is taken.
 */
export class DebugServer {
  private server: http.Server | null = null;

  constructor(private readonly state: ConversationState, private readonly logger: ILogger) {}

  async start(preferredPort: number): Promise<number> {
    const server = http.createServer(createDebugApp(this.state, this.logger));
    this.server = server;

    const tryListen = (port: number): Promise<number> => {
      return new Promise((resolve, reject) => {
        const onError = (error: NodeJS.ErrnoException) => {
          server.removeListener('listening', onListening);

          if (error.code === 'EADDRINUSE') {
            void this.logger.warn('DEBUG_SERVER', `Port ${port} is in use. Trying a random port.`);
            const randomPort = Math.floor(Math.random() * (65535 - 1024 + 1)) + 1024;
            tryListen(randomPort).then(resolve, reject);
          } else {
            void this.logger.error('DEBUG_SERVER', 'Debug server error', { error: error.message });
            reject(error);
          }
        };

        const onListening = () => {
          server.removeListener('error', onError);
          const address = server.address();
          const actualPort = typeof address === 'object' && address !== null ? address.port : port;
          void this.logger.info('DEBUG_SERVER', `Debug server listening on port ${actualPort}`);
          resolve(actualPort);
        };

        server.once('error', onError);
        server.once('listening', onListening);
        server.listen(port, '127.0.0.1');
      });
    };

    return tryListen(preferredPort);
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server || !server.listening) return;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          void this.logger.error('DEBUG_SERVER', 'Error closing debug server', { error: err.message });
          reject(err);
        } else {
          void this.logger.info('DEBUG_SERVER', 'Debug server closed');
          resolve();
        }
      });
    });
  }
}
