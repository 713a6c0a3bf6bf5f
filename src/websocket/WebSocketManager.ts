import http from 'http';
import { Server as SocketIOServer, Socket } from 'socket.io';
import { z } from 'zod';
import { ConversationManager } from '../services/ConversationManager';
import { logger } from '../utils/logger';

interface IncomingMessage {
  message: string;
  attachments: string[];
}

// Clients send either plain text or { message, attachments }.
const incomingMessage = z.union([
  z.string().trim().min(1).transform((message): IncomingMessage => ({ message, attachments: [] })),
  z.object({
    message: z.string().trim().min(1),
    attachments: z.array(z.string()).default([]),
  }),
]);

const sessionIdFrom = (socket: Socket): string | undefined => {
  const value = socket.handshake.query.sessionId;
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
};

export class WebSocketManager {
  private io: SocketIOServer;

  constructor(
    server: http.Server,
    private readonly conversationManager: ConversationManager,
    corsOrigins: string[] = ['*']
  ) {
    this.io = new SocketIOServer(server, {
      cors: {
        origin: corsOrigins.includes('*') ? '*' : corsOrigins,
        methods: ['GET', 'POST'],
      },
    });
    this.initialize();
  }

  close(): void {
    this.io.close();
  }

  // Reuses the client's session id from the handshake when it sends one.
  private async openSession(socket: Socket): Promise<string | null> {
    try {
      const summary = await this.conversationManager.startSession(sessionIdFrom(socket));
      logger.info('New socket connection established', { sessionId: summary.sessionId, socketId: socket.id });

      socket.emit('connected', {
        type: 'connected',
        sessionId: summary.sessionId,
        currentState: summary.currentState,
        message: 'Connected to sales agent',
      });
      socket.emit('message', {
        type: 'message',
        sessionId: summary.sessionId,
        content: summary.message,
        currentState: summary.currentState,
        timestamp: new Date().toISOString(),
      });
      return summary.sessionId;
    } catch (error) {
      logger.error('Failed to start socket session', {
        socketId: socket.id,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      socket.emit('error', { type: 'error', message: 'Could not start a session' });
      socket.disconnect(true);
      return null;
    }
  }

  /**
   * Handlers are attached before the session is open; messages that arrive
   * early wait for it and then run in the order they were received.
   */
  private initialize() {
    this.io.on('connection', (socket) => {
      const opening = this.openSession(socket);

      socket.on('message', async (data: unknown) => {
        const parsed = incomingMessage.safeParse(data);
        if (!parsed.success) {
          socket.emit('error', { type: 'error', message: 'Message must be non-empty text' });
          return;
        }
        const sessionId = await opening;
        if (!sessionId) {
          return;
        }
        logger.info('Received message', { sessionId, socketId: socket.id });

        try {
          const turn = await this.conversationManager.handleTurn(
            sessionId,
            parsed.data.message,
            parsed.data.attachments
          );
          socket.emit('message', {
            type: 'message',
            sessionId,
            content: turn.message,
            currentState: turn.currentState,
            actions: turn.actions,
            dataCollection: turn.dataCollection,
            metadata: turn.metadata,
            timestamp: new Date().toISOString(),
          });
        } catch (error) {
          logger.error('Error processing message', {
            sessionId,
            error: error instanceof Error ? error.message : 'Unknown error',
            stack: error instanceof Error ? error.stack : undefined,
          });
          socket.emit('error', {
            type: 'error',
            message: 'Error processing your message',
          });
        }
      });

      socket.on('disconnect', async () => {
        const sessionId = await opening;
        logger.info('Socket disconnected', { sessionId, socketId: socket.id });
      });
    });
  }
}
