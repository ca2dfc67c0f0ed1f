/**
 * Server Entry Point
 * Initializes Express server and Socket.IO
 */

import { createServer } from 'http';
import { createApp } from './app';
import { initializeSocket } from './lib/socket';
import { rateLimitManager } from './lib/rate-limit';
import { forwardActionEvents, registerChatSocketHandlers } from './modules/chat/chat.socket';
import { chatService } from './modules/chat/chat.service';
import { extractionActionsService } from './modules/chat/extraction-actions.service';
import { env } from './config/env';

const startServer = async (): Promise<void> => {
  const app = createApp();
  const httpServer = createServer(app);
  const io = initializeSocket(httpServer);

  io.on('connection', (socket) => {
    console.log(`✅ Socket connected: ${socket.id}`);

    registerChatSocketHandlers(socket);

    socket.on('disconnect', () => {
      console.log(`❌ Socket disconnected: ${socket.id}`);
    });
  });

  const stopForwarding = forwardActionEvents(io, extractionActionsService);

  await new Promise<void>((resolve) => {
    httpServer.listen(env.PORT, resolve);
  });

  console.log('');
  console.log('🚀 ═══════════════════════════════════════════════════════');
  console.log('🚀 Chat answer extractor is running');
  console.log(`🚀 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🚀 Target: ${env.CHAT_URL}`);
  console.log(`🚀 Max concurrent extractions: ${env.MAX_CONCURRENT_EXTRACTIONS}`);
  console.log(`🚀 API: http://localhost:${env.PORT}/health`);
  console.log(`🚀 Socket.IO: ws://localhost:${env.PORT}`);
  console.log('🚀 ═══════════════════════════════════════════════════════');
  console.log('');

  // Graceful shutdown: cancel in-flight runs so their browsers close
  const shutdown = (signal: string) => {
    console.log(`${signal} signal received: closing HTTP server`);
    for (const runId of chatService.getActiveRunIds()) {
      chatService.cancel(runId);
    }
    stopForwarding();
    rateLimitManager.destroy();
    io.close(() => {
      console.log('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
