/**
 * Chat Socket Handlers
 * Live extraction progress over Socket.IO
 */

import type { Server, Socket } from 'socket.io';
import { chatService, type ChatService } from './chat.service';
import type { ExtractionActionsService } from './extraction-actions.service';

export const runRoom = (runId: string): string => `run:${runId}`;

/**
 * Register extraction socket event handlers
 */
export const registerChatSocketHandlers = (socket: Socket, service: ChatService = chatService): void => {
  /**
   * Join a run room for real-time action events
   */
  socket.on('extraction:join', (runId: string) => {
    void socket.join(runRoom(runId));
    console.log(`Socket ${socket.id} joined run room: ${runId}`);
  });

  socket.on('extraction:leave', (runId: string) => {
    void socket.leave(runRoom(runId));
    console.log(`Socket ${socket.id} left run room: ${runId}`);
  });

  /**
   * Cancel a run via socket
   */
  socket.on('extraction:cancel', (runId: string) => {
    const cancelled = service.cancel(runId);
    socket.emit('extraction:cancel:response', cancelled
      ? { success: true, runId }
      : { success: false, runId, error: 'Extraction run not found' });
  });
};

/**
 * Relay every action event to its run room. Returns an unsubscribe function.
 */
export const forwardActionEvents = (io: Server, actions: ExtractionActionsService): (() => void) =>
  actions.onAction((event) => {
    io.to(runRoom(event.runId)).emit('extraction:action', event);
  });
