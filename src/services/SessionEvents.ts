/**
 * Fan-out hub between the session loop and whatever renders it
 */

import { SessionEvent, SessionListener } from '../types/session.js';
import { componentLoggers } from './LoggingService.js';

export class SessionEvents {
  private listeners: SessionListener[] = [];

  subscribe(listener: SessionListener): () => void {
    this.listeners.push(listener);

    // Return unsubscribe function
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  emit(event: SessionEvent): void {
    this.listeners.forEach(listener => {
      try {
        listener(event);
      } catch (error) {
        // a broken renderer must not stall the drill
        componentLoggers.session.error(`listener failed on ${event.type}`, error);
      }
    });
  }

  listenerCount(): number {
    return this.listeners.length;
  }
}
