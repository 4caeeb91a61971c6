// src/memory/SessionStore.ts
import type { SessionMemory } from './sessionMemory';

export interface SessionStore {
  get(sessionId: string): Promise<SessionMemory | null>;
  set(sessionId: string, memory: SessionMemory): Promise<void>;
  delete(sessionId: string): Promise<void>;
  size(): number;
  destroy(): void;
}
