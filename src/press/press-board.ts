/**
 * Press board.
 *
 * Holds every message sent during a game. Senders and recipients are player
 * identifiers checked against the registry passed in; nothing here keeps a
 * reference to player state.
 */

import type { PlayerId } from '../engine/types';

export const PUBLIC_CHANNEL = 'public';

export type PressRecipient = PlayerId | typeof PUBLIC_CHANNEL;

export interface PressMessage {
  /** Sequence number, from 1 */
  id: number;
  from: PlayerId;
  to: PressRecipient;
  content: string;
  /** Phase label at the time of sending */
  phase: string;
}

export type PressCallback = (message: PressMessage) => void;

export class PressBoard {
  private readonly players: ReadonlySet<PlayerId>;
  private messages: PressMessage[] = [];
  private callbacks: PressCallback[] = [];

  constructor(players: Iterable<PlayerId>) {
    this.players = new Set(players);
  }

  /**
   * Registers a listener for new messages.
   */
  onMessage(callback: PressCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      const idx = this.callbacks.indexOf(callback);
      if (idx !== -1) {
        this.callbacks.splice(idx, 1);
      }
    };
  }

  send(from: PlayerId, to: PressRecipient, content: string, phase: string): PressMessage {
    if (!this.players.has(from)) {
      throw new Error(`Unknown sender: ${from}`);
    }
    if (to !== PUBLIC_CHANNEL && !this.players.has(to)) {
      throw new Error(`Unknown recipient: ${to}`);
    }
    const text = content.trim();
    if (text.length === 0) {
      throw new Error('Press message is empty');
    }

    const message: PressMessage = { id: this.messages.length + 1, from, to, content: text, phase };
    this.messages.push(message);

    for (const callback of this.callbacks) {
      try {
        callback(message);
      } catch (err) {
        console.error('Press callback error:', err);
      }
    }
    return message;
  }

  /**
   * Messages on a channel: the public board, or those addressed to one player.
   */
  read(channel: PressRecipient): PressMessage[] {
    if (channel !== PUBLIC_CHANNEL && !this.players.has(channel)) {
      throw new Error(`Unknown recipient: ${channel}`);
    }
    return this.messages.filter((m) => m.to === channel);
  }

  /**
   * Everything a player can see: public messages and their own conversations.
   */
  viewFor(player: PlayerId): PressMessage[] {
    return this.messages.filter((m) => m.to === PUBLIC_CHANNEL || m.to === player || m.from === player);
  }

  all(): PressMessage[] {
    return [...this.messages];
  }

  /**
   * Restores archived messages without notifying listeners.
   */
  load(messages: readonly PressMessage[]): void {
    this.messages = messages.map((m, i) => ({ ...m, id: i + 1 }));
  }
}

export function formatPressLine(message: PressMessage): string {
  return `${message.from}/${message.to}: ${message.content}`;
}
