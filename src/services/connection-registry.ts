/**
 * Live real-time connections keyed by user id.
 *
 * A user may hold several connections at once (one per tab or device); every
 * one of them receives what is pushed to that user. Operations are plain map
 * mutations on the event loop, so Register/Unregister/Push never interleave.
 */

/** WebSocket `readyState` value of an open socket. */
const OPEN = 1;

export interface RealtimeConnection {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export type RealtimeMessage = { type: string } & Record<string, unknown>;

export class ConnectionRegistry {
  private readonly connections = new Map<string, Set<RealtimeConnection>>();

  register(userId: string, connection: RealtimeConnection): void {
    let bucket = this.connections.get(userId);
    if (!bucket) {
      bucket = new Set();
      this.connections.set(userId, bucket);
    }
    bucket.add(connection);
  }

  /** Returns false when the connection was not registered for that user. */
  unregister(userId: string, connection: RealtimeConnection): boolean {
    const bucket = this.connections.get(userId);
    if (!bucket) return false;
    const removed = bucket.delete(connection);
    if (bucket.size === 0) {
      this.connections.delete(userId);
    }
    return removed;
  }

  /**
   * Sends the message to every connection of the user and returns how many
   * connections it was handed to. Unknown users are a no-op.
   */
  push(userId: string, message: RealtimeMessage): number {
    const bucket = this.connections.get(userId);
    if (!bucket) return 0;
    const payload = JSON.stringify(message);
    let delivered = 0;
    for (const connection of [...bucket]) {
      if (this.deliver(userId, connection, payload)) delivered++;
    }
    return delivered;
  }

  broadcast(message: RealtimeMessage): number {
    const payload = JSON.stringify(message);
    let delivered = 0;
    for (const [userId, bucket] of [...this.connections]) {
      for (const connection of [...bucket]) {
        if (this.deliver(userId, connection, payload)) delivered++;
      }
    }
    return delivered;
  }

  connectionCount(userId?: string): number {
    if (userId !== undefined) {
      return this.connections.get(userId)?.size ?? 0;
    }
    let total = 0;
    for (const bucket of this.connections.values()) {
      total += bucket.size;
    }
    return total;
  }

  userIds(): string[] {
    return [...this.connections.keys()];
  }

  closeAll(code: number, reason: string): void {
    for (const [userId, bucket] of [...this.connections]) {
      for (const connection of [...bucket]) {
        this.unregister(userId, connection);
        try {
          connection.close(code, reason);
        } catch (error) {
          console.warn(`Failed to close connection for user ${userId}:`, error);
        }
      }
    }
  }

  private deliver(userId: string, connection: RealtimeConnection, payload: string): boolean {
    if (connection.readyState !== OPEN) {
      this.unregister(userId, connection);
      return false;
    }
    try {
      connection.send(payload, (err) => {
        if (err) {
          console.warn(`Dropping connection for user ${userId} after failed send:`, err.message);
          this.unregister(userId, connection);
        }
      });
      return true;
    } catch (error) {
      console.warn(`Dropping connection for user ${userId} after failed send:`, error);
      this.unregister(userId, connection);
      return false;
    }
  }
}
