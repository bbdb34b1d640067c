import WebSocket from 'ws';

/**
 * WebSocket client that keeps every message it receives.
 */
export class TestWebSocket {
  readonly messages: unknown[] = [];

  private constructor(readonly socket: WebSocket) {
    socket.on('message', (data) => {
      this.messages.push(JSON.parse(data.toString()));
    });
  }

  static connect(url: string): Promise<TestWebSocket> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url);
      const client = new TestWebSocket(socket);
      socket.once('open', () => resolve(client));
      socket.once('error', reject);
    });
  }

  send(message: object): void {
    this.socket.send(JSON.stringify(message));
  }

  waitForMessage(predicate: (msg: unknown) => boolean = () => true, timeout = 5000): Promise<unknown> {
    return new Promise((resolve, reject) => {
      // Check existing messages first
      const existing = this.messages.find(predicate);
      if (existing !== undefined) {
        resolve(existing);
        return;
      }

      const timer = setTimeout(() => {
        this.socket.off('message', handler);
        reject(new Error('Timeout waiting for message'));
      }, timeout);

      const handler = (data: WebSocket.RawData): void => {
        const msg: unknown = JSON.parse(data.toString());
        if (predicate(msg)) {
          clearTimeout(timer);
          this.socket.off('message', handler);
          resolve(msg);
        }
      };

      this.socket.on('message', handler);
    });
  }

  close(): void {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close();
    }
  }
}

export function hasType(type: string): (msg: unknown) => boolean {
  return (msg) => typeof msg === 'object' && msg !== null && 'type' in msg && msg.type === type;
}
