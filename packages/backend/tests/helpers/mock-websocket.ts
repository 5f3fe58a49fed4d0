/**
 * Mock WebSocket for Testing
 * Stands in for a terminal socket without a network connection
 */

import { EventEmitter } from "node:events";

export class MockWebSocket extends EventEmitter {
  public sentMessages: string[] = [];
  public closed = false;

  send(data: string): void {
    if (this.closed) {
      throw new Error("WebSocket is closed");
    }
    this.sentMessages.push(data);
  }

  close(): void {
    this.closed = true;
    this.emit("close");
  }

  /**
   * Simulate a JSON frame from the terminal
   */
  receive(data: unknown): void {
    this.emit("message", Buffer.from(JSON.stringify(data)));
  }

  /**
   * Simulate a raw text frame
   */
  receiveText(text: string): void {
    this.emit("message", Buffer.from(text));
  }

  /**
   * Sent frames, decoded
   */
  decoded(): unknown[] {
    return this.sentMessages.map((m): unknown => JSON.parse(m));
  }
}
