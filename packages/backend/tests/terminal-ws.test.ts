/**
 * Unit tests for the terminal WebSocket handler
 */

import { describe, it, expect, beforeEach, vi } from "vitest";

import type { Backend } from "../src/backend.js";
import { handleTerminalWebSocket } from "../src/presentation/ws/terminal-ws.js";
import { ADA_TAG, createTestBackend, DEACTIVATED_TAG } from "./helpers/backend-fixture.js";
import { MockWebSocket } from "./helpers/mock-websocket.js";

describe("handleTerminalWebSocket", () => {
  let backend: Backend;
  let ws: MockWebSocket;

  beforeEach(() => {
    ({ backend } = createTestBackend());
    ws = new MockWebSocket();
    handleTerminalWebSocket(ws, backend.terminalUseCase, "term_1");
  });

  it("should answer each frame on the same socket", async () => {
    ws.receive({ type: "terminal-request", id: "req_1", method: "startSession", payload: { tagUid: ADA_TAG } });

    await vi.waitFor(() => expect(ws.sentMessages).toHaveLength(1));
    expect(ws.decoded()).toEqual([
      { type: "terminal-response", id: "req_1", payload: { result: { type: "authRequired" } } },
    ]);
  });

  it("should answer requests independently", async () => {
    ws.receive({ type: "terminal-request", id: "req_1", method: "startSession", payload: { tagUid: ADA_TAG } });
    ws.receive({ type: "terminal-request", id: "req_2", method: "startSession", payload: { tagUid: DEACTIVATED_TAG } });

    await vi.waitFor(() => expect(ws.sentMessages).toHaveLength(2));
    expect(ws.decoded()).toContainEqual({
      type: "terminal-response",
      id: "req_2",
      payload: { result: { type: "rejected", message: "Token has been deactivated" } },
    });
  });

  it("should reply to invalid JSON right away", () => {
    ws.receiveText("{not json");

    expect(ws.decoded()).toEqual([
      { type: "terminal-error", id: "", error: { code: "BAD_REQUEST", message: "Invalid JSON" } },
    ]);
  });

  it("should join fragmented frames", async () => {
    const text = JSON.stringify({
      type: "terminal-request",
      id: "req_3",
      method: "startSession",
      payload: { tagUid: ADA_TAG },
    });
    ws.emit("message", [Buffer.from(text.slice(0, 10)), Buffer.from(text.slice(10))]);

    await vi.waitFor(() => expect(ws.sentMessages).toHaveLength(1));
    expect(ws.decoded()[0]).toMatchObject({ type: "terminal-response", id: "req_3" });
  });

  it("should not throw when the socket closed before the reply", async () => {
    const handled = vi.spyOn(backend.terminalUseCase, "handle");
    ws.receive({ type: "terminal-request", id: "req_4", method: "startSession", payload: { tagUid: ADA_TAG } });
    ws.close();

    await vi.waitFor(() => expect(handled).toHaveBeenCalledTimes(1));
    await handled.mock.results[0].value;
    expect(ws.sentMessages).toHaveLength(0);
  });
});
