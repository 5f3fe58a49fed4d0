/**
 * Unit tests for SessionCreationStateMachine
 */

import { describe, it, expect, beforeEach } from "vitest";

import {
  authenticateNewSessionRequestSchema,
  beginMutualAuthentication,
  bytesToHex,
  completeAuthenticationRequestSchema,
  completeMutualAuthentication,
  parseHexToBytes,
  parseTagUid,
  type TokenSessionRecord,
} from "@workshop-access/shared";

import { RequestBroker } from "../src/lib/request-broker.js";
import {
  SessionCreationStateMachine,
  type SessionCreationState,
} from "../src/lib/session-creation.js";
import { SessionRegistry } from "../src/lib/session-registry.js";
import { SimulatedTag } from "../src/lib/simulated-tag.js";
import { TagAuthenticationRelay, type NfcTransceiver } from "../src/lib/tag-auth-relay.js";
import { FakeClock } from "./helpers/fake-clock.js";
import { DeferredTransceiver } from "./helpers/deferred-transceiver.js";
import { RecordingTransport } from "./helpers/recording-transport.js";
import { ScriptedTransceiver } from "./helpers/scripted-transceiver.js";

const key = parseHexToBytes("00112233445566778899aabbccddeeff");
const uidHex = "04a1b2c3d4e5f6";
const uid = parseTagUid(uidHex);
const rndA = parseHexToBytes("a0a1a2a3a4a5a6a7a8a9aaabacadaeaf");

function record(overrides: Partial<TokenSessionRecord> = {}): TokenSessionRecord {
  return {
    tagUid: uidHex,
    sessionId: "sess_1",
    expirationUnixSeconds: 1_710_295_200,
    userId: "user-ada",
    userLabel: "Ada Example",
    permissions: ["laser"],
    ...overrides,
  };
}

/**
 * Transceiver whose answer is released by the test
 */
describe("SessionCreationStateMachine", () => {
  let clock: FakeClock;
  let transport: RecordingTransport;
  let broker: RequestBroker;
  let registry: SessionRegistry;

  beforeEach(() => {
    clock = new FakeClock();
    transport = new RecordingTransport();
    broker = new RequestBroker(transport, clock);
    registry = new SessionRegistry();
  });

  function machineFor(transceiver: NfcTransceiver): SessionCreationStateMachine {
    return new SessionCreationStateMachine({
      tagUid: uid,
      broker,
      registry,
      relay: new TagAuthenticationRelay(transceiver),
      clock,
    });
  }

  function simulatedTag(delayedAttempts = 0): SimulatedTag {
    return new SimulatedTag({ uid, keys: new Map([[2, key]]), delayedAttempts });
  }

  describe("Fast path", () => {
    it("should succeed without any request when the registry holds an active session", async () => {
      const registered = registry.register(record());
      const machine = machineFor(simulatedTag());

      const state = await machine.step();

      expect(state).toEqual({ type: "succeeded", session: registered });
      expect(transport.sent).toHaveLength(0);
    });

    it("should ask the backend when the registered session has expired", async () => {
      registry.register(record());
      clock.set(1_710_295_200_000);
      const machine = machineFor(simulatedTag());

      const state = await machine.step();

      expect(state.type).toBe("awaitStartSessionResponse");
      expect(transport.last().method).toBe("startSession");
      expect(transport.last().payload).toEqual({ tagUid: uidHex });
    });
  });

  describe("Full handshake", () => {
    it("should authenticate the tag and register the new session", async () => {
      const tag = simulatedTag();
      const machine = machineFor(tag);
      const seen: string[] = [];
      machine.onStateChange((state) => seen.push(state.type));

      await machine.step();
      transport.respond({ result: { type: "authRequired" } });

      await machine.step();
      const authenticate = transport.last();
      expect(authenticate.method).toBe("authenticateNewSession");
      expect(machine.getState().type).toBe("awaitAuthenticateNewSessionResponse");

      const { tagChallenge } = authenticateNewSessionRequestSchema.parse(authenticate.payload);
      const backend = beginMutualAuthentication(parseHexToBytes(tagChallenge), key, () => rndA.slice());
      transport.respond({ sessionId: "sess_1", cloudChallenge: bytesToHex(backend.cloudChallenge) });

      await machine.step();
      const complete = transport.last();
      expect(complete.method).toBe("completeAuthentication");
      const { sessionId, encryptedTagResponse } = completeAuthenticationRequestSchema.parse(complete.payload);
      expect(sessionId).toBe("sess_1");
      const verified = completeMutualAuthentication(parseHexToBytes(encryptedTagResponse), key, rndA);
      expect(verified.transactionId).toHaveLength(4);

      transport.respond({ result: { type: "newSession", session: record() } });
      const state = await machine.step();

      expect(state.type).toBe("succeeded");
      expect(registry.getBySessionId("sess_1")?.userLabel).toBe("Ada Example");
      expect(machine.isDone()).toBe(true);
      expect(seen).toEqual([
        "awaitStartSessionResponse",
        "awaitAuthenticateNewSessionResponse",
        "awaitCompleteAuthenticationResponse",
        "succeeded",
      ]);
    });

    it("should accept an existing session from the backend", async () => {
      const machine = machineFor(simulatedTag());
      await machine.step();
      transport.respond({ result: { type: "existingSession", session: record({ sessionId: "sess_9" }) } });

      const state = await machine.step();

      expect(state.type).toBe("succeeded");
      expect(registry.getBySessionId("sess_9")).toBeDefined();
      expect(transport.sent).toHaveLength(1);
    });

    it("should not advance before the response arrives", async () => {
      const machine = machineFor(simulatedTag());
      await machine.step();
      await machine.step();
      await machine.step();

      expect(machine.getState().type).toBe("awaitStartSessionResponse");
      expect(transport.sent).toHaveLength(1);
    });

    it("should retry the tag after an authentication delay", async () => {
      const tag = simulatedTag(1);
      const machine = machineFor(tag);
      await machine.step();
      transport.respond({ result: { type: "authRequired" } });

      await machine.step();
      expect(machine.getState().type).toBe("awaitStartSessionResponse");
      expect(transport.sent).toHaveLength(1);

      await machine.step();
      expect(machine.getState().type).toBe("awaitAuthenticateNewSessionResponse");
      expect(tag.commandCount).toBe(2);
    });
  });

  describe("Rejection", () => {
    it("should end in rejected when StartSession is refused", async () => {
      const machine = machineFor(simulatedTag());
      await machine.step();
      transport.respond({ result: { type: "rejected", message: "Token has been deactivated" } });

      const state = await machine.step();

      expect(state).toEqual({ type: "rejected", message: "Token has been deactivated" });
    });

    it("should end in rejected when CompleteAuthentication is refused", async () => {
      const machine = machineFor(simulatedTag());
      await machine.step();
      transport.respond({ result: { type: "authRequired" } });
      await machine.step();
      const { tagChallenge } = authenticateNewSessionRequestSchema.parse(transport.last().payload);
      const backend = beginMutualAuthentication(parseHexToBytes(tagChallenge), key);
      transport.respond({ sessionId: "sess_1", cloudChallenge: bytesToHex(backend.cloudChallenge) });
      await machine.step();

      transport.respond({ result: { type: "rejected", message: "Authentication failed" } });
      const state = await machine.step();

      expect(state).toEqual({ type: "rejected", message: "Authentication failed" });
      expect(registry.size()).toBe(0);
    });
  });

  describe("Failures", () => {
    it("should time out only after a tick past the deadline", async () => {
      const machine = machineFor(simulatedTag());
      await machine.step();
      const start = clock.now();

      broker.tick(start + 5_000);
      expect(machine.getState().type).toBe("awaitStartSessionResponse");

      broker.tick(start + 5_001);
      expect(machine.getState()).toEqual({
        type: "failed",
        error: "Timeout",
        message: "startSession timed out",
      });
    });

    it("should fail with MalformedResponse on an unexpected payload", async () => {
      const machine = machineFor(simulatedTag());
      await machine.step();
      transport.respond({ result: { type: "somethingElse" } });

      const state = await machine.step();

      expect(state.type).toBe("failed");
      if (state.type === "failed") {
        expect(state.error).toBe("MalformedResponse");
        expect(state.message).toMatch(/^Invalid StartSession response/);
      }
    });

    it("should fail with MalformedResponse when the session belongs to another tag", async () => {
      const machine = machineFor(simulatedTag());
      await machine.step();
      transport.respond({
        result: { type: "existingSession", session: record({ tagUid: "04111111111111", sessionId: "sess_x" }) },
      });

      const state = await machine.step();

      expect(state).toEqual({
        type: "failed",
        error: "MalformedResponse",
        message: "Session sess_x belongs to another tag",
      });
    });

    it("should fail with NtagFailed when the tag refuses", async () => {
      const machine = machineFor(new ScriptedTransceiver([Uint8Array.of(0x91, 0xae)]));
      await machine.step();
      transport.respond({ result: { type: "authRequired" } });

      const state = await machine.step();

      expect(state).toEqual({ type: "failed", error: "NtagFailed", message: "Tag returned status 91ae" });
      expect(transport.sent).toHaveLength(1);
    });

    it("should fail as soon as the transport reports an error", async () => {
      const machine = machineFor(simulatedTag());
      await machine.step();

      transport.fail("INTERNAL_ERROR: boom");

      expect(machine.getState()).toEqual({
        type: "failed",
        error: "Unspecified",
        message: "INTERNAL_ERROR: boom",
      });
    });

    it("should fail when the request cannot be sent", async () => {
      transport.failNextSend = new Error("socket closed");
      const machine = machineFor(simulatedTag());

      const state = await machine.step();

      expect(state).toEqual({ type: "failed", error: "Unspecified", message: "Send failed: socket closed" });
    });
  });

  describe("Abort", () => {
    it("should cancel the pending request", async () => {
      const machine = machineFor(simulatedTag());
      await machine.step();

      machine.abort("tag removed");
      transport.respond({ result: { type: "authRequired" } });
      await machine.step();

      expect(machine.getState()).toEqual({ type: "failed", error: "Aborted", message: "tag removed" });
      expect(broker.pendingCount()).toBe(0);
    });

    it("should ignore a tag answer that arrives after the abort", async () => {
      const transceiver = new DeferredTransceiver();
      const machine = machineFor(transceiver);
      await machine.step();
      transport.respond({ result: { type: "authRequired" } });

      const stepping = machine.step();
      machine.abort("another tag presented");
      transceiver.answer(Uint8Array.of(...new Uint8Array(16), 0x91, 0xaf));
      const state: SessionCreationState = await stepping;

      expect(state).toEqual({ type: "failed", error: "Aborted", message: "another tag presented" });
      expect(transport.sent).toHaveLength(1);
    });

    it("should have no effect once finished", async () => {
      registry.register(record());
      const machine = machineFor(simulatedTag());
      await machine.step();

      machine.abort();

      expect(machine.getState().type).toBe("succeeded");
    });
  });
});
