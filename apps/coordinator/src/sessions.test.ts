import test from "node:test";
import assert from "node:assert/strict";
import type { CloseHandler, FrameChannel, FrameHandler, RegistrationRequest } from "@fleetlink/protocol";
import { logger } from "./logger.js";
import { Monitor } from "./monitor.js";
import { isLive, SessionRegistry, type RemovalReason } from "./sessions.js";

class FakeChannel implements FrameChannel {
  readonly sent: string[] = [];
  private closeHandlers: CloseHandler[] = [];
  private open = true;

  constructor(readonly remoteAddress = "10.0.0.7", readonly remotePort = 50123) {}

  get isOpen(): boolean {
    return this.open;
  }

  async send(frame: string): Promise<void> {
    this.sent.push(frame);
  }

  onFrame(_handler: FrameHandler): void {}

  onClose(handler: CloseHandler): void {
    this.closeHandlers.push(handler);
  }

  close(): void {
    if (!this.open) return;
    this.open = false;
    for (const handler of this.closeHandlers) handler("closed locally");
  }
}

function request(name: string, accelerated = false): RegistrationRequest {
  return {
    type: "REGISTER",
    endpointName: name,
    hardwareDescription: "CPU: 4 cores.",
    acceleratorAvailable: accelerated,
  };
}

test("a new session starts idle with no current task", () => {
  const registry = new SessionRegistry();
  const { session, superseded } = registry.register(request("ep-1", true), new FakeChannel(), 1000);

  assert.equal(superseded, null);
  assert.equal(registry.count, 1);
  assert.equal(session.name, "ep-1");
  assert.equal(session.state, "Available");
  assert.equal(session.currentTaskId, "");
  assert.equal(session.acceleratorAvailable, true);
  assert.equal(session.connectedAt, 1000);
  assert.equal(session.lastSeenAt, 1000);
  assert.deepEqual(registry.find("ep-1"), session);
  assert.deepEqual(registry.find(session.id), session);
});

test("an unnamed endpoint gets a generated name from its address", () => {
  const registry = new SessionRegistry();
  const { session } = registry.register(request(""), new FakeChannel("10.0.0.9"));

  assert.match(session.name, /^Endpoint-10\.0\.0\.9-[0-9a-f]{8}$/);
});

test("lastSeenAt never moves backwards", () => {
  const registry = new SessionRegistry();
  const { session } = registry.register(request("ep-1"), new FakeChannel(), 1000);

  registry.touch(session.id, 2000);
  registry.touch(session.id, 1500);

  assert.equal(registry.get(session.id)?.lastSeenAt, 2000);
});

test("re-registering the same name from the same address replaces the old session", () => {
  const registry = new SessionRegistry();
  const removed: RemovalReason[] = [];
  registry.on("removed", (_session, reason) => removed.push(reason));

  const firstChannel = new FakeChannel();
  const first = registry.register(request("ep-1"), firstChannel).session;
  const second = registry.register(request("ep-1"), new FakeChannel());

  assert.equal(registry.count, 1);
  assert.equal(second.superseded?.id, first.id);
  assert.equal(firstChannel.isOpen, false);
  assert.deepEqual(removed, ["superseded"]);
  assert.equal(registry.get(first.id), undefined);
});

test("two processes with one name on one host keep separate sessions", () => {
  const registry = new SessionRegistry();
  const firstChannel = new FakeChannel();
  registry.register({ ...request("ep-1"), instanceId: "a1" }, firstChannel);
  const second = registry.register({ ...request("ep-1"), instanceId: "b2" }, new FakeChannel());

  assert.equal(registry.count, 2);
  assert.equal(second.superseded, null);
  assert.equal(firstChannel.isOpen, true);

  const again = registry.register({ ...request("ep-1"), instanceId: "a1" }, new FakeChannel());
  assert.equal(registry.count, 2);
  assert.equal(again.superseded?.instanceId, "a1");
  assert.equal(firstChannel.isOpen, false);
});

test("a status telegram sent before a dispatched task arrived does not clear it", () => {
  const registry = new SessionRegistry();
  const { session } = registry.register(request("ep-1"), new FakeChannel());

  registry.setCurrentTask(session.id, "T1");
  registry.updateStatus(session.id, { cpuLoad: 5, state: "Available", taskId: null });
  assert.equal(registry.get(session.id)?.currentTaskId, "T1");
  assert.equal(registry.get(session.id)?.state, "Processing");
  assert.equal(registry.get(session.id)?.cpuLoad, 5);

  registry.updateStatus(session.id, { cpuLoad: 80, state: "Processing", taskId: "T1" });
  registry.updateStatus(session.id, { cpuLoad: 6, state: "Available", taskId: null });
  assert.equal(registry.get(session.id)?.currentTaskId, "");
  assert.equal(registry.get(session.id)?.state, "Available");
});

test("the same name from another address is a separate session", () => {
  const registry = new SessionRegistry();
  registry.register(request("ep-1"), new FakeChannel("10.0.0.7"));
  registry.register(request("ep-1"), new FakeChannel("10.0.0.8"));

  assert.equal(registry.count, 2);
});

test("removing one session leaves the other untouched", () => {
  const registry = new SessionRegistry();
  const a = registry.register(request("ep-a"), new FakeChannel("10.0.0.7"), 1000).session;
  const b = registry.register(request("ep-b"), new FakeChannel("10.0.0.8"), 1000).session;
  registry.updateStatus(b.id, { cpuLoad: 37.5, state: "Processing", taskId: "T7" });
  const before = registry.get(b.id);

  assert.equal(registry.unregister(a.id), true);

  assert.equal(registry.count, 1);
  assert.deepEqual(registry.get(b.id), before);
  assert.equal(registry.get(b.id)?.currentTaskId, "T7");
});

test("task dispatch and completion move the session between states", () => {
  const registry = new SessionRegistry();
  const completions: string[] = [];
  registry.on("taskCompleted", (_session, taskId, result) => completions.push(`${taskId}:${result}`));
  const { session } = registry.register(request("ep-1"), new FakeChannel());

  registry.setCurrentTask(session.id, "T1");
  assert.equal(registry.get(session.id)?.state, "Processing");

  registry.completeTask(session.id, "T1", "Task completed successfully");
  assert.equal(registry.get(session.id)?.currentTaskId, "");
  assert.equal(registry.get(session.id)?.state, "Available");
  assert.deepEqual(completions, ["T1:Task completed successfully"]);
});

test("status updates map an idle task to an empty id", () => {
  const registry = new SessionRegistry();
  const { session } = registry.register(request("ep-1"), new FakeChannel());

  registry.updateStatus(session.id, { cpuLoad: 12, state: "Available", taskId: null });

  assert.equal(registry.get(session.id)?.cpuLoad, 12);
  assert.equal(registry.get(session.id)?.currentTaskId, "");
});

test("liveness follows the age of lastSeenAt", () => {
  const registry = new SessionRegistry();
  const { session } = registry.register(request("ep-1"), new FakeChannel(), 10_000);

  assert.equal(isLive(session, 1000, 10_900), true);
  assert.equal(isLive(session, 1000, 11_000), true);
  assert.equal(isLive(session, 1000, 11_001), false);
});

test("monitor records connection history and task counts", () => {
  const registry = new SessionRegistry();
  const monitor = new Monitor(registry, 1000);

  const { session } = registry.register(request("ep-1"), new FakeChannel(), 5000);
  registry.completeTask(session.id, "T1", "done");
  registry.completeTask(session.id, "T2", "done");

  const [status] = monitor.getEndpointsStatus(5500);
  assert.equal(status.tasksCompleted, 2);
  assert.equal(status.live, true);
  assert.equal(monitor.getSummary(5500).tasksCompleted, 2);

  registry.unregister(session.id);
  assert.deepEqual(
    monitor.getConnectionHistory().map((event) => event.event),
    ["DISCONNECTED", "CONNECTED"]
  );
});

test("each connection change reaches the monitor's log once", () => {
  const registry = new SessionRegistry();
  const monitor = new Monitor(registry, 1000);
  const stop = monitor.collect(logger);
  try {
    const { session } = registry.register(request("ep-1"), new FakeChannel());
    logger.connection("ep-1", "10.0.0.7", "registered");
    registry.unregister(session.id);
    logger.connection("ep-1", "10.0.0.7", "disconnected");
  } finally {
    stop();
  }

  assert.deepEqual(
    monitor.getLogs().map(({ level, source, message }) => ({ level, source, message })),
    [
      { level: "INFO", source: "Connection", message: "❌ Endpoint ep-1 (10.0.0.7) disconnected" },
      { level: "INFO", source: "Connection", message: "✅ Endpoint ep-1 (10.0.0.7) registered" },
    ]
  );
});
