import test from "node:test";
import assert from "node:assert/strict";
import {
  decodeAdvertisement,
  type DatagramErrorHandler,
  type DatagramHandler,
  type DatagramSocket,
} from "@fleetlink/protocol";
import { BeaconPublisher } from "./beacon.js";

class RecordingSocket implements DatagramSocket {
  readonly sends: { payload: string; port: number; address: string }[] = [];
  boundPort: number | null = null;
  broadcast = false;
  closed = false;
  failuresLeft = 0;
  afterSend: () => void = () => {};

  async bind(port: number): Promise<void> {
    this.boundPort = port;
  }

  setBroadcast(enabled: boolean): void {
    this.broadcast = enabled;
  }

  async send(payload: string, port: number, address: string): Promise<void> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("ENETUNREACH");
    }
    this.sends.push({ payload, port, address });
    this.afterSend();
  }

  onMessage(_handler: DatagramHandler): void {}

  onError(_handler: DatagramErrorHandler): void {}

  close(): void {
    this.closed = true;
  }
}

function publisher(socket: RecordingSocket): BeaconPublisher {
  return new BeaconPublisher(socket, {
    port: 7001,
    address: "255.255.255.255",
    intervalMs: 5,
    errorBackoffMs: 5,
    advertise: () => ({
      name: "srv1",
      address: "10.0.0.5",
      port: 7000,
      sessionCount: 2,
      clientCount: 0,
      accelerated: true,
      timestamp: new Date("2026-03-01T12:00:00.000Z"),
    }),
  });
}

test("broadcasts the advertisement until aborted, then closes the socket", async () => {
  const socket = new RecordingSocket();
  const controller = new AbortController();
  socket.afterSend = () => {
    if (socket.sends.length === 3) controller.abort();
  };

  await publisher(socket).run(controller.signal);

  assert.equal(socket.sends.length, 3);
  assert.equal(socket.boundPort, 0);
  assert.equal(socket.broadcast, true);
  assert.equal(socket.closed, true);
  assert.deepEqual(
    socket.sends.map(({ port, address }) => `${address}:${port}`),
    ["255.255.255.255:7001", "255.255.255.255:7001", "255.255.255.255:7001"]
  );

  const decoded = decodeAdvertisement(socket.sends[0].payload);
  assert.ok(decoded.ok);
  assert.equal(decoded.message.name, "srv1");
  assert.equal(decoded.message.address, "10.0.0.5");
  assert.equal(decoded.message.port, 7000);
  assert.equal(decoded.message.sessionCount, 2);
  assert.equal(decoded.message.accelerated, true);
});

test("a failed send does not end the loop", async () => {
  const socket = new RecordingSocket();
  socket.failuresLeft = 2;
  const controller = new AbortController();
  socket.afterSend = () => controller.abort();

  const beacon = publisher(socket);
  await beacon.run(controller.signal);

  assert.equal(socket.sends.length, 1);
  assert.equal(beacon.beaconsSent, 1);
});

test("an already aborted signal sends nothing", async () => {
  const socket = new RecordingSocket();
  const controller = new AbortController();
  controller.abort();

  await publisher(socket).run(controller.signal);

  assert.equal(socket.sends.length, 0);
  assert.equal(socket.closed, true);
});
