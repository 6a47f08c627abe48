import test from "node:test";
import assert from "node:assert/strict";
import {
  encodeAdvertisement,
  type CoordinatorAdvertisement,
  type DatagramErrorHandler,
  type DatagramHandler,
  type DatagramSocket,
} from "@fleetlink/protocol";
import { BeaconScanner } from "./scanner.js";

/**
 * Broadcast medium: every datagram reaches every socket bound to the target port.
 */
class MemoryBus {
  readonly sockets = new Set<MemorySocket>();
  private bindWaiters: { port: number; resolve: () => void }[] = [];

  socket(address: string): MemorySocket {
    return new MemorySocket(this, address);
  }

  bound(socket: MemorySocket): void {
    this.sockets.add(socket);
    const ready = this.bindWaiters.filter((waiter) => waiter.port === socket.port);
    this.bindWaiters = this.bindWaiters.filter((waiter) => waiter.port !== socket.port);
    for (const waiter of ready) waiter.resolve();
  }

  listening(port: number): Promise<void> {
    for (const socket of this.sockets) {
      if (socket.port === port) return Promise.resolve();
    }
    return new Promise((resolve) => this.bindWaiters.push({ port, resolve }));
  }

  deliver(payload: string, port: number, from: MemorySocket): void {
    for (const socket of this.sockets) {
      if (socket !== from && socket.port === port) socket.receive(payload, from);
    }
  }
}

class MemorySocket implements DatagramSocket {
  port: number | null = null;
  closed = false;
  private handlers: DatagramHandler[] = [];

  constructor(private readonly bus: MemoryBus, readonly address: string) {}

  async bind(port: number): Promise<void> {
    this.port = port;
    this.bus.bound(this);
  }

  setBroadcast(_enabled: boolean): void {}

  async send(payload: string, port: number, _address: string): Promise<void> {
    this.bus.deliver(payload, port, this);
  }

  onMessage(handler: DatagramHandler): void {
    this.handlers.push(handler);
  }

  onError(_handler: DatagramErrorHandler): void {}

  receive(payload: string, from: MemorySocket): void {
    for (const handler of this.handlers) handler(payload, { address: from.address, port: from.port ?? 0 });
  }

  close(): void {
    this.closed = true;
    this.bus.sockets.delete(this);
  }
}

function advertisement(overrides: Partial<CoordinatorAdvertisement> = {}): CoordinatorAdvertisement {
  return {
    name: "srv1",
    address: "10.0.0.5",
    port: 7000,
    sessionCount: 0,
    clientCount: 0,
    accelerated: false,
    timestamp: new Date("2026-03-01T12:00:00.000Z"),
    ...overrides,
  };
}

test("repeated beacons from one coordinator yield a single entry", async () => {
  const bus = new MemoryBus();
  const scanner = new BeaconScanner(() => bus.socket("10.0.0.20"));
  const publisher = bus.socket("10.0.0.5");
  const controller = new AbortController();

  const scanning = scanner.scan({ port: 7001, timeoutMs: 3000, signal: controller.signal });
  await bus.listening(7001);
  for (let i = 0; i < 3; i++) {
    await publisher.send(encodeAdvertisement(advertisement({ sessionCount: i })), 7001, "255.255.255.255");
  }
  controller.abort();

  const found = await scanning;
  assert.equal(found.length, 1);
  assert.equal(found[0].address, "10.0.0.5");
  assert.equal(found[0].port, 7000);
  assert.equal(found[0].name, "srv1");
  assert.equal(found[0].sessionCount, 0);
});

test("distinct coordinators are reported once each, in order of first sighting", async () => {
  const bus = new MemoryBus();
  const scanner = new BeaconScanner(() => bus.socket("10.0.0.20"));
  const publisher = bus.socket("10.0.0.5");
  const controller = new AbortController();
  const discovered: string[] = [];
  scanner.on("discovered", (ad) => discovered.push(`${ad.address}:${ad.port}`));

  const scanning = scanner.scan({ port: 7001, timeoutMs: 3000, signal: controller.signal });
  await bus.listening(7001);
  await publisher.send(encodeAdvertisement(advertisement({ address: "10.0.0.6" })), 7001, "255.255.255.255");
  await publisher.send(encodeAdvertisement(advertisement()), 7001, "255.255.255.255");
  await publisher.send(encodeAdvertisement(advertisement({ address: "10.0.0.6" })), 7001, "255.255.255.255");
  await publisher.send(encodeAdvertisement(advertisement({ port: 7100 })), 7001, "255.255.255.255");
  controller.abort();

  const found = await scanning;
  assert.deepEqual(
    found.map((ad) => `${ad.address}:${ad.port}`),
    ["10.0.0.6:7000", "10.0.0.5:7000", "10.0.0.5:7100"]
  );
  assert.deepEqual(discovered, ["10.0.0.6:7000", "10.0.0.5:7000", "10.0.0.5:7100"]);
});

test("malformed datagrams are dropped", async () => {
  const bus = new MemoryBus();
  const scanner = new BeaconScanner(() => bus.socket("10.0.0.20"));
  const publisher = bus.socket("10.0.0.5");
  const controller = new AbortController();

  const scanning = scanner.scan({ port: 7001, timeoutMs: 3000, signal: controller.signal });
  await bus.listening(7001);
  await publisher.send("not json", 7001, "255.255.255.255");
  await publisher.send('{"ServerName":"srv1","ServerPort":7000}', 7001, "255.255.255.255");
  await publisher.send(encodeAdvertisement(advertisement()), 7001, "255.255.255.255");
  controller.abort();

  const found = await scanning;
  assert.deepEqual(
    found.map((ad) => ad.address),
    ["10.0.0.5"]
  );
});

test("the scan ends after its timeout and releases the port", async () => {
  const bus = new MemoryBus();
  const socket = bus.socket("10.0.0.20");
  const scanner = new BeaconScanner(() => socket);

  const found = await scanner.scan({ port: 7001, timeoutMs: 20 });

  assert.deepEqual(found, []);
  assert.equal(socket.closed, true);
  assert.equal(bus.sockets.size, 0);
});
