import test from "node:test";
import assert from "node:assert/strict";
import { WebSocketServer, type WebSocket } from "ws";
import { openChannel, rawDataToString, WebSocketChannel } from "./channel.js";
import { ChannelClosedError } from "./errors.js";

async function startServer(): Promise<{ server: WebSocketServer; port: number }> {
  const server = new WebSocketServer({ host: "127.0.0.1", port: 0 });
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  assert.ok(typeof address === "object" && address !== null);
  return { server, port: address.port };
}

function stopServer(server: WebSocketServer): Promise<void> {
  for (const client of server.clients) client.terminate();
  return new Promise((resolve) => server.close(() => resolve()));
}

function nextConnection(server: WebSocketServer): Promise<WebSocket> {
  return new Promise((resolve) => server.once("connection", (socket: WebSocket) => resolve(socket)));
}

test("frames sent back to back arrive in order", async () => {
  const { server, port } = await startServer();
  try {
    const accepted = nextConnection(server);
    const channel = await openChannel("127.0.0.1", port, 1000);
    const socket = await accepted;

    const received: string[] = [];
    const allArrived = new Promise<void>((resolve) => {
      socket.on("message", (data) => {
        received.push(rawDataToString(data));
        if (received.length === 3) resolve();
      });
    });

    await Promise.all([channel.send("first"), channel.send("second"), channel.send("third")]);
    await allArrived;

    assert.deepEqual(received, ["first", "second", "third"]);
    channel.close();
  } finally {
    await stopServer(server);
  }
});

test("sending after close rejects with ChannelClosedError", async () => {
  const { server, port } = await startServer();
  try {
    const channel = await openChannel("127.0.0.1", port, 1000);
    assert.equal(channel.isOpen, true);

    channel.close();

    assert.equal(channel.isOpen, false);
    await assert.rejects(channel.send("late"), ChannelClosedError);
  } finally {
    await stopServer(server);
  }
});

test("server-side channel delivers frames and reports the peer closing once", async () => {
  const { server, port } = await startServer();
  try {
    const serverChannel = new Promise<WebSocketChannel>((resolve) => {
      server.once("connection", (socket: WebSocket) => resolve(new WebSocketChannel(socket, "127.0.0.1", 0)));
    });
    const client = await openChannel("127.0.0.1", port, 1000);
    const channel = await serverChannel;

    const frame = new Promise<string>((resolve) => channel.onFrame(resolve));
    const closeReasons: string[] = [];
    const closed = new Promise<void>((resolve) =>
      channel.onClose((reason) => {
        closeReasons.push(reason);
        resolve();
      })
    );

    await client.send('{"Command":"PING"}');
    assert.equal(await frame, '{"Command":"PING"}');

    client.close();
    await closed;

    assert.equal(closeReasons.length, 1);
    assert.equal(channel.isOpen, false);
  } finally {
    await stopServer(server);
  }
});
