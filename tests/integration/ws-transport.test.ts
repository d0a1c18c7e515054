import { type AddressInfo, type Server as TcpServer, type Socket, createServer } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { type WebSocket, WebSocketServer } from "ws";
import { ErrorKind } from "../../src/core/errors/app-error.js";
import type { SocketConnection } from "../../src/core/ports/socket-transport.js";
import { createWsTransport } from "../../src/infrastructure/network/ws-transport.js";

const portOf = (address: string | AddressInfo | null): number => {
  if (address === null || typeof address === "string") throw new Error("server has no TCP port");
  return address.port;
};

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  for (const cleanup of cleanups.splice(0).reverse()) {
    await cleanup();
  }
});

/** WebSocket server on an ephemeral port; resolves to its ws:// URL */
const startServer = (onConnection: (socket: WebSocket) => void): Promise<string> =>
  new Promise((resolve) => {
    const wss = new WebSocketServer({ port: 0, host: "127.0.0.1" }, () => {
      resolve(`ws://127.0.0.1:${portOf(wss.address())}`);
    });
    wss.on("connection", onConnection);
    cleanups.push(
      () =>
        new Promise((done) => {
          for (const client of wss.clients) client.terminate();
          wss.close(() => done());
        }),
    );
  });

/** Plain TCP server that accepts connections and never answers the handshake */
const startSilentTcpServer = (): Promise<{ url: string; server: TcpServer }> =>
  new Promise((resolve) => {
    const sockets = new Set<Socket>();
    const server = createServer((socket) => {
      sockets.add(socket);
    });
    server.listen(0, "127.0.0.1", () => {
      resolve({ url: `ws://127.0.0.1:${portOf(server.address())}`, server });
    });
    cleanups.push(
      () =>
        new Promise((done) => {
          for (const socket of sockets) socket.destroy();
          if (server.listening) {
            server.close(() => done());
          } else {
            done();
          }
        }),
    );
  });

const connectOrFail = async (url: string): Promise<SocketConnection> => {
  const connected = await createWsTransport().connect(url, 2_000);
  if (!connected.ok) throw new Error(connected.error.message);
  const connection = connected.value;
  cleanups.push(() => connection.close());
  return connection;
};

describe("ws transport", () => {
  it("sends a frame and receives the reply", async () => {
    const url = await startServer((socket) => {
      socket.on("message", (data) => socket.send(`echo:${data.toString()}`));
    });
    const connection = await connectOrFail(url);

    expect(await connection.send('{"type":"ping"}')).toEqual({ ok: true, value: undefined });
    expect(await connection.receive(2_000)).toEqual({ ok: true, value: 'echo:{"type":"ping"}' });
  });

  it("queues frames that arrive before receive is called", async () => {
    const url = await startServer((socket) => {
      socket.send("first");
      socket.send("second");
    });
    const connection = await connectOrFail(url);

    expect(await connection.receive(2_000)).toEqual({ ok: true, value: "first" });
    expect(await connection.receive(2_000)).toEqual({ ok: true, value: "second" });
  });

  it("times out a receive when the peer stays silent", async () => {
    const url = await startServer(() => {});
    const connection = await connectOrFail(url);

    const received = await connection.receive(50);

    expect(received.ok).toBe(false);
    if (!received.ok) {
      expect(received.error.kind).toBe(ErrorKind.TIMEOUT);
      expect(received.error.details).toEqual({ target: url, timeoutMs: 50 });
    }
  });

  it("close is idempotent and later sends fail", async () => {
    const url = await startServer(() => {});
    const connection = await connectOrFail(url);

    const first = connection.close();
    const second = connection.close();
    expect(second).toBe(first);
    await first;

    const sent = await connection.send("late");
    expect(sent.ok).toBe(false);
    if (!sent.ok) expect(sent.error.kind).toBe(ErrorKind.CONNECTION);
  });

  it("fails a pending receive when the peer closes", async () => {
    const url = await startServer((socket) => {
      setTimeout(() => socket.close(), 20);
    });
    const connection = await connectOrFail(url);

    const received = await connection.receive(2_000);

    expect(received.ok).toBe(false);
    if (!received.ok) expect(received.error.kind).toBe(ErrorKind.CONNECTION);
  });

  it("maps a refused connection to ConnectionError", async () => {
    const { url, server } = await startSilentTcpServer();
    await new Promise<void>((done) => server.close(() => done()));

    const connected = await createWsTransport().connect(url, 2_000);

    expect(connected.ok).toBe(false);
    if (!connected.ok) expect(connected.error.kind).toBe(ErrorKind.CONNECTION);
  });

  it("maps an unanswered handshake to TimeoutError", async () => {
    const { url } = await startSilentTcpServer();

    const connected = await createWsTransport().connect(url, 50);

    expect(connected.ok).toBe(false);
    if (!connected.ok) {
      expect(connected.error.kind).toBe(ErrorKind.TIMEOUT);
      expect(connected.error.details).toEqual({ target: url, timeoutMs: 50 });
    }
  });
});
