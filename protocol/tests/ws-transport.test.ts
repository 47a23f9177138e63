import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";
import { WebSocketTransport } from "../src/index";

describe("WebSocketTransport", () => {
  let server: WebSocketServer;
  let url: string;
  const transports: WebSocketTransport[] = [];

  beforeEach(async () => {
    server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
    await new Promise<void>((resolve) => server.once("listening", resolve));
    const address = server.address();
    if (typeof address === "string") {
      throw new Error(`unexpected pipe address ${address}`);
    }
    url = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    transports.forEach((t) => t.close());
    transports.length = 0;
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function connect(): WebSocketTransport {
    const transport = new WebSocketTransport(url);
    transport.on("error", () => {});
    transports.push(transport);
    return transport;
  }

  test("should emit open and relay text frames as strings", async () => {
    server.on("connection", (socket: WebSocket) => {
      socket.send('{"type":"system_status"}');
    });

    const transport = connect();
    const opened = new Promise<void>((resolve) => transport.once("open", resolve));
    const message = new Promise<string>((resolve) =>
      transport.once("message", resolve)
    );

    await opened;
    expect(await message).toBe('{"type":"system_status"}');
  });

  test("should send commands as JSON text", async () => {
    const received = new Promise<string>((resolve) => {
      server.on("connection", (socket: WebSocket) => {
        socket.on("message", (data) => resolve(data.toString()));
      });
    });

    const transport = connect();
    await new Promise<void>((resolve) => transport.once("open", resolve));
    transport.send({ type: "adjust_frequency", mode: "high" });

    expect(await received).toBe('{"type":"adjust_frequency","mode":"high"}');
  });

  test("should emit close with the server's code and reason", async () => {
    server.on("connection", (socket: WebSocket) => {
      socket.close(4000, "maintenance");
    });

    const transport = connect();
    const closed = await new Promise<[number, string]>((resolve) =>
      transport.once("close", (code: number, reason: string) =>
        resolve([code, reason])
      )
    );

    expect(closed).toEqual([4000, "maintenance"]);
  });
});
