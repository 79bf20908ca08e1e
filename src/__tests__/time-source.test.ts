import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import {
  createFixedTimeSource,
  createNetworkTimeSource,
  createSystemTimeSource,
  TimeSourceError,
} from "../time-source";

async function listen(server: Server): Promise<number> {
  return await new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === "object" && address !== null ? address.port : 0);
    });
  });
}

describe("createNetworkTimeSource", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = createServer((req, res) => {
      switch (req.url) {
        case "/time":
          res.writeHead(200, { "content-type": "application/json" });
          res.end(JSON.stringify({ year: 2024, dateTime: "2024-05-01T12:00:00.1234567" }));
          return;
        case "/unavailable":
          res.writeHead(503, { "content-type": "text/plain" });
          res.end("down");
          return;
        case "/no-field":
          res.writeHead(200, { "content-type": "application/json" });
          res.end(JSON.stringify({ time: "12:00" }));
          return;
        default:
          res.writeHead(200, { "content-type": "application/json" });
          res.end("{ not json");
      }
    });
    baseUrl = `http://127.0.0.1:${await listen(server)}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  });

  it("returns the dateTime field of the response", async () => {
    const source = createNetworkTimeSource({ url: `${baseUrl}/time`, env: {} });

    await expect(source.fetchUtcTimestamp()).resolves.toBe("2024-05-01T12:00:00.1234567");
  });

  it("fails on non-2xx statuses", async () => {
    const source = createNetworkTimeSource({ url: `${baseUrl}/unavailable`, env: {} });

    await expect(source.fetchUtcTimestamp()).rejects.toThrow(
      new TimeSourceError("Time request failed: HTTP 503"),
    );
  });

  it("fails when the dateTime field is missing", async () => {
    const source = createNetworkTimeSource({ url: `${baseUrl}/no-field`, env: {} });

    await expect(source.fetchUtcTimestamp()).rejects.toThrow(
      "Failed to parse time JSON: missing dateTime field",
    );
  });

  it("fails on malformed JSON", async () => {
    const source = createNetworkTimeSource({ url: `${baseUrl}/broken`, env: {} });

    await expect(source.fetchUtcTimestamp()).rejects.toBeInstanceOf(TimeSourceError);
    await expect(source.fetchUtcTimestamp()).rejects.toThrow(/^Time request failed: /);
  });

  it("fails when the service cannot be reached", async () => {
    const source = createNetworkTimeSource({ url: "not a url", env: {} });

    await expect(source.fetchUtcTimestamp()).rejects.toThrow(
      "Time request failed: Invalid URL: not a url",
    );
  });
});

describe("local time sources", () => {
  it("formats the system clock as ISO-8601", async () => {
    const source = createSystemTimeSource(() => new Date("2024-05-01T12:00:00.000Z"));

    await expect(source.fetchUtcTimestamp()).resolves.toBe("2024-05-01T12:00:00.000Z");
  });

  it("returns a fixed value", async () => {
    await expect(createFixedTimeSource("frozen").fetchUtcTimestamp()).resolves.toBe("frozen");
  });
});
