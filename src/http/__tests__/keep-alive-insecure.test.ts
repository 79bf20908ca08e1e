import { afterEach, describe, expect, it, vi } from "vitest";

describe("createKeepAliveAgents insecure option", () => {
  afterEach(() => {
    vi.doUnmock("undici");
    vi.resetModules();
  });

  async function loadWithRecordingAgent() {
    vi.resetModules();
    const constructed: unknown[] = [];

    class RecordingAgent {
      constructor(options: unknown = {}) {
        constructed.push(options);
      }

      close(): Promise<void> {
        return Promise.resolve();
      }
    }

    vi.doMock("undici", () => ({ Agent: RecordingAgent }));

    const { createKeepAliveAgents } = await import("../keep-alive");

    return { createKeepAliveAgents, constructed };
  }

  it("configures both agents to skip TLS verification when insecure is true", async () => {
    const { createKeepAliveAgents, constructed } = await loadWithRecordingAgent();

    const agents = createKeepAliveAgents({ insecure: true });

    expect(constructed).toHaveLength(2);
    expect(constructed[0]).toMatchObject({ connect: { rejectUnauthorized: false } });
    expect(constructed[1]).toMatchObject({ connect: { rejectUnauthorized: false } });

    await agents.close();
  });

  it("keeps TLS verification by default", async () => {
    const { createKeepAliveAgents, constructed } = await loadWithRecordingAgent();

    const agents = createKeepAliveAgents();

    expect(constructed[0]).not.toHaveProperty("connect");
    expect(constructed[1]).not.toHaveProperty("connect");

    await agents.close();
  });

  it("follows redirects in both pools", async () => {
    const { createKeepAliveAgents, constructed } = await loadWithRecordingAgent();

    const agents = createKeepAliveAgents();

    expect(constructed[0]).toMatchObject({ maxRedirections: 5 });
    expect(constructed[1]).toMatchObject({ maxRedirections: 5 });

    await agents.close();
  });
});
