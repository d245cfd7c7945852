import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CloudApiClient } from "../../src/api/client";
import { GetBattery, GetCleanLogs, SetFanSpeed } from "../../src/commands";
import { TransportError } from "../../src/utils/errors";
import { createTestLogger, vacuum } from "../helpers";

const auth = { userId: "user-1", realm: "ecouser.net", token: "test-token", resource: "res-1" };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("CloudApiClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function client(timeoutMs = 1000) {
    return new CloudApiClient({ portalUrl: "https://portal.test/api", auth, timeoutMs }, createTestLogger());
  }

  function sentRequest(): { url: URL; body: Record<string, unknown> } {
    const [input, init] = fetchMock.mock.calls[0];
    return { url: new URL(String(input)), body: JSON.parse(String(init?.body)) };
  }

  it("posts device commands to the device manager", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ret: "ok", resp: { body: { code: 0 } } }));

    const result = await client().sendCommand(new SetFanSpeed("max"), vacuum, { requestId: "req-1" });
    expect(result).toEqual({ ret: "ok", resp: { body: { code: 0 } } });

    const { url, body } = sentRequest();
    expect(url.origin + url.pathname).toBe("https://portal.test/api/iot/devmanager.do");
    expect(url.searchParams.get("mid")).toBe("cls-1");
    expect(url.searchParams.get("did")).toBe("did-1");
    expect(url.searchParams.get("td")).toBe("q");
    expect(url.searchParams.get("u")).toBe("user-1");
    expect(body).toMatchObject({
      cmdName: "setSpeed",
      payloadType: "j",
      td: "q",
      toId: "did-1",
      toRes: "res-1",
      toType: "cls-1",
      auth: { with: "users", userid: "user-1", realm: "ecouser.net", token: "test-token", resource: "res-1" },
      payload: { body: { data: { speed: 1 } } },
    });
    expect(fetchMock.mock.calls[0][1]?.method).toBe("POST");
  });

  it("omits the body for commands without arguments", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ret: "ok" }));
    await client().sendCommand(new GetBattery(), vacuum);

    const { body } = sentRequest();
    expect(body.payload).toEqual({ header: expect.objectContaining({ pri: "1", ver: "0.0.50" }) });
  });

  it("sends clean log requests to the log endpoint", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ret: "ok", logs: [] }));
    await client().sendCommand(new GetCleanLogs(), vacuum);

    const { url, body } = sentRequest();
    expect(url.pathname).toBe("/api/lg/log.do");
    expect(url.searchParams.get("td")).toBe("GetCleanLogs");
    expect(body).toMatchObject({ td: "GetCleanLogs", did: "did-1", resource: "res-1" });
  });

  it("throws TransportError on an HTTP error", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: "bad gateway" }, 502));
    const error = await client()
      .sendCommand(new GetBattery(), vacuum)
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 502, message: "Portal returned HTTP 502 for getBattery" });
  });

  it("throws TransportError on a network failure", async () => {
    fetchMock.mockRejectedValue(new Error("ECONNRESET"));
    await expect(client().sendCommand(new GetBattery(), vacuum)).rejects.toThrow(
      "Request for getBattery failed: ECONNRESET"
    );
  });

  it("throws TransportError on a non-object body", async () => {
    fetchMock.mockResolvedValue(jsonResponse([1, 2]));
    await expect(client().sendCommand(new GetBattery(), vacuum)).rejects.toBeInstanceOf(TransportError);
  });

  it("passes an abort through to the request", async () => {
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        })
    );
    const controller = new AbortController();
    const pending = client().sendCommand(new GetBattery(), vacuum, { signal: controller.signal });
    controller.abort(new Error("bot disposed"));
    await expect(pending).rejects.toThrow("Request for getBattery failed: bot disposed");
  });

  it("times out slow requests", async () => {
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        })
    );
    await expect(client(20).sendCommand(new GetBattery(), vacuum)).rejects.toThrow(
      "Request for getBattery failed: Timed out after 20ms"
    );
  });
});
