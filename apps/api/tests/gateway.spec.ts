import { IncomingMessage, createServer } from "node:http";
import { Socket } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { SessionRouter } from "../src/services/SessionRouter";
import { SessionGateway, parseUpgradeTarget, rawDataToString } from "../src/ws/Gateway";
import { HOST_ID, createEngineHarness, startSession } from "./helpers";

function upgradeRequest(url: string, cookie?: string) {
  const request = new IncomingMessage(new Socket());
  request.url = url;
  request.headers = cookie ? { cookie } : {};
  return request;
}

describe("upgrade target", () => {
  it("reads the PIN and role from the query", () => {
    expect(parseUpgradeTarget("/ws?pin=012345&role=player")).toEqual({ ok: true, pin: "012345", role: "player" });
  });

  it("refuses other paths, bad PINs and unknown roles", () => {
    expect(parseUpgradeTarget("/socket?pin=012345&role=host")).toEqual({ ok: false, status: 404, message: "Not Found" });
    expect(parseUpgradeTarget("/ws?pin=12345&role=host")).toEqual({
      ok: false,
      status: 400,
      message: "pin must be a 6-digit code",
    });
    expect(parseUpgradeTarget("/ws?pin=012345&role=admin")).toEqual({
      ok: false,
      status: 400,
      message: "role must be host or player",
    });
    expect(parseUpgradeTarget(undefined).ok).toBe(false);
  });
});

describe("rawDataToString", () => {
  it("decodes every frame shape ws can hand over", () => {
    expect(rawDataToString(Buffer.from("hello"))).toBe("hello");
    expect(rawDataToString([Buffer.from("hel"), Buffer.from("lo")])).toBe("hello");
    const arrayBuffer = new ArrayBuffer(5);
    new Uint8Array(arrayBuffer).set(Buffer.from("hello"));
    expect(rawDataToString(arrayBuffer)).toBe("hello");
  });
});

describe("SessionGateway.authorizeUpgrade", () => {
  let gateway: SessionGateway | null = null;

  afterEach(async () => {
    await gateway?.close();
    gateway = null;
  });

  async function setup() {
    const harness = createEngineHarness();
    const { pin } = await startSession(harness, []);
    const created = new SessionGateway(createServer(), {
      engine: harness.engine,
      router: new SessionRouter(harness.engine),
      resolveHostUserId: async (headers) => {
        if (headers instanceof Headers) return null;
        return typeof headers === "object" && headers !== null && "cookie" in headers ? HOST_ID : null;
      },
    });
    gateway = created;
    return { pin, gateway: created };
  }

  it("lets players in without signing in", async () => {
    const { pin, gateway } = await setup();
    expect(await gateway.authorizeUpgrade(upgradeRequest(`/ws?pin=${pin}&role=player`))).toEqual({
      ok: true,
      auth: { pin, role: "player", userId: null },
    });
  });

  it("requires a signed-in user for the host role", async () => {
    const { pin, gateway } = await setup();
    expect(await gateway.authorizeUpgrade(upgradeRequest(`/ws?pin=${pin}&role=host`))).toEqual({
      ok: false,
      status: 401,
      message: "sign in to host this session",
    });
    expect(await gateway.authorizeUpgrade(upgradeRequest(`/ws?pin=${pin}&role=host`, "session=test-token"))).toEqual({
      ok: true,
      auth: { pin, role: "host", userId: HOST_ID },
    });
  });

  it("refuses unknown sessions", async () => {
    const { gateway } = await setup();
    expect(await gateway.authorizeUpgrade(upgradeRequest("/ws?pin=999999&role=player"))).toEqual({
      ok: false,
      status: 404,
      message: "session not found",
    });
  });
});
