import { type Command, GetCleanLogs } from "../commands";
import type { RequestAuth, Vacuum } from "../types";
import { TransportError } from "../utils/errors";
import { type JsonObject, isJsonObject } from "../utils/json";
import { type Logger, describeError } from "../utils/logger";

export type SendOptions = {
  signal?: AbortSignal;
  requestId?: string;
};

/** Sends one command to one device and returns the portal's JSON answer. */
export interface CommandTransport {
  sendCommand(command: Command, vacuum: Vacuum, options?: SendOptions): Promise<JsonObject>;
}

export type CloudApiOptions = {
  portalUrl: string;
  auth: RequestAuth;
  timeoutMs: number;
};

const DEVICE_PATH = "iot/devmanager.do";
const LOG_PATH = "lg/log.do";
const CLIENT_VERSION = { cv: "1.67.3", t: "a", av: "1.3.1" };

function commandPayload(command: Command): JsonObject {
  const payload: JsonObject = {
    header: { pri: "1", ts: Date.now() / 1000, tzm: 480, ver: "0.0.50" },
  };
  const hasArgs = Array.isArray(command.args) ? command.args.length > 0 : Object.keys(command.args).length > 0;
  if (hasArgs) {
    payload.body = { data: command.args };
  }
  return payload;
}

export class CloudApiClient implements CommandTransport {
  private options: CloudApiOptions;
  private logger: Logger;

  constructor(options: CloudApiOptions, logger: Logger) {
    this.options = options;
    this.logger = logger.child({ component: "api" });
  }

  async sendCommand(command: Command, vacuum: Vacuum, options: SendOptions = {}): Promise<JsonObject> {
    const { auth, portalUrl, timeoutMs } = this.options;
    const isLogRequest = command instanceof GetCleanLogs;
    const body: JsonObject = {
      cmdName: command.name,
      payload: commandPayload(command),
      payloadType: "j",
      td: isLogRequest ? command.name : "q",
      toId: vacuum.did,
      toRes: vacuum.resource,
      toType: vacuum.class,
      auth: {
        with: "users",
        userid: auth.userId,
        realm: auth.realm,
        token: auth.token,
        resource: auth.resource,
      },
    };
    if (isLogRequest) {
      body.did = vacuum.did;
      body.resource = vacuum.resource;
    }

    const url = new URL(`${portalUrl}/${isLogRequest ? LOG_PATH : DEVICE_PATH}`);
    url.searchParams.set("mid", vacuum.class);
    url.searchParams.set("did", vacuum.did);
    url.searchParams.set("td", String(body.td));
    url.searchParams.set("u", auth.userId);
    for (const [key, value] of Object.entries(CLIENT_VERSION)) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
    const onAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener("abort", onAbort, { once: true });
    if (options.signal?.aborted) onAbort();

    this.logger.debug("Sending command", {
      command: command.name,
      requestId: options.requestId,
      did: vacuum.did,
    });
    try {
      const res = await fetch(url.toString(), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!res.ok) {
        throw new TransportError(`Portal returned HTTP ${res.status} for ${command.name}`, res.status);
      }
      const json: unknown = await res.json();
      if (!isJsonObject(json)) {
        throw new TransportError(`Portal returned a non-object body for ${command.name}`, res.status);
      }
      return json;
    } catch (err) {
      if (err instanceof TransportError) throw err;
      this.logger.warn("Command request failed", {
        command: command.name,
        requestId: options.requestId,
        message: describeError(err),
      });
      throw new TransportError(
        `Request for ${command.name} failed: ${describeError(err)}`,
        undefined,
        err instanceof Error ? err : undefined
      );
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}
