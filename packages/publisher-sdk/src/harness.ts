import { createInterface } from "node:readline";
import type { PublisherFactory } from "./types.js";
import type { MessageSink } from "./protocol.js";
import { parentMessageSchema } from "./protocol.js";
import { PublisherHost } from "./host.js";

export interface HarnessIO {
  send: MessageSink;
  stderr: (text: string) => void;
}

type LogLevel = "debug" | "info" | "warn" | "error";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatLogArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (typeof a === "string") return a;
      if (a instanceof Error) return a.message;
      return JSON.stringify(a);
    })
    .join(" ");
}

/** Intercept console.* so publisher authors can use them normally. */
export function interceptConsole(send: MessageSink): void {
  const log = (level: LogLevel) => (...args: unknown[]) => send({ type: "log", level, message: formatLogArgs(args) });
  console.log = log("info");
  console.info = log("info");
  console.warn = log("warn");
  console.error = log("error");
  console.debug = log("debug");
}

/** Parse one line from the host and dispatch it. Never rejects. */
export async function handleLine(line: string, host: PublisherHost, io: HarnessIO): Promise<void> {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    io.stderr(`[publisher-sdk] Failed to parse message: ${line}\n`);
    return;
  }

  const parsed = parentMessageSchema.safeParse(raw);
  if (!parsed.success) {
    io.stderr(`[publisher-sdk] Invalid message: ${parsed.error.message}\n`);
    return;
  }

  try {
    await host.handleMessage(parsed.data);
  } catch (err) {
    io.send({ type: "error", message: `Unhandled error: ${errorMessage(err)}` });
  }
}

/** Stop the publisher once the host has gone away, then exit cleanly. */
export async function closeHost(host: PublisherHost, io: HarnessIO, exit: (code: number) => void): Promise<void> {
  try {
    await host.stop();
  } catch (err) {
    io.stderr(`[publisher-sdk] Shutdown failed: ${errorMessage(err)}\n`);
  }
  exit(0);
}

/**
 * Entry point for publisher processes. Call this with your publisher factory
 * at the top level of your entry file:
 *
 * ```ts
 * import { runPublisher } from "@skyrelay/publisher-sdk";
 * runPublisher((config) => new MyPublisher(config));
 * ```
 */
export function runPublisher(factory: PublisherFactory): void {
  const io: HarnessIO = {
    send: (msg) => process.stdout.write(JSON.stringify(msg) + "\n"),
    stderr: (text) => process.stderr.write(text),
  };
  const exit = (code: number) => process.exit(code);
  interceptConsole(io.send);

  const host = new PublisherHost(factory, { send: io.send, exit });
  const rl = createInterface({ input: process.stdin });

  rl.on("line", (line) => {
    void handleLine(line, host, io);
  });

  // stdin closed: parent is gone
  rl.on("close", () => {
    void closeHost(host, io, exit);
  });
}
