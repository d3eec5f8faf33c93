#!/usr/bin/env node

/**
 * bydhvs CLI – command-line interface for reading telemetry from BYD
 * Battery-Box HVS / HVM / LVS batteries.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { Command } from "commander";
import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  MIN_POLL_INTERVAL,
  poll,
  type PollFailure,
  type PollOptions,
} from "./bydhvs.js";
import { decode } from "./decoder.js";

interface ConnectionCliOptions {
  address: string;
  port: number;
  timeout: number;
  measurementDelay: number;
  verbose: boolean;
}

interface WatchCliOptions extends ConnectionCliOptions {
  interval: number;
}

const int = (v: string) => parseInt(v, 10);

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

const program = new Command();

program
  .name("bydhvs")
  .description("CLI for reading telemetry from BYD HVS / HVM / LVS batteries")
  .version("1.0.0");

function withConnectionOptions(command: Command): Command {
  return command
    .option("-a, --address <ip>", "IP address of the battery", DEFAULT_HOST)
    .option("-p, --port <number>", "TCP port", int, DEFAULT_PORT)
    .option("-t, --timeout <number>", "Socket timeout in seconds", int, 10)
    .option(
      "--measurement-delay <number>",
      "Wait before each measurement check in milliseconds",
      int,
      3000
    )
    .option("-v, --verbose", "Enable verbose logging", false);
}

function endpointOf(opts: ConnectionCliOptions) {
  return { host: opts.address, port: opts.port, timeout: opts.timeout * 1000 };
}

function pollOptionsOf(opts: ConnectionCliOptions): PollOptions {
  return { measurementDelay: opts.measurementDelay, verbose: opts.verbose };
}

function describeFailure(failure: PollFailure): string {
  const hint = failure.transient ? "transient" : "structural";
  return `${failure.kind} during ${failure.step} (${hint}): ${failure.message}`;
}

// ---------- poll ----------

withConnectionOptions(
  program.command("poll").description("Run one poll cycle and print the snapshot as JSON")
).action(async (opts: ConnectionCliOptions) => {
  try {
    const result = await poll(endpointOf(opts), pollOptionsOf(opts));
    if (!result.ok) {
      console.error(`Error: ${describeFailure(result.failure)}`);
      process.exit(1);
    }
    console.log(JSON.stringify(result.snapshot, null, 2));
  } catch (err) {
    console.error(`Error: ${messageOf(err)}`);
    process.exit(1);
  }
});

// ---------- watch ----------

withConnectionOptions(
  program
    .command("watch")
    .description("Poll repeatedly and print one JSON line per cycle")
    .option("-i, --interval <number>", "Polling interval in seconds", int, 600)
).action(async (opts: WatchCliOptions) => {
  if (!(opts.interval >= MIN_POLL_INTERVAL)) {
    console.error(`Error: interval must be at least ${MIN_POLL_INTERVAL} seconds`);
    process.exit(1);
  }

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    while (!controller.signal.aborted) {
      const result = await poll(endpointOf(opts), {
        ...pollOptionsOf(opts),
        signal: controller.signal,
      });
      const timestamp = new Date().toISOString();
      if (result.ok) {
        console.log(JSON.stringify({ timestamp, snapshot: result.snapshot }));
      } else if (!controller.signal.aborted) {
        console.error(`${timestamp} Error: ${describeFailure(result.failure)}`);
      }
      await sleep(opts.interval * 1000, undefined, { signal: controller.signal });
    }
  } catch (err) {
    if (!controller.signal.aborted) {
      console.error(`Error: ${messageOf(err)}`);
      process.exit(1);
    }
  }
});

// ---------- decode ----------

program
  .command("decode")
  .description("Decode a captured RTU frame")
  .argument("<hex...>", "Hex bytes of the frame (e.g. 01 03 05 00 00 19 84 cc)")
  .action((hexBytes: string[]) => {
    try {
      console.log(decode(hexBytes));
    } catch (err) {
      console.error(`Error: ${messageOf(err)}`);
      process.exit(1);
    }
  });

await program.parseAsync();
