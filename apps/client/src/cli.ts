import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { Readable, Writable } from "stream";
import { loadConfig } from "./config.js";
import type { ClientConfig } from "./config.js";
import { runForwarder } from "./forwarder.js";
import { Logger, resolveLogLevel } from "./observability/logger.js";
import type { LogLevel } from "./observability/logger.js";
import { resolveEndpoint } from "../../../packages/transport/src/endpoint.js";
import type { LookupFn } from "../../../packages/transport/src/endpoint.js";
import {
  TransportError,
  describeFailure,
  errorMessage,
} from "../../../packages/transport/src/errors.js";
import { transportKindFor } from "../../../packages/transport/src/transport.js";
import type { TransportKind } from "../../../packages/transport/src/transport.js";

export const VERSION = "0.1.0";

export type CliOptions = {
  remote: string;
  transport: TransportKind;
  logLevel: LogLevel;
  pulse: boolean;
  connectTimeout: number | undefined;
};

export type CliIO = {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  lookup?: LookupFn;
  signal?: AbortSignal;
};

type RawOptions = {
  udp?: boolean;
  pulse?: boolean;
  connectTimeout?: number;
  verbose: number;
  quiet: number;
};

function increase(_value: string, previous: number): number {
  return previous + 1;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Build the command definition
 */
export function createProgram(): Command {
  return new Command()
    .name("wirecat")
    .description(
      "Forward messages between stdin/stdout and one TCP or UDP peer"
    )
    .version(VERSION)
    .argument("[remote]", "remote socket address, ip:port")
    .option("-u, --udp", "use UDP instead of TCP")
    .option("--pulse", "send a keep-alive message per input chunk instead of its text")
    .option(
      "--connect-timeout <ms>",
      "give up connecting after this many milliseconds (TCP only)",
      parsePositiveInt
    )
    .option("-v, --verbose", "more diagnostics on stderr (repeatable)", increase, 0)
    .option("-q, --quiet", "fewer diagnostics on stderr (repeatable)", increase, 0);
}

/**
 * Parse user arguments (no node/script prefix) over the environment config
 *
 * @throws {CommanderError} For --help, --version and usage errors
 */
export function parseArgs(
  argv: readonly string[],
  config: ClientConfig,
  output: { writeOut(str: string): void; writeErr(str: string): void }
): CliOptions {
  const program = createProgram().exitOverride().configureOutput(output);
  program.parse([...argv], { from: "user" });

  const opts = program.opts<RawOptions>();

  return {
    remote: program.args[0] ?? config.remote,
    transport: transportKindFor(opts.udp === true || config.udp),
    logLevel: resolveLogLevel(opts.verbose, opts.quiet, config.debug),
    pulse: opts.pulse === true || config.pulse,
    connectTimeout: opts.connectTimeout ?? config.connectTimeout,
  };
}

/**
 * Run the bridge and map the outcome to a process exit code
 */
export async function main(
  argv: readonly string[],
  io: CliIO = defaultIO()
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv, loadConfig(io.env), {
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const logger = new Logger({ level: options.logLevel, stream: io.stderr });

  // Write failures are reported through the write callback
  io.stdout.on("error", (err) => {
    logger.debug(`stdout error: ${err.message}`);
  });

  try {
    const endpoint = await resolveEndpoint(options.remote, io.lookup);
    const result = await runForwarder({
      endpoint,
      transport: options.transport,
      input: io.stdin,
      output: io.stdout,
      logger,
      pulse: options.pulse,
      connectTimeout: options.connectTimeout,
      signal: io.signal,
    });
    logger.info(`Peer closed the connection after ${result.messagesWritten} messages`);
    return 0;
  } catch (err) {
    io.stderr.write(`${describeError(err)}\n`);
    return 1;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof TransportError) {
    return `${describeFailure(err.code)} error: ${err.message}`;
  }
  return `error: ${errorMessage(err)}`;
}

export function defaultIO(): CliIO {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  };
}
