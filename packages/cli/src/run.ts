import {
  CancellationSource,
  ConsoleLogger,
  loadConfig,
  type AccumulatedResult,
  type CancellationToken,
  type Config,
  type Logger,
} from "@genstream/core";
import { GenStreamClient } from "@genstream/client";
import { SnapshotPrinter, renderError } from "./render.js";

// ─── Call runner ───────────────────────────────────────────────────────────────

export interface CallContext {
  config: Config;
  logger: Logger;
  client: GenStreamClient;
  token: CancellationToken;
}

/**
 * Runs one API call for a command: loads config, cancels on Ctrl-C and renders
 * any failure to stderr with exit code 1.
 */
export async function runCall(task: (ctx: CallContext) => Promise<void>): Promise<void> {
  const source = new CancellationSource();
  const onInterrupt = () => source.cancel("interrupted");
  process.once("SIGINT", onInterrupt);

  try {
    const config = loadConfig();
    const logger = new ConsoleLogger("genstream", config.logLevel);
    const client = new GenStreamClient(config.client, { logger });
    await task({ config, logger, client, token: source.token });
  } catch (error) {
    process.stderr.write(`\n${renderError(error)}\n`);
    process.exitCode = 1;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

/** Prints a streamed or buffered call as it completes. */
export async function printResults(
  results: AsyncIterable<AccumulatedResult> | Promise<AccumulatedResult>
): Promise<void> {
  const printer = new SnapshotPrinter(process.stdout, process.stderr);

  if (results instanceof Promise) {
    printer.finish(await results);
    return;
  }

  let last: AccumulatedResult | undefined;
  for await (const snapshot of results) {
    printer.update(snapshot);
    last = snapshot;
  }
  if (last) printer.finish(last);
}
