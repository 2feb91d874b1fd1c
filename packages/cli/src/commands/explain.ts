import { Command, InvalidArgumentError } from "commander";
import { classifyFailure, type ClassifiedError } from "@genstream/core";
import { renderError } from "../render.js";

// ─── genstream explain 429 ─────────────────────────────────────────────────────

interface ExplainOptions {
  body?: string;
  retryAfter?: string;
}

export function parseStatus(value: string): number {
  const status = Number(value);
  if (!Number.isInteger(status) || status < 100 || status > 599) {
    throw new InvalidArgumentError("Expected an HTTP status code between 100 and 599.");
  }
  return status;
}

/** Classification of an HTTP failure as the client would see it. */
export function explainStatus(status: number, opts: ExplainOptions = {}): ClassifiedError {
  return classifyFailure({
    source: "http",
    status,
    body: opts.body,
    headers: { get: (name) => (name === "retry-after" ? opts.retryAfter ?? null : null) },
  });
}

export function explainCommand(): Command {
  return new Command("explain")
    .description("Show how an HTTP failure is classified")
    .argument("<status>", "HTTP status code", parseStatus)
    .option("--body <json>", "Error body returned by the server")
    .option("--retry-after <value>", "Retry-After header (seconds or HTTP date)")
    .action((status: number, opts: ExplainOptions) => {
      console.log(renderError(explainStatus(status, opts)));
    });
}
