import { Command } from "commander";
import { printResults, runCall } from "../run.js";

// ─── genstream respond "..." ───────────────────────────────────────────────────

interface RespondOptions {
  model?: string;
  instructions?: string;
  stream: boolean;
}

export function respondCommand(): Command {
  return new Command("respond")
    .description("Send input to the Responses endpoint and print the reply")
    .argument("<input...>", "Input text")
    .option("-m, --model <model>", "Model to use (defaults to the configured model)")
    .option("-i, --instructions <text>", "System instructions")
    .option("--no-stream", "Wait for the whole response instead of streaming")
    .action(async (input: string[], opts: RespondOptions) => {
      await runCall(async ({ config, client, token }) => {
        const body = {
          model: opts.model ?? config.model,
          input: input.join(" "),
          ...(opts.instructions ? { instructions: opts.instructions } : {}),
        };
        await printResults(
          opts.stream ? client.streamResponse(body, { token }) : client.createResponse(body, { token })
        );
      });
    });
}
