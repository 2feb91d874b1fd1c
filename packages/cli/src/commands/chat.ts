import { Command } from "commander";
import { printResults, runCall } from "../run.js";

// ─── genstream chat "..." ──────────────────────────────────────────────────────

interface ChatOptions {
  model?: string;
  system?: string;
  stream: boolean;
}

export function chatCommand(): Command {
  return new Command("chat")
    .description("Send a message to the Chat Completions endpoint and print the reply")
    .argument("<message...>", "Message text")
    .option("-m, --model <model>", "Model to use (defaults to the configured model)")
    .option("-s, --system <text>", "System message")
    .option("--no-stream", "Wait for the whole completion instead of streaming")
    .action(async (message: string[], opts: ChatOptions) => {
      await runCall(async ({ config, client, token }) => {
        const messages = [
          ...(opts.system ? [{ role: "system", content: opts.system }] : []),
          { role: "user", content: message.join(" ") },
        ];
        const body = { model: opts.model ?? config.model, messages };
        await printResults(
          opts.stream ? client.streamChatCompletion(body, { token }) : client.createChatCompletion(body, { token })
        );
      });
    });
}
