#!/usr/bin/env node
import "dotenv/config";
import { program } from "commander";
import { respondCommand } from "./commands/respond.js";
import { chatCommand } from "./commands/chat.js";
import { explainCommand } from "./commands/explain.js";

program
  .name("genstream")
  .description("Stream responses from generative-AI HTTP APIs")
  .version("0.1.0");

program.addCommand(respondCommand());
program.addCommand(chatCommand());
program.addCommand(explainCommand());

await program.parseAsync();
