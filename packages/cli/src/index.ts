#!/usr/bin/env node
import { Command } from "commander";
import { type SendOptions, sendCommand } from "./commands/send.js";
import { collect } from "./utils/options.js";

const program = new Command();

program
  .name("formpost")
  .description("Send files and fields as multipart/form-data")
  .version("0.1.0");

program
  .command("send")
  .argument("<url>", "URL to POST to")
  .argument("[files...]", "Files to upload, in order")
  .option("-n, --name <field>", "Field name for the files (default: file name)")
  .option("-F, --field <key=value>", "Text field, repeatable", collect, [])
  .option("-H, --header <name:value>", "Request header, repeatable", collect, [])
  .option("-t, --timeout <ms>", "Abort the request after this many ms")
  .description("Upload files and text fields in one multipart request")
  .action(async (url: string, files: string[], options: SendOptions) => {
    process.exitCode = await sendCommand(url, files, options);
  });

await program.parseAsync();
