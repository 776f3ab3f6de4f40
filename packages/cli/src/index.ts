import { Command } from "commander";
import { VERSION } from "@headmeta/shared";
import { annotateCommand } from "./commands/annotate.js";
import { setGlobalOptions } from "./lib/output.js";

const program = new Command();

program
  .name("headmeta")
  .description("Write a description and keywords into a markdown file's front matter")
  .version(VERSION)
  .option("-q, --quiet", "Suppress non-error output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    setGlobalOptions({
      quiet: opts.quiet,
    });
  });

annotateCommand(program);

await program.parseAsync();
