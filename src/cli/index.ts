#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import figlet from "figlet";
import { generateCommand } from "./commands/generate.js";
import { classifyCommand } from "./commands/classify.js";
import { examplesCommand } from "./commands/examples.js";
import { configCommand } from "./commands/config.js";

// Banner only for interactive terminals; `classify` output may be piped
if (process.stdout.isTTY) {
  console.log(
    chalk.cyan(
      figlet.textSync("FormCraft", {
        font: "Small",
        horizontalLayout: "default",
      })
    )
  );
  console.log(chalk.gray("  Describe a form, fill it in, export JSON\n"));
}

const program = new Command();

program
  .name("formcraft")
  .description("Generate interactive forms from plain-English descriptions")
  .version("0.1.0");

// Generate command
program
  .command("generate", { isDefault: true })
  .description("Describe a form, fill it in and export the submission")
  .option("-p, --prompt <text>", "Form description (default: interactive prompt)")
  .option("--external", "Consult the external generator when no keyword rule matches")
  .option("--no-external", "Build forms locally only")
  .option("-o, --output <dir>", "Directory for form_submission.json")
  .action(generateCommand);

// Classify command
program
  .command("classify")
  .description("Print the form spec a description produces, as JSON")
  .requiredOption("-p, --prompt <text>", "Form description")
  .option("--external", "Consult the external generator when no keyword rule matches")
  .action(classifyCommand);

// Examples command
program
  .command("examples")
  .description("List the quick example descriptions and the forms they produce")
  .action(examplesCommand);

// Config command
program
  .command("config")
  .description("Show configuration, toggle the external generator or set the output directory")
  .option("--external <on|off>", "Persist the external generator toggle")
  .option("--output <dir>", "Persist the directory for form_submission.json")
  .action(configCommand);

// Parse arguments
program.parse();
