import chalk from "chalk";
import ora from "ora";
import prompts from "prompts";
import { getConfig, validateConfig } from "../../config/index.js";
import { present, writeSubmission, type Presentation } from "../../forms/presenter.js";
import { FormSession } from "../../forms/session.js";
import { classify, EmptyPromptError, type ClassificationResult } from "../../pipeline/index.js";
import { fillForm, printFormHeader } from "../form-prompts.js";

interface GenerateOptions {
  prompt?: string;
  /** undefined: use the stored toggle */
  external?: boolean;
  output?: string;
}

/** One-line account of where a classified form came from. */
export function describeSource(result: ClassificationResult): string {
  switch (result.source) {
    case "template":
      return `matched the "${result.rule ?? "?"}" template`;
    case "external":
      return "designed by the external generator";
    case "synthesized":
      return result.fallback
        ? `built locally; external generator ${result.fallback.reason}`
        : "built locally from your description";
  }
}

async function askForDescription(): Promise<string | undefined> {
  const { description } = await prompts({
    type: "text",
    name: "description",
    message: "Describe the form you need:",
  });
  return typeof description === "string" ? description : undefined;
}

function printResults(presentation: Presentation): void {
  console.log(chalk.green("\n✅ Form submitted successfully!"));

  console.log(chalk.cyan("\n📋 Form Values:"));
  for (const line of presentation.lines) {
    console.log(chalk.gray(`  ${line.label}: `) + chalk.white(line.value));
  }

  console.log(chalk.cyan("\n" + "═".repeat(60)));
  console.log(chalk.cyan.bold("  JSON Output"));
  console.log(chalk.cyan("═".repeat(60)) + "\n");
  console.log(presentation.json);
  console.log(chalk.cyan("\n" + "═".repeat(60)));
}

export async function generateCommand(options: GenerateOptions): Promise<void> {
  console.log(chalk.cyan("\n✨ Form Generator\n"));
  console.log(chalk.gray("  Describe any form in plain English, fill it in, export the answers as JSON.\n"));

  const config = getConfig();
  const useExternal = options.external ?? config.useExternalGenerator;
  const outputDir = options.output ?? config.outputDir;

  if (useExternal) {
    const problems = validateConfig({ ...config, useExternalGenerator: true });
    for (const problem of problems) {
      console.log(chalk.yellow(`⚠ ${problem}`));
    }
    if (problems.length > 0) {
      console.log(chalk.gray("  Forms will be built locally when the external generator is unavailable.\n"));
    }
  }

  const session = new FormSession();
  let pendingPrompt = options.prompt;

  try {
    for (;;) {
      const prompt = pendingPrompt ?? (await askForDescription());
      pendingPrompt = undefined;
      if (prompt === undefined) {
        console.log(chalk.gray("\nCancelled."));
        return;
      }

      const spinner = ora({ text: "Creating your form...", color: "cyan" }).start();
      let result: ClassificationResult;
      try {
        result = await classify(prompt, { useExternal });
      } catch (error) {
        if (error instanceof EmptyPromptError) {
          spinner.stop();
          console.log(chalk.yellow(`⚠ ${error.message}`));
          continue;
        }
        spinner.fail("Form generation failed");
        throw error;
      }
      spinner.succeed(`${result.spec.title} ${chalk.gray(`(${describeSource(result)})`)}`);

      session.select(result.spec);
      printFormHeader(result.spec);

      const outcome = await fillForm(session);
      const record = session.submission;
      if (outcome === "cancelled" || !record) {
        console.log(chalk.gray("\nCancelled."));
        return;
      }

      const presentation = present(record);
      printResults(presentation);

      const { save } = await prompts({
        type: "confirm",
        name: "save",
        message: `Save as ${presentation.fileName}?`,
        initial: true,
      });
      if (save) {
        const path = await writeSubmission(presentation, outputDir);
        console.log(chalk.green(`  📥 Saved: ${path}`));
      }

      const { again } = await prompts({
        type: "confirm",
        name: "again",
        message: "🔄 Create a new form?",
        initial: false,
      });
      if (!again) {
        console.log(chalk.gray("\nDone."));
        return;
      }
      session.reset();
    }
  } catch (error) {
    console.error(chalk.red("\nError:"), error instanceof Error ? error.message : "Unknown error");
    if (error instanceof Error && error.stack) {
      console.error(chalk.gray(error.stack));
    }
    process.exit(1);
  }
}
