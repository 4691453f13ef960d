import chalk from "chalk";
import { getConfig } from "../../config/index.js";
import { classify, EmptyPromptError } from "../../pipeline/index.js";
import { describeSource } from "./generate.js";

interface ClassifyCommandOptions {
  prompt: string;
  external?: boolean;
}

/** Print the FormSpec a prompt selects; the JSON goes to stdout, the rest to stderr. */
export async function classifyCommand(options: ClassifyCommandOptions): Promise<void> {
  const useExternal = options.external ?? getConfig().useExternalGenerator;

  try {
    const result = await classify(options.prompt, { useExternal });
    console.error(chalk.gray(`${result.spec.title}: ${describeSource(result)}`));
    console.log(JSON.stringify(result.spec, null, 2));
  } catch (error) {
    if (error instanceof EmptyPromptError) {
      console.error(chalk.yellow(`⚠ ${error.message}`));
      process.exitCode = 1;
      return;
    }
    console.error(chalk.red("\nError:"), error instanceof Error ? error.message : "Unknown error");
    process.exit(1);
  }
}
