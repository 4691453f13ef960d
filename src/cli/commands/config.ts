import chalk from "chalk";
import { getConfig, saveOutputDir, saveUseExternalGenerator, validateConfig } from "../../config/index.js";

interface ConfigCommandOptions {
  external?: string;
  output?: string;
}

function parseToggle(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case "on":
    case "true":
    case "yes":
      return true;
    case "off":
    case "false":
    case "no":
      return false;
    default:
      return undefined;
  }
}

export function configCommand(options: ConfigCommandOptions): void {
  if (options.external !== undefined) {
    const enabled = parseToggle(options.external);
    if (enabled === undefined) {
      console.log(chalk.red(`✗ Expected on or off, got "${options.external}"`));
      process.exit(1);
    }
    saveUseExternalGenerator(enabled);
    console.log(chalk.green(`✓ External generator ${enabled ? "enabled" : "disabled"}`));
  }

  if (options.output !== undefined) {
    const dir = options.output.trim();
    if (!dir) {
      console.log(chalk.red("✗ Output directory must not be empty"));
      process.exit(1);
    }
    saveOutputDir(dir);
    console.log(chalk.green(`✓ Submissions will be saved to ${dir}`));
  }

  const config = getConfig();
  const activeKey = config.primaryProvider === "openai" ? config.openaiApiKey : config.anthropicApiKey;

  console.log(chalk.cyan("\n⚙️  Configuration\n"));
  console.log(chalk.gray("  External generator: ") + (config.useExternalGenerator ? chalk.green("on") : chalk.white("off")));
  console.log(chalk.gray("  Provider:           ") + chalk.white(config.primaryProvider));
  console.log(chalk.gray("  Model:              ") + chalk.white(config.model));
  console.log(chalk.gray("  API key:            ") + (activeKey.trim() ? chalk.green("set") : chalk.yellow("missing")));
  console.log(chalk.gray("  Timeout:            ") + chalk.white(`${config.generatorTimeoutMs}ms`));
  console.log(chalk.gray("  Attempts:           ") + chalk.white(String(config.generatorMaxAttempts)));
  console.log(chalk.gray("  Output directory:   ") + chalk.white(config.outputDir));

  const problems = validateConfig(config);
  if (problems.length > 0) {
    console.log("");
    for (const problem of problems) {
      console.log(chalk.yellow(`  ⚠ ${problem}`));
    }
  }
  console.log("");
}
