import chalk from "chalk";
import { classifyLocal } from "../../pipeline/index.js";
import { getQuickExamples } from "../../templates/index.js";
import { describeSource } from "./generate.js";

export function examplesCommand(): void {
  console.log(chalk.cyan("\n📝 Quick Examples\n"));

  for (const example of getQuickExamples()) {
    const result = classifyLocal(example);
    console.log(chalk.white(`  "${example}"`));
    console.log(chalk.gray(`    → ${result.spec.title} (${describeSource(result)}, ${result.spec.fields.length} fields)`));
  }

  console.log(chalk.gray(`\n  Try one with: formcraft generate --prompt "${getQuickExamples()[0] ?? "Simple contact form"}"\n`));
}
