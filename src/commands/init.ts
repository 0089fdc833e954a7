/**
 * a11y-grade init command - Writes a starter config file
 */

import { writeFile, readFile, appendFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import {
  printBanner,
  printSuccess,
  printInfo,
  printWarning,
} from '../utils/ui.js';
import { CONFIG_FILES, DEFAULT_CONFIG } from '../utils/config.js';
import { DEFAULT_OUTPUT_DIR } from './check.js';

export interface InitOptions {
  force?: boolean;
  /** Directory to initialize, defaults to cwd */
  cwd?: string;
}

/**
 * @returns Path of the config file, or null when it already existed
 */
export async function initCommand(options: InitOptions = {}): Promise<string | null> {
  printBanner();

  const { force = false, cwd = process.cwd() } = options;
  const configPath = join(cwd, CONFIG_FILES[0]);

  if (existsSync(configPath) && !force) {
    printWarning(`${CONFIG_FILES[0]} already exists (use --force to overwrite)`);
    return null;
  }

  await writeFile(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n');
  printSuccess(`Created ${CONFIG_FILES[0]}`);

  // Keep saved reports out of version control
  const gitignorePath = join(cwd, '.gitignore');
  if (existsSync(gitignorePath)) {
    const gitignore = await readFile(gitignorePath, 'utf-8');
    if (!gitignore.includes(`${DEFAULT_OUTPUT_DIR}/`)) {
      await appendFile(gitignorePath, `\n# a11y-grade reports\n${DEFAULT_OUTPUT_DIR}/\n`);
      printSuccess('Updated .gitignore');
    }
  }

  console.log();
  console.log(chalk.bold('Setup complete! Next steps:'));
  console.log();
  console.log(chalk.cyan('  1. Score a page:'));
  console.log(chalk.dim('     a11y-grade check https://example.com'));
  console.log();
  console.log(chalk.cyan('  2. Export the last report:'));
  console.log(chalk.dim('     a11y-grade report --format csv --output issues.csv'));
  console.log();
  printInfo(`Adjust category weights and the CI threshold in ${CONFIG_FILES[0]}`);

  return configPath;
}
