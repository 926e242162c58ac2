/**
 * Terminal output helpers
 */

import chalk from 'chalk';
import type { ConventionError } from '@waypost/conventions';

export function printValid(value: string): void {
  console.log(chalk.green('✔ ') + chalk.bold(value));
}

export function printDetail(label: string, value: string): void {
  console.log(chalk.gray(`  ${label}: `) + value);
}

export function printConventionError(error: ConventionError): void {
  console.error(chalk.red(`✖ ${error.code} [${error.rule}] `) + error.message);
}

export function printError(message: string): void {
  console.error(chalk.red(`Error: ${message}`));
}
