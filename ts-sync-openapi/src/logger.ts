import chalk from 'chalk';

export const log = {
  step(message: string): void {
    console.log(chalk.cyan(message));
  },
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  },
  info(message: string): void {
    console.log(chalk.yellow(message));
  },
  detail(message: string): void {
    console.log(chalk.gray(`  ${message}`));
  },
  error(message: string): void {
    console.error(chalk.red(`✗ ${message}`));
  },
};
