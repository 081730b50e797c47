import chalk from "chalk";
import type { IOutputService } from "../interfaces/output.interface";

export class ConsoleOutputService implements IOutputService {
  header(title: string, icon?: string): void {
    console.log(chalk.blue.bold(icon ? `${icon} ${title}` : title));
  }

  newline(): void {
    console.log();
  }

  info(message: string): void {
    console.log(chalk.white(message));
  }

  dim(message: string): void {
    console.log(chalk.gray(message));
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠ ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`✗ ${message}`));
  }

  field(label: string, value: string | number | boolean): void {
    console.log(`  ${chalk.white(`${label}:`)} ${chalk.cyan(String(value))}`);
  }

  json(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }
}
