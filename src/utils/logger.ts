import chalk from 'chalk';

class Logger {
  private verbose = false;

  setVerbose(verbose: boolean) {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  info(message: string) {
    console.log(chalk.blue('ℹ'), message);
  }

  success(message: string) {
    console.log(chalk.green('✅'), message);
  }

  warning(message: string) {
    console.log(chalk.yellow('⚠️'), message);
  }

  error(message: string) {
    console.error(chalk.red('❌'), message);
  }

  debug(message: string) {
    if (this.verbose) {
      console.log(chalk.gray('🔍'), chalk.gray(message));
    }
  }

  step(message: string) {
    console.log(chalk.cyan('🔧'), message);
  }

  heading(message: string) {
    console.log(chalk.cyan.bold(message));
  }

  list(items: string[]) {
    for (const item of items) {
      console.log(chalk.white(`  • ${item}`));
    }
  }

  command(line: string) {
    console.log(chalk.cyan(`   ${line}`));
  }

  newLine() {
    console.log('');
  }
}

export const logger = new Logger();
