import inquirer from 'inquirer';
import chalk from 'chalk';
import { logger } from '../../utils/logger.js';
import { sanitizeInput } from '../../utils/validation.js';
import type { NumberedMenu, Prompter, Question } from '../../engine/resolver.js';

/**
 * Numbered-menu prompter on top of inquirer. Answers are returned as typed;
 * interpreting them (including the fallback to defaults) is up to the resolver.
 */
export const inquirerPrompter: Prompter = {
  async ask(menu: NumberedMenu<unknown>, question: Question): Promise<string> {
    logger.newLine();
    console.log(chalk.yellow.bold(menu.title));
    menu.options.forEach((option, index) => {
      console.log(chalk.white(`${index + 1}. ${option.label}`));
    });

    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: 'input',
        name: 'answer',
        message: question.message,
        default: question.default || undefined
      }
    ]);

    return sanitizeInput(answer ?? '');
  },

  async confirm(message: string, summary: string[]): Promise<boolean> {
    logger.newLine();
    console.log(chalk.cyan.bold('📋 Configuration Summary:'));
    logger.list(summary);
    logger.newLine();

    const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
      {
        type: 'confirm',
        name: 'proceed',
        message,
        default: true
      }
    ]);

    return proceed;
  }
};

export async function askToOverwriteDirectory(name: string): Promise<boolean> {
  const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
    {
      type: 'confirm',
      name: 'overwrite',
      message: `Directory "${name}" already exists and is not empty. Do you want to overwrite it?`,
      default: false
    }
  ]);

  return overwrite;
}
