#!/usr/bin/env node

/**
 * Maintenance SOP CLI
 * Interactive front end for the SOP pipeline
 */

import { select, confirm } from '@inquirer/prompts';
import chalk from 'chalk';

// Load environment variables
import 'dotenv/config';

import { parseEnv } from '../config/env.js';
import { printDivider, printInfo, printError, printRaw, isPromptExit } from './utils.js';

const MENU_CHOICES = [
  {
    name: '1. Generate SOP  - Video + observations to sop.md and sop.pdf',
    value: 'generate',
  },
  {
    name: '2. List models   - Models available for generation',
    value: 'models',
  },
  {
    name: '0. Exit',
    value: 'exit',
  },
];

function printBanner(): void {
  printRaw(chalk.cyan(`
╔═══════════════════════════════════════════════════════╗
║            Maintenance SOP Generator                  ║
║   video → frames → Gemini → Markdown + Mermaid → PDF  ║
╚═══════════════════════════════════════════════════════╝
`));
}

async function runChoice(choice: string): Promise<void> {
  // Loaded after the environment is validated; these modules read config on import
  const { runGenerate, runListModels } = await import('./generate.js');

  switch (choice) {
    case 'generate':
      await runGenerate();
      break;
    case 'models':
      await runListModels();
      break;
    default:
      break;
  }
}

/**
 * Main menu loop
 */
async function mainMenu(): Promise<void> {
  while (true) {
    printRaw('');

    const choice = await select({
      message: 'What would you like to do?',
      choices: MENU_CHOICES,
    });

    if (choice === 'exit') {
      printInfo('Goodbye!');
      return;
    }

    try {
      await runChoice(choice);
    } catch (error) {
      if (isPromptExit(error)) {
        printInfo('Operation cancelled');
      } else {
        printError(`Error: ${(error as Error).message}`);
      }
    }

    printDivider();

    const again = await confirm({
      message: 'Return to main menu?',
      default: true,
    });

    if (!again) {
      printInfo('Goodbye!');
      return;
    }
  }
}

async function main(): Promise<void> {
  process.on('SIGINT', () => {
    printRaw(chalk.yellow('\n\nInterrupted. Goodbye!'));
    process.exit(0);
  });

  printBanner();

  try {
    parseEnv();
  } catch (error) {
    printError(`Invalid configuration: ${(error as Error).message}`);
    printInfo('Set GOOGLE_AI_API_KEY in your environment or .env file');
    process.exit(1);
  }

  const { setupDefaultProviders } = await import('../providers/setup.js');
  setupDefaultProviders();
  printDivider();

  try {
    await mainMenu();
  } catch (error) {
    if (isPromptExit(error)) {
      printRaw(chalk.yellow('\nGoodbye!'));
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error(chalk.red('Fatal error:'), error);
  process.exit(1);
});
