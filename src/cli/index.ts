#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import chalk from 'chalk';
import ora from 'ora';
import { ConfigError, resolveModelConfig } from '../core/config.js';
import type { ModelOptions } from '../core/config.js';
import { checkConnection } from '../core/connection.js';
import { createOpenAIProvider } from '../core/llm/adapters/openai.js';
import { FoundationModel } from '../core/llm/model.js';
import type { MessageRecord } from '../core/llm/types.js';
import { createConsoleLogger } from '../utils/logger.js';
import { describeError } from '../utils/text.js';

dotenv.config();

interface ModelFlags {
  model?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  verbose?: boolean;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new InvalidArgumentError('Not a number.');
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) throw new InvalidArgumentError('Expected a positive integer.');
  return parsed;
}

function toModelOptions(flags: ModelFlags): ModelOptions {
  return {
    modelName: flags.model,
    baseUrl: flags.baseUrl,
    temperature: flags.temperature,
    maxTokens: flags.maxTokens,
  };
}

function fail(error: unknown): never {
  const label = error instanceof ConfigError ? 'Configuration Error:' : 'Fatal Error:';
  console.error(chalk.red(label), describeError(error));
  process.exit(1);
}

function withModelFlags(command: Command): Command {
  return command
    .option('-m, --model <name>', 'Model identifier')
    .option('--base-url <url>', 'Chat-completion endpoint base URL')
    .option('-t, --temperature <value>', 'Sampling temperature', parseNumber)
    .option('--max-tokens <count>', 'Maximum tokens in the reply', parseInteger)
    .option('-v, --verbose', 'Enable verbose logging');
}

const program = new Command();

program
  .name('foundation-bridge')
  .description('Chat-completion bridge for code-executing agents')
  .version('1.0.0');

withModelFlags(program.command('check'))
  .description('Send a probe prompt and report whether the provider answers')
  .action(async (flags: ModelFlags) => {
    try {
      const config = resolveModelConfig(toModelOptions(flags));
      const spinner = ora(`Contacting ${config.baseUrl}...`).start();
      const result = await checkConnection(config, createOpenAIProvider(config));
      if (!result.ok) {
        spinner.fail(chalk.red(`Connection failed: ${result.error}`));
        process.exit(1);
      }
      spinner.succeed(chalk.green(`Connected. Reply: ${result.reply}`));
      console.log(chalk.gray(`Model: ${result.modelName}`));
      console.log(chalk.gray(`URL: ${result.baseUrl}`));
    } catch (error: unknown) {
      fail(error);
    }
  });

withModelFlags(program.command('ask'))
  .description('Generate a single reply')
  .argument('<prompt...>', 'User message')
  .option('-s, --system <text>', 'System prompt')
  .action(async (promptWords: string[], flags: ModelFlags & { system?: string }) => {
    try {
      const config = resolveModelConfig(toModelOptions(flags));
      const logger = createConsoleLogger({ verbose: flags.verbose });
      const model = new FoundationModel(config, { provider: createOpenAIProvider(config), logger });

      const transcript: MessageRecord[] = [];
      if (flags.system) transcript.push({ role: 'system', content: flags.system });
      transcript.push({ role: 'user', content: promptWords.join(' ') });

      const spinner = ora('Thinking...').start();
      const reply = await model.complete(transcript);
      spinner.stop();
      console.log(reply);
    } catch (error: unknown) {
      fail(error);
    }
  });

withModelFlags(program.command('info'))
  .description('Print the resolved model configuration')
  .action((flags: ModelFlags) => {
    try {
      const config = resolveModelConfig(toModelOptions(flags));
      const model = new FoundationModel(config, { provider: createOpenAIProvider(config) });
      console.log(JSON.stringify(model.getModelInfo(), null, 2));
    } catch (error: unknown) {
      fail(error);
    }
  });

await program.parseAsync(process.argv);

if (!process.argv.slice(2).length) {
  program.outputHelp();
}
