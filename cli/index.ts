#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import logger from '@/lib/logger';
import { errorMessage } from '@/lib/errors';
import { generateCommand } from './commands/generate';
import { configCommand } from './commands/config';
import { resetCommand } from './commands/reset';

const program = new Command();

program
  .name('diyalog')
  .description('Türkçe telekom müşteri hizmetleri sentetik diyalog korpusu üretici')
  .version('1.0.0');

program.addCommand(generateCommand);
program.addCommand(configCommand);
program.addCommand(resetCommand);

program.parseAsync().catch((error: unknown) => {
  logger.error('Beklenmeyen hata', { error: errorMessage(error) });
  process.exitCode = 1;
});
