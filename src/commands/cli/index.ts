/**
 * CLI program assembly
 */

import { Command } from 'commander';
import type { FileLoader } from '../../io/file-loader.js';
import { registerConfigCommand } from './config-command.js';
import { registerDetectCommand } from './detect-command.js';

export const CLI_NAME = 'encdetect';

export function createProgram(options: { loader?: FileLoader; version?: string } = {}): Command {
  const program = new Command(CLI_NAME);
  program
    .description('Detect the text encoding of files (UTF-8/16/32, UTF-7, ASCII, JIS, Shift_JIS, EUC-JP)')
    .version(options.version ?? '0.0.0');

  registerDetectCommand(program, options.loader);
  registerConfigCommand(program);

  return program;
}

export { detectFiles, registerDetectCommand } from './detect-command.js';
export type { DetectionReport } from './detect-command.js';
export { registerConfigCommand } from './config-command.js';
