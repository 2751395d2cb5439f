#!/usr/bin/env node
import * as dotenv from 'dotenv';
import * as fs from 'fs-extra';
import * as path from 'path';
import { createProgram } from './commands/cli/index.js';
import { loadConfig } from './config/detector-config.js';
import { getErrorMessage } from './errors/index.js';
import { logger } from './utils/logger.js';

dotenv.config();
logger.configure(loadConfig());

function readVersion(): string | undefined {
  const pkgPath = path.join(__dirname, '..', 'package.json');
  try {
    const pkg: unknown = fs.readJsonSync(pkgPath);
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { pkgPath, error: getErrorMessage(error) });
  }
  return undefined;
}

createProgram({ version: readVersion() })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`error: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
