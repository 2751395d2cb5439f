/**
 * CLI `encdetect detect` and `encdetect cat` commands
 */

import type { Command } from 'commander';
import { describeEncoding, encodingName } from '../../encoding/types.js';
import { getErrorMessage } from '../../errors/index.js';
import { detectFileEncoding, readTextFile } from '../../io/file-detection.js';
import type { FileLoader } from '../../io/file-loader.js';

export interface DetectionReport {
  file: string;
  encoding?: string;
  name?: string;
  error?: string;
}

export async function detectFiles(files: string[], loader?: FileLoader): Promise<DetectionReport[]> {
  const reports: DetectionReport[] = [];
  for (const file of files) {
    try {
      const label = await detectFileEncoding(file, { loader });
      reports.push({ file, encoding: describeEncoding(label), name: encodingName(label) });
    } catch (error) {
      reports.push({ file, error: getErrorMessage(error) });
    }
  }
  return reports;
}

export function registerDetectCommand(program: Command, loader?: FileLoader): void {
  program
    .command('detect <files...>')
    .description('Detect the text encoding of one or more files')
    .option('--json', 'Print results as JSON')
    .action(async (files: string[], opts: { json?: boolean }) => {
      const reports = await detectFiles(files, loader);

      if (opts.json) {
        console.log(JSON.stringify(reports, null, 2));
      } else {
        for (const report of reports) {
          if (report.error !== undefined) {
            console.error(`${report.file}: error: ${report.error}`);
          } else {
            console.log(`${report.file}: ${report.encoding}`);
          }
        }
      }

      if (reports.some(report => report.error !== undefined)) {
        process.exitCode = 1;
      }
    });

  program
    .command('cat <file>')
    .description('Print a file decoded with its detected encoding')
    .action(async (file: string) => {
      const { text } = await readTextFile(file, { loader });
      process.stdout.write(text);
    });
}
