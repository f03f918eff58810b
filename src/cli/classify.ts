#!/usr/bin/env node

/**
 * Pole Classifier CLI
 *
 * Decide, correct and export subjects without running the HTTP server.
 * Results go to stdout; logs go to stderr.
 */

import { promises as fs } from 'fs';
import { pathToFileURL } from 'url';
import type { ClassificationService, ExportFormat } from '../services/ClassificationService.js';
import { loadClassifierConfig } from '../config/index.js';
import { createClassifier } from '../bootstrap.js';

export type Command = 'decide' | 'correct' | 'confirm' | 'export' | 'calibration' | 'stats' | 'help';

const COMMANDS: readonly Command[] = ['decide', 'correct', 'confirm', 'export', 'calibration', 'stats', 'help'];

export interface CliOptions {
  refresh: boolean;
  concurrency: number;
  format: ExportFormat;
  output?: string;
  material?: string;
  type?: string;
}

export interface ParsedArgs {
  command: Command;
  subjectIds: string[];
  options: CliOptions;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function toCommand(value: string | undefined): Command {
  const command = COMMANDS.find(c => c === value);
  if (value !== undefined && !command) {
    throw new UsageError(`Unknown command: ${value}`);
  }
  return command ?? 'help';
}

/**
 * Parse `<command> [subject ids...] [options]`
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const command = toCommand(argv[0]);
  const options: CliOptions = { refresh: false, concurrency: 1, format: 'json' };
  const subjectIds: string[] = [];

  const valueOf = (index: number, flag: string): string => {
    const value = argv[index];
    if (value === undefined) {
      throw new UsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--refresh') {
      options.refresh = true;
    } else if (arg === '--concurrency') {
      const n = Number(valueOf(++i, arg));
      if (!Number.isInteger(n) || n < 1) {
        throw new UsageError('--concurrency must be a positive integer');
      }
      options.concurrency = n;
    } else if (arg === '--format') {
      const format = valueOf(++i, arg);
      if (format !== 'json' && format !== 'csv') {
        throw new UsageError('--format must be json or csv');
      }
      options.format = format;
    } else if (arg === '--output') {
      options.output = valueOf(++i, arg);
    } else if (arg === '--material') {
      options.material = valueOf(++i, arg);
    } else if (arg === '--type') {
      options.type = valueOf(++i, arg);
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      subjectIds.push(arg);
    }
  }

  return { command, subjectIds, options };
}

function singleSubject(parsed: ParsedArgs): string {
  if (parsed.subjectIds.length !== 1) {
    throw new UsageError(`${parsed.command} takes exactly one subject id`);
  }
  return parsed.subjectIds[0];
}

/**
 * Run one command; `write` receives what belongs on stdout
 */
export async function runCommand(
  parsed: ParsedArgs,
  service: ClassificationService,
  write: (text: string) => void
): Promise<void> {
  const { options } = parsed;

  switch (parsed.command) {
    case 'decide': {
      if (parsed.subjectIds.length === 0) {
        throw new UsageError('decide needs at least one subject id');
      }
      const controller = new AbortController();
      const stop = () => controller.abort();
      process.once('SIGINT', stop);
      try {
        const decisions = await service.decideMany(parsed.subjectIds, {
          forceRefresh: options.refresh,
          concurrency: options.concurrency,
          signal: controller.signal,
        });
        for (const decision of decisions) {
          write(JSON.stringify(decision));
        }
      } finally {
        process.removeListener('SIGINT', stop);
      }
      break;
    }

    case 'correct': {
      const subjectId = singleSubject(parsed);
      if (!options.material || !options.type) {
        throw new UsageError('correct needs --material and --type');
      }
      write(JSON.stringify(await service.correct(subjectId, options.material, options.type), null, 2));
      break;
    }

    case 'confirm':
      write(JSON.stringify(await service.confirm(singleSubject(parsed)), null, 2));
      break;

    case 'export': {
      const body = await service.exportSnapshot(options.format);
      if (options.output) {
        await fs.writeFile(options.output, body, 'utf-8');
      } else {
        write(body);
      }
      break;
    }

    case 'calibration':
      write(JSON.stringify(await service.calibrationSummary(), null, 2));
      break;

    case 'stats':
      write(JSON.stringify(await service.accuracyStats(), null, 2));
      break;

    case 'help':
      write(helpText());
      break;
  }
}

export function helpText(): string {
  return `
Pole Classifier CLI

Usage:
  classify decide <id...> [--refresh] [--concurrency <n>]
  classify correct <id> --material <material> --type <type>
  classify confirm <id>
  classify export [--format json|csv] [--output <file>]
  classify calibration
  classify stats
  classify help

Storage, vision and rule settings are read from the environment (.env).
`;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const parsed = parseArgs(argv);
  if (parsed.command === 'help') {
    console.log(helpText());
    return;
  }

  const classifier = await createClassifier(loadClassifierConfig());
  try {
    await runCommand(parsed, classifier.service, text => console.log(text));
  } finally {
    await classifier.close();
  }
}

const isMainModule = (): boolean =>
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMainModule()) {
  main()
    .then(() => process.exit(0))
    .catch(error => {
      if (error instanceof UsageError) {
        console.error(error.message);
        console.error(helpText());
      } else {
        console.error('Fatal error:');
        console.error(error);
      }
      process.exit(1);
    });
}
