#!/usr/bin/env node
import { App } from './App.js';
import { loadConfig } from './config.js';
import type { Config } from './config.js';
import { spawnPager } from './git/diff.js';
import { GitRepository } from './git/repository.js';
import { formatHint } from './keymap.js';
import { buildStatusTree } from './status/StatusTreeBuilder.js';
import * as logger from './utils/logger.js';

// Cleanup function to reset terminal state on exit
function cleanupTerminal(): void {
  // Leave the alternate screen and show the cursor
  process.stdout.write('\x1b[?1049l');
  process.stdout.write('\x1b[?25h');
}

interface ParsedArgs {
  initialPath?: string;
  once?: boolean;
  debug?: boolean;
  help?: boolean;
}

const USAGE = `
hunkwise - Terminal git status with hunk and line staging

Usage: hunkwise [options] [path]

Options:
  --once         Print the status buffer and exit
  -d, --debug    Log refreshes and git commands to stderr
  -h, --help     Show this help message

Arguments:
  [path]         Path inside a git repository (default: current directory)

Environment:
  HUNKWISE_PAGER   Pager for --once output
  VISUAL, EDITOR   Editor used to open files

Keyboard (defaults, see ~/.config/hunkwise/config.json):
  j/k, Up/Down   Move the cursor
  v              Start or end a visual selection
  Tab            Toggle the fold under the cursor
  1/2/3/4        Fold everything to a depth
  s / u / x      Stage / unstage / discard the selection
  Shift+s        Stage all tracked changes
  Ctrl+s         Stage everything
  Shift+u        Unstage everything
  n / Shift+n    Next / previous hunk
  Enter          Open the file or commit under the cursor
  y              Copy the name or commit under the cursor
  Ctrl+r         Refresh
  q / Ctrl+C     Close / quit
`;

function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {};

  for (const arg of args) {
    if (arg === '--once') {
      result.once = true;
    } else if (arg === '--debug' || arg === '-d') {
      result.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (!arg.startsWith('-')) {
      result.initialPath = arg;
    } else {
      logger.warn(`Ignoring unknown option ${arg}`);
    }
  }

  return result;
}

/**
 * Render the buffer once with its configured folds, to stdout or the pager.
 */
async function printOnce(config: Config, dir: string): Promise<void> {
  const repository = await GitRepository.open(dir);
  const snapshot = await repository.loadSnapshot();
  const { lines } = buildStatusTree(null, snapshot, {
    config,
    columns: process.stdout.columns ?? 120,
    hint: formatHint(config.mappings),
  });
  const text = lines.map((l) => l.text).join('\n') + '\n';

  if (config.pager && process.stdout.isTTY) {
    await spawnPager(config.pager, text);
  } else {
    process.stdout.write(text);
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  if (args.debug) {
    config.debug = true;
  }
  logger.setDebug(config.debug);

  const dir = args.initialPath ?? process.cwd();

  if (args.once) {
    await printOnce(config, dir);
    return;
  }

  process.on('exit', cleanupTerminal);
  process.on('SIGINT', () => {
    cleanupTerminal();
    process.exit(0);
  });
  process.on('SIGTERM', () => {
    cleanupTerminal();
    process.exit(0);
  });
  process.on('uncaughtException', (err) => {
    cleanupTerminal();
    logger.error('Uncaught exception', err);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    cleanupTerminal();
    logger.error('Unhandled rejection', reason);
    process.exit(1);
  });

  const app = new App({ config, initialPath: dir });
  await app.start();
  process.exit(0);
}

main().catch((err) => {
  logger.error('Fatal error', err);
  process.exit(1);
});
