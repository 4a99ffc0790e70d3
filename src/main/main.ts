#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Loads settings, the application catalog and the usage history, then hands
 * the terminal to the launcher UI until the user launches something or quits.
 */

import * as path from 'path';
import { parseArgs } from 'util';
import { runTerminalLauncher } from '../renderer/src/main.js';
import { loadAppCatalog } from './app-catalog.js';
import { AppIndex } from './app-index.js';
import { ConfigurationError, describeError } from './errors.js';
import { createLauncher } from './launcher.js';
import { LauncherSession } from './launcher-session.js';
import { closeLogging, configureLogging, createLogger } from './logger.js';
import { loadSettings, resolveAppPaths } from './settings-store.js';
import { UsageStore } from './usage-store.js';

const log = createLogger('Main');

const USAGE = `Usage: termlaunch [options]

Options:
  -f, --files          start in file search mode
  -r, --root DIR       search files under DIR instead of the configured root
      --rebuild-cache  rescan application entries, rewrite the cache and exit
  -v, --verbose        write debug lines to the log file
  -h, --help           show this help`;

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: false,
    options: {
      files: { type: 'boolean', short: 'f', default: false },
      root: { type: 'string', short: 'r' },
      'rebuild-cache': { type: 'boolean', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  }).values;
}

async function main(argv: string[]): Promise<number> {
  let flags: ReturnType<typeof parseCommandLine>;
  try {
    flags = parseCommandLine(argv);
  } catch (error) {
    process.stderr.write(`termlaunch: ${describeError(error)}\n${USAGE}\n`);
    return 2;
  }
  if (flags.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const paths = resolveAppPaths();
  configureLogging({ filePath: paths.logFile, verbose: flags.verbose });

  const settings = loadSettings(paths.settingsFile);
  if (flags.root) settings.filesRoot = path.resolve(flags.root);

  const records = await loadAppCatalog({
    applicationDirectories: settings.applicationDirectories,
    pathVariable: process.env.PATH,
    scanPathExecutables: settings.scanPathExecutables,
    cachePath: paths.appCacheFile,
    rebuild: flags['rebuild-cache'],
  });

  if (flags['rebuild-cache']) {
    process.stdout.write(`Indexed ${records.length} application(s) into ${paths.appCacheFile}\n`);
    return 0;
  }

  const appIndex = AppIndex.load(records);
  const usage = UsageStore.open(paths.usageFile);
  const session = new LauncherSession({
    appIndex,
    usage,
    launch: createLauncher(settings),
    filesRoot: settings.filesRoot,
    maxResults: settings.maxResults,
    initialMode: flags.files ? 'files' : 'apps',
    showHidden: settings.showHidden,
    excludedDirectoryNames: settings.excludedDirectoryNames,
    dormantAfterDays: settings.dormantAfterDays,
    weighting: { bonusPerLaunch: settings.usageBonusPerLaunch, bonusCap: settings.usageBonusCap },
  });
  log.info(`Started with ${appIndex.size} app(s), ${usage.size} usage record(s)`);

  try {
    const exit = await runTerminalLauncher(session);
    log.info(`Session ended: ${exit?.reason ?? 'unmounted'}`);
  } finally {
    session.dispose();
    try {
      usage.flush();
    } catch (error) {
      log.error(describeError(error));
    }
  }
  return 0;
}

void main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      process.stderr.write(`termlaunch: ${error.message}\n`);
    } else {
      log.error('Unexpected failure:', error);
      process.stderr.write(`termlaunch: ${describeError(error)}\n`);
    }
    process.exitCode = 1;
  })
  .finally(() => {
    closeLogging();
  });
