/**
 * Settings Store
 *
 * Simple JSON-file settings, read once per run.
 * Stored at $XDG_CONFIG_HOME/termlaunch/settings.json (default ~/.config).
 * A missing file means defaults; every field of an existing file is
 * normalized on its own, so one bad value never discards the rest.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { splitCommandLine } from './command-line.js';
import { ConfigurationError, describeError } from './errors.js';
import { DEFAULT_EXCLUDED_DIRECTORY_NAMES } from './file-search.js';

const APP_DIRECTORY_NAME = 'termlaunch';
const MAX_RESULTS_LIMIT = 500;

export interface LauncherSettings {
  filesRoot: string;
  maxResults: number;
  showHidden: boolean;
  excludedDirectoryNames: string[];
  terminalCommand: string[];
  editorCommand: string[];
  applicationDirectories: string[];
  scanPathExecutables: boolean;
  dormantAfterDays: number;
  usageBonusPerLaunch: number;
  usageBonusCap: number;
}

export interface AppPaths {
  settingsFile: string;
  usageFile: string;
  appCacheFile: string;
  logFile: string;
}

export interface SettingsEnvironment {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

type Env = NodeJS.ProcessEnv;

function xdgDirectory(env: Env, variable: string, fallback: string): string {
  const value = String(env[variable] || '').trim();
  // Relative values are invalid per the base-directory convention.
  return value && path.isAbsolute(value) ? value : fallback;
}

export function resolveAppPaths(env: Env = process.env, homeDir: string = os.homedir()): AppPaths {
  const configHome = xdgDirectory(env, 'XDG_CONFIG_HOME', path.join(homeDir, '.config'));
  const dataHome = xdgDirectory(env, 'XDG_DATA_HOME', path.join(homeDir, '.local', 'share'));
  const cacheHome = xdgDirectory(env, 'XDG_CACHE_HOME', path.join(homeDir, '.cache'));
  const stateHome = xdgDirectory(env, 'XDG_STATE_HOME', path.join(homeDir, '.local', 'state'));

  return {
    settingsFile: path.join(configHome, APP_DIRECTORY_NAME, 'settings.json'),
    usageFile: path.join(dataHome, APP_DIRECTORY_NAME, 'usage.json'),
    appCacheFile: path.join(cacheHome, APP_DIRECTORY_NAME, 'apps.json'),
    logFile: path.join(stateHome, APP_DIRECTORY_NAME, `${APP_DIRECTORY_NAME}.log`),
  };
}

function defaultApplicationDirectories(env: Env, homeDir: string): string[] {
  const dataHome = xdgDirectory(env, 'XDG_DATA_HOME', path.join(homeDir, '.local', 'share'));
  const dataDirs = String(env.XDG_DATA_DIRS || '/usr/local/share:/usr/share')
    .split(':')
    .map((dir) => dir.trim())
    .filter((dir) => dir && path.isAbsolute(dir));

  const directories = [
    path.join(dataHome, 'applications'),
    ...dataDirs.map((dir) => path.join(dir, 'applications')),
    '/home/linuxbrew/.linuxbrew/share/applications',
  ];
  return Array.from(new Set(directories));
}

function defaultEditorCommand(env: Env): string[] {
  const editor = String(env.VISUAL || env.EDITOR || '').trim();
  const argv = editor ? splitCommandLine(editor) : [];
  return argv.length > 0 ? argv : ['nvim'];
}

export function getDefaultSettings(env: Env = process.env, homeDir: string = os.homedir()): LauncherSettings {
  return {
    filesRoot: homeDir,
    maxResults: 50,
    showHidden: false,
    excludedDirectoryNames: [...DEFAULT_EXCLUDED_DIRECTORY_NAMES],
    terminalCommand: ['kitty', '-e'],
    editorCommand: defaultEditorCommand(env),
    applicationDirectories: defaultApplicationDirectories(env, homeDir),
    scanPathExecutables: true,
    dormantAfterDays: 30,
    usageBonusPerLaunch: 10,
    usageBonusCap: 50,
  };
}

function expandHome(value: string, homeDir: string): string {
  if (value === '~') return homeDir;
  if (value.startsWith('~/')) return path.join(homeDir, value.slice(2));
  return value;
}

function normalizeDirectory(value: unknown, homeDir: string, fallback: string): string {
  const raw = String(value || '').trim();
  if (!raw) return fallback;
  return path.resolve(expandHome(raw, homeDir));
}

function normalizeStringList(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return fallback;
  return value.map((item) => String(item || '').trim()).filter(Boolean);
}

function normalizeCommand(value: unknown, fallback: string[]): string[] {
  if (typeof value === 'string') {
    const argv = splitCommandLine(value.trim());
    return argv.length > 0 ? argv : fallback;
  }
  const list = normalizeStringList(value, fallback);
  return list.length > 0 ? list : fallback;
}

function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function normalizeNumber(value: unknown, fallback: number, min: number, max = Number.POSITIVE_INFINITY): number {
  if (value === null || value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(parsed)));
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

let settingsCache: { filePath: string; settings: LauncherSettings } | null = null;

/**
 * Reads and normalizes the settings file. Throws `ConfigurationError` when
 * the file exists but is not a JSON object.
 */
export function loadSettings(filePath: string, environment: SettingsEnvironment = {}): LauncherSettings {
  if (settingsCache && settingsCache.filePath === filePath) return { ...settingsCache.settings };

  const env = environment.env ?? process.env;
  const homeDir = environment.homeDir ?? os.homedir();
  const defaults = getDefaultSettings(env, homeDir);

  let raw: string;
  try {
    if (!fs.existsSync(filePath)) {
      settingsCache = { filePath, settings: defaults };
      return { ...defaults };
    }
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read settings file ${filePath}: ${describeError(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Settings file ${filePath} is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }
  if (!isRecordObject(parsed)) {
    throw new ConfigurationError(`Settings file ${filePath} must contain a JSON object`);
  }

  const settings: LauncherSettings = {
    filesRoot: normalizeDirectory(parsed.filesRoot, homeDir, defaults.filesRoot),
    maxResults: normalizeNumber(parsed.maxResults, defaults.maxResults, 1, MAX_RESULTS_LIMIT),
    showHidden: normalizeBoolean(parsed.showHidden, defaults.showHidden),
    excludedDirectoryNames: normalizeStringList(parsed.excludedDirectoryNames, defaults.excludedDirectoryNames),
    terminalCommand: normalizeCommand(parsed.terminalCommand, defaults.terminalCommand),
    editorCommand: normalizeCommand(parsed.editorCommand, defaults.editorCommand),
    applicationDirectories: normalizeStringList(parsed.applicationDirectories, defaults.applicationDirectories).map(
      (dir) => path.resolve(expandHome(dir, homeDir))
    ),
    scanPathExecutables: normalizeBoolean(parsed.scanPathExecutables, defaults.scanPathExecutables),
    dormantAfterDays: normalizeNumber(parsed.dormantAfterDays, defaults.dormantAfterDays, 0),
    usageBonusPerLaunch: normalizeNumber(parsed.usageBonusPerLaunch, defaults.usageBonusPerLaunch, 0),
    usageBonusCap: normalizeNumber(parsed.usageBonusCap, defaults.usageBonusCap, 0),
  };

  settingsCache = { filePath, settings };
  return { ...settings };
}

export function resetSettingsCache(): void {
  settingsCache = null;
}
