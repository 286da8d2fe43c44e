import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { ListSectionName } from './status/types.js';
import { LIST_SECTION_NAMES } from './status/types.js';
import type { KeyMappings } from './keymap.js';
import { DEFAULT_MAPPINGS, isStatusAction } from './keymap.js';
import * as logger from './utils/logger.js';

export interface SectionConfig {
  hidden: boolean;
  folded: boolean;
}

export interface Config {
  pager?: string;
  debug: boolean;
  /** Refresh on filesystem changes and after `reset()`. */
  autoRefresh: boolean;
  /** Initial fold state of files and commits. */
  itemsFolded: boolean;
  disableHint: boolean;
  disableSigns: boolean;
  disableContextHighlighting: boolean;
  sections: Record<ListSectionName, SectionConfig>;
  mappings: KeyMappings;
}

function defaultSections(): Record<ListSectionName, SectionConfig> {
  const open = (): SectionConfig => ({ hidden: false, folded: false });
  const closed = (): SectionConfig => ({ hidden: false, folded: true });
  return {
    rebase: closed(),
    sequencer: open(),
    untracked: open(),
    unstaged: open(),
    staged: open(),
    stashes: closed(),
    unpulledPushRemote: closed(),
    unmergedPushRemote: open(),
    unpulledUpstream: closed(),
    unmergedUpstream: open(),
    recent: closed(),
  };
}

export function defaultConfig(): Config {
  return {
    debug: false,
    autoRefresh: true,
    itemsFolded: true,
    disableHint: false,
    disableSigns: false,
    disableContextHighlighting: false,
    sections: defaultSections(),
    mappings: { ...DEFAULT_MAPPINGS },
  };
}

export const CONFIG_PATH = path.join(os.homedir(), '.config', 'hunkwise', 'config.json');

const BOOLEAN_FIELDS = [
  'debug',
  'autoRefresh',
  'itemsFolded',
  'disableHint',
  'disableSigns',
  'disableContextHighlighting',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isListSectionName(name: string): name is ListSectionName {
  return LIST_SECTION_NAMES.some((n) => n === name);
}

/**
 * Merge a parsed config object into `config`, field by field.
 * Values of the wrong shape are skipped.
 */
export function applyConfig(config: Config, fileConfig: unknown): Config {
  if (!isRecord(fileConfig)) return config;

  if (typeof fileConfig.pager === 'string' && fileConfig.pager.trim() !== '') {
    config.pager = fileConfig.pager;
  }

  for (const field of BOOLEAN_FIELDS) {
    const value = fileConfig[field];
    if (typeof value === 'boolean') config[field] = value;
  }

  if (isRecord(fileConfig.sections)) {
    for (const [name, value] of Object.entries(fileConfig.sections)) {
      if (!isListSectionName(name) || !isRecord(value)) continue;
      const section = { ...config.sections[name] };
      if (typeof value.hidden === 'boolean') section.hidden = value.hidden;
      if (typeof value.folded === 'boolean') section.folded = value.folded;
      config.sections[name] = section;
    }
  }

  if (isRecord(fileConfig.mappings)) {
    for (const [action, keys] of Object.entries(fileConfig.mappings)) {
      if (!isStatusAction(action)) continue;
      // false unmaps an action
      if (keys === false) {
        config.mappings[action] = [];
      } else if (typeof keys === 'string') {
        config.mappings[action] = [keys];
      } else if (Array.isArray(keys) && keys.every((k: unknown) => typeof k === 'string')) {
        config.mappings[action] = keys.filter((k): k is string => typeof k === 'string');
      }
    }
  }

  return config;
}

export function loadConfig(configPath: string = CONFIG_PATH): Config {
  const config = defaultConfig();

  // Override from environment
  if (process.env.HUNKWISE_PAGER) {
    config.pager = process.env.HUNKWISE_PAGER;
  }

  if (fs.existsSync(configPath)) {
    try {
      const fileConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      applyConfig(config, fileConfig);
    } catch (err) {
      logger.warn(`Ignoring unreadable config file ${configPath}: ${logger.formatError(err)}`);
    }
  }

  return config;
}

export function abbreviateHomePath(fullPath: string): string {
  const home = os.homedir();
  if (fullPath.startsWith(home)) {
    return '~' + fullPath.slice(home.length);
  }
  return fullPath;
}
