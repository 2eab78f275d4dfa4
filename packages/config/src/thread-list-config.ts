/**
 * Thread List Configuration
 * Defaults plus loading of threads.json for the thread list view model.
 *
 * The config file can be placed in:
 * - ./.threadline/threads.json
 * - ./threadline.json
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ZodError } from 'zod';
import { ConfigValidationError } from '@threadline/utils/errors';
import { createLogger } from '@threadline/utils/logger';
import {
  ThreadListConfigFileSchema,
  ThreadListConfigSchema,
  type ThreadListConfig,
  type ThreadListConfigInput,
} from './schemas.js';

const log = createLogger('config');

export const DEFAULT_THREAD_LIST_CONFIG: ThreadListConfig = {
  defaultFilter: 'all',
  emptyState: {
    title: 'Keep discussions organised with threads',
    infoAll: 'Threads help keep your conversations on-topic and easy to track.',
    infoMine: 'Reply to an ongoing thread or tap “Thread” on a message to start a new one.',
    tip: 'Tip: Long press a message and use “Thread” to start one.',
    showAllThreadsButtonTitle: 'Show all threads',
  },
};

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Merge partial settings over the defaults and validate the result.
 * @throws ConfigValidationError when the merged config is invalid
 */
export function resolveThreadListConfig(
  input: ThreadListConfigInput = {},
  source = 'inline config'
): ThreadListConfig {
  const parsedInput = ThreadListConfigFileSchema.safeParse(input);
  if (!parsedInput.success) {
    throw new ConfigValidationError(source, describeIssues(parsedInput.error));
  }

  const merged = {
    defaultFilter: parsedInput.data.defaultFilter ?? DEFAULT_THREAD_LIST_CONFIG.defaultFilter,
    emptyState: {
      ...DEFAULT_THREAD_LIST_CONFIG.emptyState,
      ...parsedInput.data.emptyState,
    },
  };

  const result = ThreadListConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError(source, describeIssues(result.error));
  }
  return result.data;
}

/**
 * Possible locations for the config file (in order of precedence)
 */
export function getThreadListConfigPaths(projectRoot: string): string[] {
  return [
    path.join(projectRoot, '.threadline', 'threads.json'),
    path.join(projectRoot, 'threadline.json'),
  ];
}

/**
 * Load thread list config from the project root.
 * Returns the defaults when no config file exists.
 */
export function loadThreadListConfig(projectRoot: string): ThreadListConfig {
  const configPath = getThreadListConfigPaths(projectRoot).find((candidate) => fs.existsSync(candidate));
  if (!configPath) {
    return DEFAULT_THREAD_LIST_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigValidationError(configPath, [err instanceof Error ? err.message : String(err)]);
  }

  const parsed = ThreadListConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(configPath, describeIssues(parsed.error));
  }

  log.debug('Loaded thread list config', { path: configPath });
  return resolveThreadListConfig(parsed.data, configPath);
}
