import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/**
 * Environment variable to override the hybridex home directory.
 *
 * Persisted data lives under the home directory, never inside the
 * project folder being indexed.
 */
export const HYBRIDEX_HOME_ENV = 'HYBRIDEX_HOME';

/**
 * Get the hybridex home directory.
 *
 * Default: ~/.local/share/hybridex
 * Override: $HYBRIDEX_HOME
 * Linux (conventional): $XDG_DATA_HOME/hybridex
 */
export function getHomeDir(): string {
	const override = process.env[HYBRIDEX_HOME_ENV]?.trim();
	if (override) return override;

	const xdg = process.env['XDG_DATA_HOME']?.trim();
	if (xdg) return path.join(xdg, 'hybridex');

	return path.join(os.homedir(), '.local', 'share', 'hybridex');
}

/**
 * Stable per-project identifier derived from the canonical project root.
 * Falls back to the resolved path when the directory does not exist yet.
 */
export function getProjectId(projectRoot: string): string {
	const resolved = path.resolve(projectRoot);
	const canonical = fs.existsSync(resolved)
		? fs.realpathSync(resolved)
		: resolved;
	return crypto
		.createHash('sha256')
		.update(`hybridex:${canonical}`)
		.digest('hex')
		.slice(0, 20);
}

/**
 * Get the per-project data directory.
 */
export function getDataDir(projectRoot: string): string {
	return path.join(getHomeDir(), 'projects', getProjectId(projectRoot));
}

export function getConfigPath(projectRoot: string): string {
	return path.join(getDataDir(projectRoot), 'config.json');
}

export function getSnapshotPath(projectRoot: string): string {
	return path.join(getDataDir(projectRoot), 'index-snapshot.json');
}

export function getLanceDbPath(projectRoot: string): string {
	return path.join(getDataDir(projectRoot), 'lancedb');
}

export function getLogsDir(projectRoot: string): string {
	return path.join(getDataDir(projectRoot), 'logs');
}

/**
 * LanceDB table names.
 */
export const TABLE_NAMES = {
	DOCUMENTS: 'documents',
} as const;

/**
 * Snapshot format version. Bump when the serialized layout changes.
 */
export const SNAPSHOT_VERSION = 1;

/**
 * File extensions mapped to a language identifier.
 * Used by the language filter when a document carries no `language` field.
 */
export const EXTENSION_TO_LANGUAGE: Record<string, string> = {
	'.py': 'python',
	'.js': 'javascript',
	'.jsx': 'javascript',
	'.mjs': 'javascript',
	'.cjs': 'javascript',
	'.ts': 'typescript',
	'.tsx': 'typescript',
	'.mts': 'typescript',
	'.cts': 'typescript',
	'.go': 'go',
	'.rs': 'rust',
	'.java': 'java',
	'.kt': 'kotlin',
	'.scala': 'scala',
	'.rb': 'ruby',
	'.php': 'php',
	'.c': 'c',
	'.h': 'c',
	'.cc': 'cpp',
	'.cpp': 'cpp',
	'.hpp': 'cpp',
	'.cs': 'csharp',
	'.swift': 'swift',
	'.dart': 'dart',
	'.lua': 'lua',
	'.sh': 'bash',
	'.md': 'markdown',
};

/**
 * Well-known keys in a parsed document's `fields` map.
 */
export const FIELD_KEYS = {
	PATH: 'path',
	LANGUAGE: 'language',
	SYMBOL: 'symbol',
	KIND: 'kind',
	LINE: 'line',
} as const;
