import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {describe, it, expect} from 'vitest';
import {
	ConfigRef,
	DEFAULT_CONFIG,
	configExists,
	loadConfig,
	normalizeWeights,
	resolveConfig,
	saveConfig,
	validateMethods,
	withWeights,
} from '../config/index.js';
import {getConfigPath} from '../constants.js';
import {ConfigError} from '../errors.js';

function tempProject(): string {
	return path.join(
		os.tmpdir(),
		`hybridex-config-${process.pid}-${Math.random().toString(36).slice(2)}`,
	);
}

describe('normalizeWeights', () => {
	it('scales weights to sum to 1', () => {
		expect(normalizeWeights({bm25: 2, semantic: 1, fuzzy: 1})).toEqual({
			bm25: 0.5,
			semantic: 0.25,
			fuzzy: 0.25,
		});
	});

	it('rejects negative weights', () => {
		expect(() => normalizeWeights({bm25: -1, semantic: 1, fuzzy: 1})).toThrow(
			ConfigError,
		);
	});

	it('rejects an all-zero set', () => {
		expect(() => normalizeWeights({bm25: 0, semantic: 0, fuzzy: 0})).toThrow(
			'Invalid weights: at least one weight must be > 0',
		);
	});

	it('rejects missing and non-numeric weights', () => {
		expect(() => normalizeWeights({bm25: 1, semantic: 1})).toThrow(ConfigError);
		expect(() => normalizeWeights({bm25: 'high', semantic: 1, fuzzy: 1})).toThrow(
			ConfigError,
		);
	});
});

describe('validateMethods', () => {
	it('keeps at least one method enabled', () => {
		expect(() =>
			validateMethods({bm25: false, semantic: false, fuzzy: false}),
		).toThrow('Invalid methods: at least one search method must stay enabled');
		expect(validateMethods({bm25: true, semantic: false, fuzzy: false})).toEqual({
			bm25: true,
			semantic: false,
			fuzzy: false,
		});
	});
});

describe('resolveConfig', () => {
	it('merges partial input over the defaults', () => {
		const config = resolveConfig({rrfK: 10, bm25: {k1: 2}});
		expect(config.rrfK).toBe(10);
		expect(config.bm25).toEqual({k1: 2, b: 0.75});
		expect(config.cacheTtlMs).toEqual(DEFAULT_CONFIG.cacheTtlMs);
	});

	it('normalizes merged weights', () => {
		const config = resolveConfig({weights: {bm25: 1}});
		expect(config.weights.bm25).toBeCloseTo(1 / 1.5, 12);
		expect(config.weights.semantic).toBeCloseTo(0.3 / 1.5, 12);
		expect(config.weights.fuzzy).toBeCloseTo(0.2 / 1.5, 12);
	});

	it('returns frozen objects', () => {
		const config = resolveConfig({});
		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.weights)).toBe(true);
		expect(Object.isFrozen(config.sourceTimeoutMs)).toBe(true);
	});

	it('reports every invalid key', () => {
		try {
			resolveConfig({rrfK: -1, bm25: {b: 2}});
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigError);
			if (!(error instanceof ConfigError)) return;
			expect(error.code).toBe('CONFIG_INVALID');
			expect(error.issues.map(issue => issue.split(':')[0])).toEqual([
				'rrfK',
				'bm25.b',
			]);
		}
	});
});

describe('ConfigRef', () => {
	it('swaps configs without touching the old one', () => {
		const ref = new ConfigRef();
		const before = ref.current;
		const after = ref.update(config =>
			withWeights(config, {bm25: 1, semantic: 0, fuzzy: 0}),
		);

		expect(ref.current).toBe(after);
		expect(ref.version).toBe(1);
		expect(after.weights).toEqual({bm25: 1, semantic: 0, fuzzy: 0});
		expect(before.weights).toEqual(DEFAULT_CONFIG.weights);
	});

	it('keeps the current config when an update throws', () => {
		const ref = new ConfigRef();
		expect(() =>
			ref.update(config => withWeights(config, {bm25: 0, semantic: 0, fuzzy: 0})),
		).toThrow(ConfigError);
		expect(ref.current.weights).toEqual(DEFAULT_CONFIG.weights);
		expect(ref.version).toBe(0);
	});
});

describe('config files', () => {
	it('returns the defaults when no file exists', async () => {
		const projectRoot = tempProject();
		expect(await configExists(projectRoot)).toBe(false);
		expect(await loadConfig(projectRoot)).toBe(DEFAULT_CONFIG);
	});

	it('round-trips a saved config', async () => {
		const projectRoot = tempProject();
		const config = resolveConfig({rrfK: 30, sourceTimeoutMs: {semantic: null}});
		await saveConfig(projectRoot, config);

		expect(await configExists(projectRoot)).toBe(true);
		expect(await loadConfig(projectRoot)).toEqual(config);
	});

	it('rejects a file that is not JSON', async () => {
		const projectRoot = tempProject();
		const configPath = getConfigPath(projectRoot);
		await fs.mkdir(path.dirname(configPath), {recursive: true});
		await fs.writeFile(configPath, '{not json');

		await expect(loadConfig(projectRoot)).rejects.toBeInstanceOf(ConfigError);
	});

	it('rejects a file with invalid values', async () => {
		const projectRoot = tempProject();
		const configPath = getConfigPath(projectRoot);
		await fs.mkdir(path.dirname(configPath), {recursive: true});
		await fs.writeFile(configPath, JSON.stringify({candidateMultiplier: 0}));

		await expect(loadConfig(projectRoot)).rejects.toThrow(
			'Invalid configuration: candidateMultiplier:',
		);
	});
});
