import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {getConfigPath} from '../constants.js';
import {ConfigError} from '../errors.js';
import {SOURCE_NAMES, type SourceName} from '../search/types.js';

export type SourceWeights = Readonly<Record<SourceName, number>>;
export type EnabledSources = Readonly<Record<SourceName, boolean>>;

/**
 * Search configuration.
 *
 * Instances are frozen. Changing configuration means building a new
 * object and swapping the reference held by a {@link ConfigRef}.
 */
export interface HybridConfig {
	/** RRF weight per source, normalized to sum to 1 */
	readonly weights: SourceWeights;
	/** Which sources take part in hybrid fan-out */
	readonly enabled: EnabledSources;
	/** RRF rank constant */
	readonly rrfK: number;
	/** BM25 tuning constants */
	readonly bm25: Readonly<{k1: number; b: number}>;
	/** Per-source deadline; null means unbounded */
	readonly sourceTimeoutMs: Readonly<Record<SourceName, number | null>>;
	/** Cache TTL per source, mixed by weight for each cached response */
	readonly cacheTtlMs: Readonly<Record<SourceName, number>>;
	/** Upper bound on the TTL of a response with degraded sources */
	readonly degradedCacheTtlMs: number;
	readonly cacheMaxEntries: number;
	/** Each source is asked for limit * candidateMultiplier results */
	readonly candidateMultiplier: number;
	readonly maxPrefixExpansions: number;
	/** Characters of context on each side of a snippet's match cluster */
	readonly snippetWindow: number;
	/** Concurrent document reads during rebuild */
	readonly rebuildConcurrency: number;
}

export const DEFAULT_CONFIG: HybridConfig = freezeConfig({
	weights: {bm25: 0.5, semantic: 0.3, fuzzy: 0.2},
	enabled: {bm25: true, semantic: true, fuzzy: true},
	rrfK: 60,
	bm25: {k1: 1.2, b: 0.75},
	sourceTimeoutMs: {bm25: null, semantic: 2000, fuzzy: 2000},
	cacheTtlMs: {bm25: 300_000, semantic: 900_000, fuzzy: 180_000},
	degradedCacheTtlMs: 10_000,
	cacheMaxEntries: 1000,
	candidateMultiplier: 2,
	maxPrefixExpansions: 64,
	snippetWindow: 80,
	rebuildConcurrency: 8,
});

// ============================================================================
// Validation
// ============================================================================

const nonNegative = z.number().finite().nonnegative();
const positiveInt = z.number().int().positive();

export const weightsSchema = z.object({
	bm25: nonNegative,
	semantic: nonNegative,
	fuzzy: nonNegative,
});

export const methodsSchema = z.object({
	bm25: z.boolean(),
	semantic: z.boolean(),
	fuzzy: z.boolean(),
});

const configFileSchema = z
	.object({
		weights: weightsSchema.partial(),
		enabled: methodsSchema.partial(),
		rrfK: nonNegative,
		bm25: z.object({k1: nonNegative, b: z.number().min(0).max(1)}).partial(),
		sourceTimeoutMs: z
			.object({
				bm25: positiveInt.nullable(),
				semantic: positiveInt.nullable(),
				fuzzy: positiveInt.nullable(),
			})
			.partial(),
		cacheTtlMs: z
			.object({bm25: nonNegative, semantic: nonNegative, fuzzy: nonNegative})
			.partial(),
		degradedCacheTtlMs: nonNegative,
		cacheMaxEntries: positiveInt,
		candidateMultiplier: positiveInt,
		maxPrefixExpansions: positiveInt,
		snippetWindow: positiveInt,
		rebuildConcurrency: positiveInt,
	})
	.partial();

export type HybridConfigInput = z.infer<typeof configFileSchema>;

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => {
		const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
		return `${where}: ${issue.message}`;
	});
}

// ============================================================================
// Construction
// ============================================================================

export function freezeConfig(config: HybridConfig): HybridConfig {
	return Object.freeze({
		...config,
		weights: Object.freeze({...config.weights}),
		enabled: Object.freeze({...config.enabled}),
		bm25: Object.freeze({...config.bm25}),
		sourceTimeoutMs: Object.freeze({...config.sourceTimeoutMs}),
		cacheTtlMs: Object.freeze({...config.cacheTtlMs}),
	});
}

/**
 * Sum-normalize weights so they add up to 1.
 * Rejects negative or non-finite weights and an all-zero set.
 */
export function normalizeWeights(weights: unknown): SourceWeights {
	const parsed = weightsSchema.safeParse(weights);
	if (!parsed.success) {
		throw new ConfigError('Invalid weights', formatIssues(parsed.error));
	}
	const w = parsed.data;
	const sum = w.bm25 + w.semantic + w.fuzzy;
	if (sum <= 0) {
		throw new ConfigError('Invalid weights', ['at least one weight must be > 0']);
	}
	return {bm25: w.bm25 / sum, semantic: w.semantic / sum, fuzzy: w.fuzzy / sum};
}

export function validateMethods(methods: unknown): EnabledSources {
	const parsed = methodsSchema.safeParse(methods);
	if (!parsed.success) {
		throw new ConfigError('Invalid methods', formatIssues(parsed.error));
	}
	if (!SOURCE_NAMES.some(name => parsed.data[name])) {
		throw new ConfigError('Invalid methods', [
			'at least one search method must stay enabled',
		]);
	}
	return parsed.data;
}

/**
 * Merge a partial config over a base config, validating the input.
 */
export function resolveConfig(
	input: unknown,
	base: HybridConfig = DEFAULT_CONFIG,
): HybridConfig {
	const parsed = configFileSchema.safeParse(input ?? {});
	if (!parsed.success) {
		throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
	}
	const loaded = parsed.data;

	const merged: HybridConfig = {
		...base,
		...loaded,
		weights: normalizeWeights({...base.weights, ...loaded.weights}),
		enabled: validateMethods({...base.enabled, ...loaded.enabled}),
		bm25: {...base.bm25, ...loaded.bm25},
		sourceTimeoutMs: {...base.sourceTimeoutMs, ...loaded.sourceTimeoutMs},
		cacheTtlMs: {...base.cacheTtlMs, ...loaded.cacheTtlMs},
	};
	return freezeConfig(merged);
}

export function withWeights(
	config: HybridConfig,
	weights: unknown,
): HybridConfig {
	return freezeConfig({...config, weights: normalizeWeights(weights)});
}

export function withMethods(
	config: HybridConfig,
	methods: unknown,
): HybridConfig {
	return freezeConfig({...config, enabled: validateMethods(methods)});
}

/**
 * Holder for the current configuration.
 *
 * Readers take `current` once per operation and keep using that object;
 * `update` swaps in a new frozen config and never mutates the old one.
 */
export class ConfigRef {
	private config: HybridConfig;
	private revision = 0;

	constructor(initial: HybridConfig = DEFAULT_CONFIG) {
		this.config = freezeConfig(initial);
	}

	get current(): HybridConfig {
		return this.config;
	}

	get version(): number {
		return this.revision;
	}

	update(change: (config: HybridConfig) => HybridConfig): HybridConfig {
		const next = change(this.config);
		this.config = freezeConfig(next);
		this.revision++;
		return this.config;
	}
}

// ============================================================================
// Persistence
// ============================================================================

function isNotFound(error: unknown): boolean {
	return (
		error instanceof Error && 'code' in error && error.code === 'ENOENT'
	);
}

/**
 * Load config from disk, merging with defaults.
 * Returns DEFAULT_CONFIG if no config file exists.
 */
export async function loadConfig(projectRoot: string): Promise<HybridConfig> {
	const configPath = getConfigPath(projectRoot);

	let content: string;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch (error) {
		if (isNotFound(error)) return DEFAULT_CONFIG;
		throw error;
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Config file ${configPath} is not valid JSON`, [
			message,
		]);
	}

	return resolveConfig(raw);
}

/**
 * Save config to disk.
 * Creates the data directory if it doesn't exist.
 */
export async function saveConfig(
	projectRoot: string,
	config: HybridConfig,
): Promise<void> {
	const configPath = getConfigPath(projectRoot);
	await fs.mkdir(path.dirname(configPath), {recursive: true});
	await fs.writeFile(configPath, JSON.stringify(config, null, '\t') + '\n');
}

/**
 * Check if a config file exists.
 */
export async function configExists(projectRoot: string): Promise<boolean> {
	try {
		await fs.access(getConfigPath(projectRoot));
		return true;
	} catch {
		return false;
	}
}
