/**
 * Configuration File Support
 *
 * Loads engine configuration from .ragweaverc (JSON format).
 *
 * Configuration is merged from (in order of precedence, highest first):
 * 1. Explicit overrides passed to loadConfig()
 * 2. .ragweaverc in current directory
 * 3. .ragweaverc in home directory
 * 4. Built-in defaults
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { configLogger } from "./logger.js";

const CONFIG_FILENAME = ".ragweaverc";

/**
 * Default worker pool size: at least 4, or one per CPU
 */
export function defaultParallelism(): number {
	return Math.max(4, os.cpus().length);
}

export const RetrySettingsSchema = z.object({
	maxAttempts: z.number().int().min(1).max(20).default(5),
	initialDelayMs: z.number().int().min(0).default(1000),
	multiplier: z.number().min(1).default(2),
	maxDelayMs: z.number().int().min(0).default(30000),
	jitterPercent: z.number().min(0).max(100).default(10),
});

export const RerankWeightsSchema = z
	.object({
		vector: z.number().min(0).max(1).default(0.5),
		keyword: z.number().min(0).max(1).default(0.4),
		metadata: z.number().min(0).max(1).default(0.1),
	})
	.refine((w) => Math.abs(w.vector + w.keyword + w.metadata - 1) < 1e-6, {
		message: "rerank weights must sum to 1",
	});

export const RagConfigSchema = z
	.object({
		// Chunking (estimated tokens, 1 token ~ 4 characters)
		chunkSize: z.number().int().positive().default(512),
		chunkOverlap: z.number().int().min(0).default(128),
		minChunk: z.number().int().positive().default(100),
		maxChunk: z.number().int().positive().default(800),

		// Batch embedding
		batchStrategy: z.enum(["fixed", "token"]).default("token"),
		batchSize: z.number().int().positive().default(100),
		maxTokensPerBatch: z.number().int().positive().default(8000),
		parallelism: z.number().int().positive().default(defaultParallelism),
		delayBetweenBatchesMs: z.number().int().min(0).default(100),
		rateLimitPerMinute: z.number().int().positive().default(50),
		retry: RetrySettingsSchema.default({}),
		poolShutdownTimeoutMs: z.number().int().min(0).default(60000),

		// Sparse index
		bm25K1: z.number().min(0).default(1.2),
		bm25B: z.number().min(0).max(1).default(0.75),

		// Hybrid retrieval
		rrfK: z.number().min(0).default(60),
		rerankWeights: RerankWeightsSchema.default({}),
		topK: z.number().int().positive().default(5),
		similarityThreshold: z.number().min(0).max(1).default(0.6),
		legFailurePolicy: z.enum(["abort", "degrade"]).default("abort"),
		sparseOnlyResolution: z.enum(["fetch", "drop"]).default("fetch"),
		legTimeoutMs: z.number().int().min(0).default(10000),
		rerankTimeoutMs: z.number().int().min(0).default(5000),

		// Storage
		stateDir: z.string().min(1).default(".ragweave"),
		embeddingModel: z.string().min(1).default("text-embedding-3-small"),
		embeddingDimensions: z.number().int().positive().default(1536),
		/** Falls back to OPENAI_API_KEY */
		apiKey: z.string().min(1).optional(),
	})
	.superRefine((cfg, ctx) => {
		if (cfg.minChunk > cfg.chunkSize) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["minChunk"], message: "minChunk must not exceed chunkSize" });
		}
		if (cfg.chunkSize > cfg.maxChunk) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["maxChunk"], message: "chunkSize must not exceed maxChunk" });
		}
		if (cfg.chunkOverlap >= cfg.chunkSize) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["chunkOverlap"],
				message: "chunkOverlap must be smaller than chunkSize",
			});
		}
	});

/**
 * Fully resolved configuration
 */
export type RagConfig = z.infer<typeof RagConfigSchema>;

/**
 * Partial configuration as written in .ragweaverc or passed as overrides
 */
export type RagConfigInput = z.input<typeof RagConfigSchema>;

export type RetrySettings = RagConfig["retry"];
export type RerankWeights = RagConfig["rerankWeights"];

/**
 * Cached configuration to avoid repeated file reads
 */
let cachedFileConfig: Record<string, unknown> | null = null;
let configLoadedFrom: string | null = null;

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Try to read, parse and validate a config file. Invalid files are reported
 * and ignored.
 */
function tryReadConfig(filePath: string): Record<string, unknown> | null {
	try {
		if (!fs.existsSync(filePath)) {
			return null;
		}

		const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
		if (!isPlainObject(parsed)) {
			configLogger.warn({ filePath }, "Config file is not a JSON object, ignoring");
			return null;
		}

		const result = RagConfigSchema.safeParse(parsed);
		if (!result.success) {
			configLogger.warn({ filePath, issues: formatIssues(result.error) }, "Invalid config values, ignoring file");
			return null;
		}

		return parsed;
	} catch (error) {
		configLogger.warn({ filePath, error: String(error) }, "Failed to read config file");
		return null;
	}
}

function readFileConfig(forceReload: boolean): Record<string, unknown> {
	if (cachedFileConfig && !forceReload) {
		return cachedFileConfig;
	}

	let config: Record<string, unknown> = {};
	configLoadedFrom = null;

	// Home directory first (lower precedence)
	const homeConfigPath = path.join(os.homedir(), CONFIG_FILENAME);
	const homeConfig = tryReadConfig(homeConfigPath);
	if (homeConfig) {
		config = { ...config, ...homeConfig };
		configLoadedFrom = homeConfigPath;
	}

	// Current directory (higher precedence)
	const cwdConfigPath = path.join(process.cwd(), CONFIG_FILENAME);
	const cwdConfig = tryReadConfig(cwdConfigPath);
	if (cwdConfig) {
		config = { ...config, ...cwdConfig };
		configLoadedFrom = cwdConfigPath;
	}

	cachedFileConfig = config;
	return config;
}

/**
 * Validate a configuration object against the schema, filling defaults.
 *
 * @throws {ValidationError} When a value is out of range or fields conflict
 */
export function resolveConfig(input: RagConfigInput | Record<string, unknown> = {}): RagConfig {
	const result = RagConfigSchema.safeParse(input);
	if (!result.success) {
		const issues = formatIssues(result.error);
		const field = result.error.issues[0]?.path.join(".") || "config";
		throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, field, issues);
	}
	return result.data;
}

/**
 * Load configuration from .ragweaverc files merged with overrides
 *
 * @throws {ValidationError} When the merged result is invalid
 */
export function loadConfig(overrides: RagConfigInput = {}, forceReload = false): RagConfig {
	const fileConfig = readFileConfig(forceReload);
	return resolveConfig({ ...fileConfig, ...overrides });
}

/**
 * Get the path where config was loaded from (for debugging)
 */
export function getConfigSource(): string | null {
	return configLoadedFrom;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
	cachedFileConfig = null;
	configLoadedFrom = null;
}

/**
 * Get default config values (for documentation)
 */
export function getDefaultConfig(): RagConfig {
	return resolveConfig({});
}
