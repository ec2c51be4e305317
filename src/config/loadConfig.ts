/**
 * Unified config loader for the masking server.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged tree is validated and defaulted by a zod schema; anything it
 * rejects raises ConfigError.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { STRING_EXCLUSION_RULES } from "../entity_classifier.js"
import { ConfigError, errorMessage } from "../errors.js"
import { NAMING_MODES } from "../sql_types.js"

// ── Schema ───────────────────────────────────────────────────────────

function isValidPattern(source: string): boolean {
	try {
		new RegExp(source)
		return true
	} catch {
		return false
	}
}

const maskingSchema = z.object({
	mode: z.enum(NAMING_MODES).default("deterministic"),
	max_attempts: z.number().int().positive().default(1000),
	string_exclusions: z.array(z.enum(STRING_EXCLUSION_RULES)).default([...STRING_EXCLUSION_RULES]),
	string_exclusion_patterns: z
		.array(z.string().refine(isValidPattern, { message: "Invalid regular expression" }))
		.default([]),
	backslash_escapes: z.boolean().default(false),
	preserve_like_wildcards: z.boolean().default(true),
})

const namingSchema = z.object({
	enabled: z.boolean().default(false),
	url: z.string().url().default("http://localhost:11434/v1/chat/completions"),
	model: z.string().min(1).default("llama3.1:8b"),
	api_key: z.string().optional(),
	timeout_ms: z.number().int().positive().default(5000),
	concurrency: z.number().int().positive().default(4),
	temperature: z.number().min(0).max(2).default(0.2),
})

const persistenceSchema = z.object({
	backend: z.enum(["file", "postgres"]).default("file"),
	mapping_dir: z.string().min(1).default("mappings"),
	mapping_set: z.string().min(1).default("default"),
})

const databaseSchema = z.object({
	host: z.string().default("localhost"),
	port: z.number().int().positive().default(5432),
	name: z.string().default("sqlmask"),
	user: z.string().default("postgres"),
	password: z.string().default(""),
})

export const sqlMaskConfigSchema = z.object({
	masking: maskingSchema.default({}),
	naming: namingSchema.default({}),
	persistence: persistenceSchema.default({}),
	database: databaseSchema.default({}),
	logging: z.object({ level: z.string().default("info") }).default({}),
})

export type SqlMaskConfig = z.infer<typeof sqlMaskConfigSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

type ConfigTree = Record<string, unknown>

function isPlainObject(value: unknown): value is ConfigTree {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function findConfigDir(start: string = process.cwd()): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = start
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): ConfigTree {
	if (!fs.existsSync(filePath)) return {}
	let loaded: unknown
	try {
		loaded = yaml.load(fs.readFileSync(filePath, "utf-8"))
	} catch (error) {
		throw new ConfigError(`Cannot parse ${filePath}: ${errorMessage(error)}`, { file: filePath })
	}
	if (loaded === undefined || loaded === null) return {}
	if (!isPlainObject(loaded)) throw new ConfigError(`${filePath} must contain a mapping`, { file: filePath })
	return loaded
}

/** Deep merge b into a (b wins on conflicts). */
export function deepMerge(a: ConfigTree, b: ConfigTree): ConfigTree {
	const result: ConfigTree = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (right === undefined) continue
		result[key] = isPlainObject(left) && isPlainObject(right) ? deepMerge(left, right) : right
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
/** Numbers parse; anything else is passed through for the schema to reject. */
function envNumber(name: string): number | string | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = Number(v)
	return v.trim() === "" || Number.isNaN(n) ? v : n
}

/** Env-var overrides as a partial config tree. */
function envOverrides(): ConfigTree {
	return {
		masking: {
			mode: env("SQLMASK_MODE"),
			max_attempts: envNumber("SQLMASK_MAX_ATTEMPTS"),
		},
		naming: {
			enabled: envBool("NAMING_ENABLED"),
			url: env("NAMING_URL"),
			model: env("NAMING_MODEL"),
			api_key: env("NAMING_API_KEY"),
			timeout_ms: envNumber("NAMING_TIMEOUT_MS"),
			concurrency: envNumber("NAMING_CONCURRENCY"),
		},
		persistence: {
			backend: env("MAPPING_BACKEND"),
			mapping_dir: env("MAPPING_DIR"),
			mapping_set: env("MAPPING_SET"),
		},
		database: {
			host: env("DB_HOST"),
			port: envNumber("DB_PORT"),
			name: env("DB_NAME"),
			user: env("DB_USER"),
			password: env("DB_PASSWORD"),
		},
		logging: {
			level: env("LOG_LEVEL"),
		},
	}
}

/**
 * Validate a raw config tree. Section trees missing from `raw` get defaults.
 */
export function parseConfig(raw: unknown): SqlMaskConfig {
	const parsed = sqlMaskConfigSchema.safeParse(raw)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
		throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues })
	}
	return parsed.data
}

/**
 * Overlay a raw partial tree (a CLI argument, say) on a loaded config.
 */
export function mergeConfig(base: SqlMaskConfig, override: unknown): SqlMaskConfig {
	if (!isPlainObject(override)) throw new ConfigError("Config override must be an object")
	return parseConfig(deepMerge(base, override))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: SqlMaskConfig | null = null

export function loadConfig(): SqlMaskConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: ConfigTree = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	_config = parseConfig(deepMerge(merged, envOverrides()))
	return _config
}

export function getConfig(): SqlMaskConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
