/**
 * Naming Collaborator HTTP Client
 *
 * Asks an OpenAI-compatible chat completions endpoint (Ollama by default) for
 * one synthetic name per entity. Used only in semantic mode; the generator
 * falls back to deterministic names whenever this client throws.
 *
 * Responsibilities:
 * - Build the naming prompt from role, key and detected domain
 * - Timeouts, and aborting when the caller's signal fires
 * - Health checks and circuit breaker
 */

import { z } from "zod"
import { NamingCollaboratorError, errorMessage } from "./errors.js"
import type { EntityRole, NameSuggester } from "./sql_types.js"

export interface NamingClientConfig {
	/** Chat completions URL */
	url: string
	model: string
	apiKey?: string
	timeoutMs: number
	temperature: number
}

export const DEFAULT_NAMING_CLIENT_CONFIG: NamingClientConfig = {
	url: "http://localhost:11434/v1/chat/completions",
	model: "llama3.1:8b",
	timeoutMs: 5000,
	temperature: 0.2,
}

const chatCompletionSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({ content: z.string() }),
			}),
		)
		.min(1),
})

const ROLE_DESCRIPTIONS: Record<EntityRole, string> = {
	catalog: "database catalog name",
	schema: "database schema name",
	table: "table name",
	column: "column name",
	alias: "alias",
	function: "function or procedure name",
	string_value: "string value",
}

/**
 * Prompt for one replacement name. The reply must be the name only.
 */
export function buildNamingPrompt(role: EntityRole, key: string, domain: string): string {
	const kind = ROLE_DESCRIPTIONS[role]
	const shape =
		role === "string_value"
			? "Reply with a short generic replacement value of similar structure and length, without quotes."
			: "Reply with a snake_case identifier using only letters, digits and underscores, at most 63 characters."
	return [
		`Suggest an anonymized replacement for a SQL ${kind} in the ${domain} domain.`,
		`Original: ${key}`,
		"Keep the meaning recognizable but do not reuse the original words, company names or personal data.",
		shape,
		"Reply with the replacement only.",
	].join("\n")
}

/**
 * First line of a model reply, without code fences, quotes or backticks.
 */
export function extractSuggestion(content: string): string {
	const lines = content
		.replace(/```[a-z]*\n?/gi, "")
		.split("\n")
		.map((l) => l.trim())
		.filter((l) => l.length > 0)
	const first = lines[0] ?? ""
	return first.replace(/^["'`]+|["'`]+$/g, "").trim()
}

export class NamingClient {
	private readonly config: NamingClientConfig
	private healthCheckInterval?: NodeJS.Timeout
	private isHealthy: boolean = true

	constructor(config: Partial<NamingClientConfig> = {}) {
		this.config = { ...DEFAULT_NAMING_CLIENT_CONFIG, ...config }
	}

	private headers(): Record<string, string> {
		const headers: Record<string, string> = {
			"Content-Type": "application/json",
			"Accept": "application/json",
		}
		if (this.config.apiKey) headers["Authorization"] = `Bearer ${this.config.apiKey}`
		return headers
	}

	/**
	 * Ask for one synthetic name. Throws NamingCollaboratorError on any failure.
	 */
	async suggestName(role: EntityRole, key: string, domain: string, signal?: AbortSignal): Promise<string> {
		// Circuit breaker: fail fast while the endpoint is known to be down
		if (!this.isHealthy) {
			throw new NamingCollaboratorError("Naming service is unavailable", "unavailable", { url: this.config.url })
		}

		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)
		const onAbort = (): void => controller.abort()
		signal?.addEventListener("abort", onAbort, { once: true })

		try {
			if (signal?.aborted) controller.abort()

			const response = await fetch(this.config.url, {
				method: "POST",
				headers: this.headers(),
				body: JSON.stringify({
					model: this.config.model,
					temperature: this.config.temperature,
					stream: false,
					messages: [
						{ role: "system", content: "You generate anonymized names for SQL objects." },
						{ role: "user", content: buildNamingPrompt(role, key, domain) },
					],
				}),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new NamingCollaboratorError(`Naming service returned ${response.status}`, "http", {
					statusCode: response.status,
					responseBody: errorText.slice(0, 500),
				})
			}

			const parsed = chatCompletionSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new NamingCollaboratorError("Naming service returned an unexpected payload", "malformed")
			}

			const suggestion = extractSuggestion(parsed.data.choices[0].message.content)
			if (suggestion.length === 0) {
				throw new NamingCollaboratorError("Naming service returned an empty name", "malformed")
			}
			return suggestion
		} catch (error) {
			if (error instanceof NamingCollaboratorError) throw error

			if (error instanceof Error && error.name === "AbortError") {
				throw new NamingCollaboratorError(`Naming request timed out after ${this.config.timeoutMs}ms`, "timeout", {
					url: this.config.url,
				})
			}

			// Network failure: open the circuit until the next successful health check
			if (error instanceof TypeError) {
				this.isHealthy = false
				throw new NamingCollaboratorError(`Cannot connect to naming service at ${this.config.url}`, "unavailable", {
					originalError: error.message,
				})
			}

			throw new NamingCollaboratorError(`Unexpected naming error: ${errorMessage(error)}`, "malformed", {
				originalError: errorMessage(error),
			})
		} finally {
			clearTimeout(timeoutId)
			signal?.removeEventListener("abort", onAbort)
		}
	}

	/** The client as the generator's suggestion function. */
	asSuggester(): NameSuggester {
		return (role, key, domain, signal) => this.suggestName(role, key, domain, signal)
	}

	/** Models listing next to the chat completions endpoint. */
	private healthUrl(): string {
		return this.config.url.replace(/\/chat\/completions\/?$/, "/models")
	}

	/**
	 * Returns true if the naming service is reachable; updates the circuit breaker.
	 */
	async healthCheck(): Promise<boolean> {
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), 5000)
		try {
			const response = await fetch(this.healthUrl(), {
				method: "GET",
				headers: this.headers(),
				signal: controller.signal,
			})
			this.isHealthy = response.ok
			return response.ok
		} catch {
			this.isHealthy = false
			return false
		} finally {
			clearTimeout(timeoutId)
		}
	}

	/**
	 * Periodic health checks, so an open circuit closes once the service is back.
	 */
	startHealthChecks(intervalMs: number = 30000): void {
		if (this.healthCheckInterval) return

		this.healthCheckInterval = setInterval(() => {
			void this.healthCheck()
		}, intervalMs)
		this.healthCheckInterval.unref()
	}

	stopHealthChecks(): void {
		if (this.healthCheckInterval) {
			clearInterval(this.healthCheckInterval)
			this.healthCheckInterval = undefined
		}
	}

	isHealthyStatus(): boolean {
		return this.isHealthy
	}

	/** Force set health status (for testing) */
	setHealthStatus(healthy: boolean): void {
		this.isHealthy = healthy
	}
}

/**
 * Singleton instance for convenience
 */
let namingClientInstance: NamingClient | null = null

export function getNamingClient(config?: Partial<NamingClientConfig>): NamingClient {
	if (!namingClientInstance) {
		namingClientInstance = new NamingClient(config)
	}
	return namingClientInstance
}

export function resetNamingClient(): void {
	namingClientInstance?.stopHealthChecks()
	namingClientInstance = null
}
