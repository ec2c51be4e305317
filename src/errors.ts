/**
 * Error taxonomy for the masking engine.
 *
 * Every error raised by the engine extends SqlMaskError and carries a
 * machine-readable code, a recoverable flag and optional context, so the
 * tool layer can turn it into a structured result.
 */

import type { EntityRole } from "./sql_types.js"

export type SqlMaskErrorCode = "parse" | "masking" | "naming" | "persistence" | "config"

export class SqlMaskError extends Error {
	constructor(
		public code: SqlMaskErrorCode,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "SqlMaskError"
	}
}

/**
 * Malformed SQL: unterminated string, quoted identifier or comment.
 * `offset` points at the opening delimiter.
 */
export class ParseError extends SqlMaskError {
	constructor(
		public offset: number,
		message: string,
	) {
		super("parse", `${message} at offset ${offset}`, false, { offset })
		this.name = "ParseError"
	}
}

export interface MaskingFailure {
	role: EntityRole
	original: string
	reason: string
}

/**
 * The generator could not assign a synthetic name. Aborts the whole
 * masking operation; `failures` lists every entity that could not be named.
 */
export class MaskingError extends SqlMaskError {
	public entity: { role: EntityRole; original: string }
	public reason: string
	public failures: MaskingFailure[]

	constructor(failures: MaskingFailure[]) {
		const [first] = failures
		const extra = failures.length > 1 ? ` (and ${failures.length - 1} more)` : ""
		super(
			"masking",
			`Cannot mask ${first.role} "${first.original}": ${first.reason}${extra}`,
			false,
			{ failures },
		)
		this.name = "MaskingError"
		this.entity = { role: first.role, original: first.original }
		this.reason = first.reason
		this.failures = failures
	}
}

/**
 * The semantic naming collaborator failed or timed out.
 * Always recovered by deterministic fallback.
 */
export class NamingCollaboratorError extends SqlMaskError {
	constructor(
		message: string,
		public kind: "timeout" | "unavailable" | "http" | "malformed",
		context?: Record<string, unknown>,
	) {
		super("naming", message, true, context)
		this.name = "NamingCollaboratorError"
	}
}

export class PersistenceError extends SqlMaskError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("persistence", message, true, context)
		this.name = "PersistenceError"
	}
}

export class ConfigError extends SqlMaskError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("config", message, false, context)
		this.name = "ConfigError"
	}
}

/** Render any thrown value as a message string. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
