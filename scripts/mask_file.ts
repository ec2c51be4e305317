/**
 * Mask or unmask a SQL file from the command line.
 *
 *   tsx scripts/mask_file.ts mask   <input.sql> [--mode business] [--mapping name] [--out file] [--regenerate]
 *   tsx scripts/mask_file.ts unmask <input.sql> --mapping name [--out file]
 *
 * mask extends the mapping saved under --mapping (default from config), so
 * names already handed out stay stable across files; --regenerate starts a
 * fresh one instead. unmask loads it. Output goes to stdout unless --out is
 * given.
 */

import * as fs from "fs"
import { loadConfig } from "../src/config/loadConfig.js"
import { errorMessage } from "../src/errors.js"
import { sessionOptionsFromConfig } from "../src/index.js"
import { createStderrLogger, parseLogLevel } from "../src/logger.js"
import { createMappingRepository } from "../src/mapping_repository.js"
import { MaskingSession, maskWithSavedMapping } from "../src/masking_session.js"
import { getNamingClient } from "../src/naming_client.js"
import { NAMING_MODES } from "../src/sql_types.js"
import type { NamingMode } from "../src/sql_types.js"

interface Args {
	command: "mask" | "unmask"
	input: string
	mode?: NamingMode
	mapping?: string
	out?: string
	regenerate: boolean
}

function isNamingMode(value: string): value is NamingMode {
	return NAMING_MODES.some((m) => m === value)
}

function usage(): never {
	console.error("Usage: mask_file.ts <mask|unmask> <input.sql> [--mode m] [--mapping name] [--out file] [--regenerate]")
	process.exit(1)
}

function parseArgs(): Args {
	const [command, input, ...rest] = process.argv.slice(2)
	if ((command !== "mask" && command !== "unmask") || !input) usage()

	const args: Args = { command, input, regenerate: false }
	let i = 0
	while (i < rest.length) {
		const flag = rest[i]
		if (flag === "--regenerate") {
			args.regenerate = true
			i++
			continue
		}
		const value = rest[i + 1]
		if (value === undefined) usage()
		i += 2
		switch (flag) {
			case "--mode":
				if (!isNamingMode(value)) usage()
				args.mode = value
				break
			case "--mapping":
				args.mapping = value
				break
			case "--out":
				args.out = value
				break
			default:
				usage()
		}
	}
	return args
}

async function main() {
	const args = parseArgs()
	const config = loadConfig()
	const logger = createStderrLogger(parseLogLevel(config.logging.level))
	const repository = createMappingRepository(
		{ backend: config.persistence.backend, mappingDir: config.persistence.mapping_dir, database: config.database },
		logger,
	)
	const suggest = config.naming.enabled
		? getNamingClient({
				url: config.naming.url,
				model: config.naming.model,
				apiKey: config.naming.api_key,
				timeoutMs: config.naming.timeout_ms,
				temperature: config.naming.temperature,
			}).asSuggester()
		: undefined
	const session = new MaskingSession(sessionOptionsFromConfig(config, logger, suggest))
	const mappingName = args.mapping ?? config.persistence.mapping_set
	const input = fs.readFileSync(args.input, "utf-8")

	try {
		let output: string
		if (args.command === "mask") {
			const result = await maskWithSavedMapping(session, repository, mappingName, input, {
				mode: args.mode,
				regenerate: args.regenerate,
			})
			logger.info("Masked", {
				entities: result.entities.length,
				masked_tokens: result.maskedTokens,
				mapping: mappingName,
				reused: result.reused,
			})
			output = result.sql
		} else {
			session.loadMapping(await repository.load(mappingName))
			const result = session.unmask(input)
			for (const warning of result.warnings) {
				logger.warn(warning.message, { offset: warning.offset })
			}
			logger.info("Unmasked", { replaced: result.replaced, mapping: mappingName })
			output = result.sql
		}

		if (args.out) {
			fs.writeFileSync(args.out, output.endsWith("\n") ? output : output + "\n")
		} else {
			process.stdout.write(output.endsWith("\n") ? output : output + "\n")
		}
	} finally {
		await repository.close()
	}
}

main().catch((error) => {
	console.error(`[ERROR] ${errorMessage(error)}`)
	process.exit(1)
})
