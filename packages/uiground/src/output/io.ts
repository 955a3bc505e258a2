type OutputOptions = {
	json?: boolean
	quiet?: boolean
}

const ensureTrailingNewline = (value: string): string => (value.endsWith('\n') ? value : `${value}\n`)

export type Output = {
	json: boolean
	/** Machine output. Always stdout. */
	writeJson: (value: unknown) => void
	/** Raw document text (lisp, pretty JSON). Always stdout. */
	writeText: (text: string) => void
	/** Progress/summary lines. stdout, or stderr in JSON mode; dropped with --quiet. */
	writeHuman: (text: string) => void
	/** Warnings and diagnostics. Always stderr. */
	writeWarn: (text: string) => void
}

/** Output helpers that keep stdout clean for whatever the command produces. */
export const createOutput = (options: OutputOptions): Output => {
	const json = options.json === true
	const quiet = options.quiet === true

	const writeJson = (value: unknown): void => {
		process.stdout.write(`${JSON.stringify(value, null, 2)}\n`)
	}

	const writeText = (text: string): void => {
		process.stdout.write(ensureTrailingNewline(text))
	}

	const writeHuman = (text: string): void => {
		if (quiet) {
			return
		}
		const line = ensureTrailingNewline(text)
		if (json) {
			process.stderr.write(line)
		} else {
			process.stdout.write(line)
		}
	}

	const writeWarn = (text: string): void => {
		process.stderr.write(ensureTrailingNewline(text))
	}

	return { json, writeJson, writeText, writeHuman, writeWarn }
}
