import fs from 'node:fs/promises'
import path from 'node:path'

export type ReadJsonResult = { ok: true; value: unknown } | { ok: false; error: { message: string; code: 'read' | 'parse' } }

export const readJsonFile = async (filePath: string): Promise<ReadJsonResult> => {
	let raw: string
	try {
		raw = await fs.readFile(filePath, 'utf8')
	} catch (error) {
		return { ok: false, error: { message: `${filePath}: ${formatError(error)}`, code: 'read' } }
	}

	try {
		return { ok: true, value: JSON.parse(raw) }
	} catch (error) {
		return { ok: false, error: { message: `${filePath}: invalid JSON (${formatError(error)})`, code: 'parse' } }
	}
}

/** Pretty-printed with a trailing newline; parent directories are created. */
export const writeJsonFile = async (filePath: string, value: unknown): Promise<void> => {
	await fs.mkdir(path.dirname(filePath), { recursive: true })
	await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf8')
}

export const formatError = (error: unknown): string => {
	if (!error) {
		return 'unknown error'
	}
	if (error instanceof Error) {
		return error.message
	}
	return String(error)
}
