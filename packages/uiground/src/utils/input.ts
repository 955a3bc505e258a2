import fs from 'node:fs/promises'
import path from 'node:path'
import { readJsonFile, writeJsonFile, type ReadJsonResult } from '@uiground/dataset'
import { formatError } from '../cli/parse.js'

/** Read a JSON document from a file path, or from stdin when the path is `-`. */
export const readJsonInput = async (input: string): Promise<ReadJsonResult> => {
	if (input !== '-') {
		return readJsonFile(input)
	}

	let raw = ''
	try {
		for await (const chunk of process.stdin) {
			raw += typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8')
		}
	} catch (error) {
		return { ok: false, error: { message: `stdin: ${formatError(error)}`, code: 'read' } }
	}

	try {
		return { ok: true, value: JSON.parse(raw) }
	} catch (error) {
		return { ok: false, error: { message: `stdin: invalid JSON (${formatError(error)})`, code: 'parse' } }
	}
}

export const resolveOutPath = (out: string, cwd: string = process.cwd()): string => (path.isAbsolute(out) ? out : path.resolve(cwd, out))

export const writeJsonOut = async (out: string, value: unknown): Promise<string> => {
	const target = resolveOutPath(out)
	await writeJsonFile(target, value)
	return target
}

export const writeTextOut = async (out: string, text: string): Promise<string> => {
	const target = resolveOutPath(out)
	await fs.mkdir(path.dirname(target), { recursive: true })
	await fs.writeFile(target, text.endsWith('\n') ? text : `${text}\n`, 'utf8')
	return target
}
