import { spawn, type SpawnOptions } from 'node:child_process'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

export const BIN_PATH = fileURLToPath(new URL('../../packages/uiground/src/bin.ts', import.meta.url))
const TSX_LOADER = import.meta.resolve('tsx')

export interface CommandResult {
	stdout: string
	stderr: string
}

export interface CommandResultWithExit extends CommandResult {
	code: number | null
}

export type CommandOptions = SpawnOptions & {
	/** Written to the child's stdin, which is then closed. */
	input?: string
}

export async function runCommandWithExit(cmd: string, args: string[], options: CommandOptions = {}): Promise<CommandResultWithExit> {
	const { input, ...spawnOptions } = options
	return new Promise((resolve, reject) => {
		const proc = spawn(cmd, args, { stdio: 'pipe', ...spawnOptions })
		let stdout = ''
		let stderr = ''
		proc.stdout?.on('data', (data) => {
			stdout += data
		})
		proc.stderr?.on('data', (data) => {
			stderr += data
		})
		proc.on('close', (code) => {
			resolve({ stdout, stderr, code })
		})
		proc.on('error', reject)
		proc.stdin?.end(input ?? '')
	})
}

export async function runCommand(cmd: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
	const result = await runCommandWithExit(cmd, args, options)
	if (result.code !== 0) {
		throw new Error(`Command ${cmd} ${args.join(' ')} failed with code ${result.code}\nStdout: ${result.stdout}\nStderr: ${result.stderr}`)
	}
	return { stdout: result.stdout, stderr: result.stderr }
}

/** Run the CLI from its TypeScript sources. */
export const runCli = (args: string[], options: CommandOptions = {}): Promise<CommandResultWithExit> =>
	runCommandWithExit(process.execPath, ['--import', TSX_LOADER, BIN_PATH, ...args], options)

export const makeTempDir = (prefix: string): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), prefix))
