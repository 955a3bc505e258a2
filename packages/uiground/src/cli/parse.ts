import type { ScreenSize } from '@uiground/core'

export { formatError } from '@uiground/dataset'

/** Parse a string to a finite number, or return `undefined`. */
export const parseNumber = (value?: string): number | undefined => {
	if (!value) {
		return undefined
	}
	const parsed = Number(value)
	if (!Number.isFinite(parsed)) {
		return undefined
	}
	return parsed
}

/** Parse a string to a non-negative integer, or return `undefined`. */
export const parsePositiveInt = (value?: string, options?: { allowZero?: boolean }): number | undefined => {
	if (value === undefined) {
		return undefined
	}
	const parsed = Number(value)
	if (!Number.isFinite(parsed) || !Number.isInteger(parsed)) {
		return undefined
	}
	const min = options?.allowZero ? 0 : 1
	if (parsed < min) {
		return undefined
	}
	return parsed
}

/** Parse `1920x1080` into a screen size, or return `undefined`. */
export const parseScreenSize = (value?: string): ScreenSize | undefined => {
	if (!value) {
		return undefined
	}
	const match = /^(\d+)x(\d+)$/i.exec(value.trim())
	if (!match) {
		return undefined
	}
	const width = Number(match[1])
	const height = Number(match[2])
	if (width <= 0 || height <= 0) {
		return undefined
	}
	return { width, height }
}
