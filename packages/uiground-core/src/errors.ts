/**
 * Raised when a caller hands the core something that is not a snapshot at all
 * (e.g. a `bounds` value that is not a rectangle).
 * Data-quality problems inside a well-formed snapshot never raise; they are
 * counted in `Diagnostics` instead.
 */
export class PreconditionError extends Error {
	readonly code = 'precondition'

	constructor(message: string) {
		super(message)
		this.name = 'PreconditionError'
	}
}

export const isPreconditionError = (error: unknown): error is PreconditionError => error instanceof PreconditionError
