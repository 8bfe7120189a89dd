/**
 * Decode and render failures
 */

export type AseErrorCode =
	| 'OUT_OF_BOUNDS'
	| 'DECOMPRESSION_FAILED'
	| 'UNSUPPORTED_COLOR_DEPTH'
	| 'FRAME_INDEX_OUT_OF_RANGE'
	| 'MALFORMED_CHUNK'
	| 'INVALID_SIGNATURE'

export class AseError extends Error {
	readonly code: AseErrorCode

	constructor(code: AseErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'AseError'
		this.code = code
	}
}

/**
 * Check if a thrown value is an AseError, optionally with a given code
 */
export function isAseError(value: unknown, code?: AseErrorCode): value is AseError {
	if (!(value instanceof AseError)) return false
	return code === undefined || value.code === code
}
