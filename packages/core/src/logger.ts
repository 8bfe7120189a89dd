/**
 * Logging collaborator handed to decoders through their options.
 * Decoders never write to the console on their own.
 */
export interface Logger {
	debug(message: string): void
	warn(message: string): void
}

export const silentLogger: Logger = {
	debug() {},
	warn() {},
}

export const consoleLogger: Logger = {
	debug(message) {
		console.debug(message)
	},
	warn(message) {
		console.warn(`Warning: ${message}`)
	},
}
