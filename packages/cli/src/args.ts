/**
 * Command line argument parsing
 */

export interface CliOptions {
	/** Frame to render (default 0) */
	frame?: number
	/** Render every frame to its own file */
	all?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean

	// Commands
	info?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	inputs: string[]
	options: CliOptions
}

function parseFrameIndex(value: string | undefined): number {
	const frame = Number(value)
	if (value === undefined || value === '' || !Number.isInteger(frame) || frame < 0) {
		throw new Error(`--frame expects a frame index, got ${value ?? 'nothing'}`)
	}
	return frame
}

export function parseArgs(args: string[]): ParsedArgs {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--info' || arg === '-i') {
			options.info = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet' || arg === '-q') {
			options.quiet = true
		} else if (arg === '--all' || arg === '-a') {
			options.all = true
		} else if (arg === '--frame' || arg === '-f') {
			options.frame = parseFrameIndex(args[++i])
		} else if (arg.startsWith('--frame=')) {
			options.frame = parseFrameIndex(arg.slice('--frame='.length))
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}
