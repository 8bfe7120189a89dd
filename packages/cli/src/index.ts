#!/usr/bin/env tsx
/**
 * asekit CLI - render Aseprite sprites to PNG
 */

import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs'
import { basename, dirname, extname, join, resolve } from 'node:path'
import { encodePng, isAse, parseAse, renderAnimation, renderFrameImage, type AseDocument } from '@asekit/codecs'
import { consoleLogger, silentLogger } from '@asekit/core'
import { type CliOptions, parseArgs } from './args'
import { describeDocument, formatBytes } from './info'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const VERSION = '0.1.0'

const HELP = `
asekit - Aseprite sprite renderer

USAGE:
  asekit <input.ase> [output.png]     Render a frame to PNG
  asekit <input.ase> --all [out.png]  Render every frame (out-0.png, out-1.png, ...)
  asekit --info <input.ase>           Show canvas, frames, layers and palette

OPTIONS:
  -f, --frame <n>       Frame to render (default 0)
  -a, --all             Render all frames
  -i, --info            Show sprite info
  -v, --verbose         Log every chunk while parsing
  -q, --quiet           Suppress output
  -h, --help            Show this help
  -V, --version         Show version

EXAMPLES:
  asekit hero.aseprite                     # hero.png from frame 0
  asekit hero.aseprite walk.png -f 3       # Frame 3 to walk.png
  asekit hero.aseprite --all out/hero.png  # out/hero-0.png, out/hero-1.png, ...
`

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function readSprite(input: string, options: CliOptions): { doc: AseDocument; size: number } {
	if (!existsSync(input)) {
		throw new Error(`File not found: ${input}`)
	}

	const data = new Uint8Array(readFileSync(input))
	if (!isAse(data)) {
		throw new Error(`Not an Aseprite file: ${input}`)
	}

	const logger = options.verbose && !options.quiet ? consoleLogger : silentLogger
	return { doc: parseAse(data, { logger }), size: data.length }
}

function defaultOutput(input: string): string {
	return join(dirname(input), `${basename(input, extname(input))}.png`)
}

function frameOutput(output: string, frameIndex: number): string {
	const ext = extname(output) || '.png'
	return join(dirname(output), `${basename(output, extname(output))}-${frameIndex}${ext}`)
}

function writeOutput(path: string, data: Uint8Array): void {
	const outDir = dirname(path)
	if (!existsSync(outDir)) {
		mkdirSync(outDir, { recursive: true })
	}
	writeFileSync(path, data)
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function showInfo(input: string, options: CliOptions): void {
	const { doc, size } = readSprite(input, options)

	console.log(`\nSource: ${input}`)
	for (const line of describeDocument(doc, size)) {
		console.log(line)
	}
	console.log()
}

function render(input: string, output: string, options: CliOptions): void {
	const { doc } = readSprite(input, options)

	if (options.all) {
		for (const [i, frame] of renderAnimation(doc).entries()) {
			const path = frameOutput(output, i)
			writeOutput(path, encodePng(frame.image))
			if (!options.quiet) {
				console.log(`${basename(input)} [${i}] → ${path}`)
			}
		}
		return
	}

	const frameIndex = options.frame ?? 0
	writeOutput(output, encodePng(renderFrameImage(doc, frameIndex)))

	if (!options.quiet) {
		console.log(`${basename(input)} [${frameIndex}] → ${basename(output)}`)
		if (options.verbose) {
			console.log(`       Size: ${formatBytes(statSync(output).size)}`)
		}
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

function main(): void {
	const { inputs, options } = parseArgs(process.argv.slice(2))

	if (options.help || (inputs.length === 0 && !options.version)) {
		console.log(HELP)
		return
	}

	if (options.version) {
		console.log(`asekit v${VERSION}`)
		return
	}

	if (options.info) {
		for (const input of inputs) {
			showInfo(resolve(input), options)
		}
		return
	}

	const input = resolve(inputs[0]!)
	const output = resolve(inputs[1] ?? defaultOutput(input))
	render(input, output, options)
}

try {
	main()
} catch (err) {
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
	process.exit(1)
}
