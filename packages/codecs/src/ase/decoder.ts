/**
 * Aseprite decoder
 * Parses the container into an AseDocument in a single pass
 */

import { AseError, type ImageData, silentLogger } from '@asekit/core'
import { type FrameCels, type ParserState, readChunk } from './chunk'
import { ByteCursor } from './cursor'
import { LayerTable } from './layer'
import { createPalette } from './palette'
import { renderFrameImage } from './render'
import {
	ASE_FRAME_HEADER_SIZE,
	ASE_FRAME_MAGIC,
	ASE_HEADER_SIZE,
	ASE_MAGIC,
	type AseColorDepth,
	type AseDocument,
	type AseFrame,
	type AseHeader,
	type AseInfo,
	type AseParseOptions,
} from './types'

interface FrameHeader {
	/** Bytes in the frame, header included */
	size: number
	chunkCount: number
	duration: number
}

/**
 * Check if data is an Aseprite file
 */
export function isAse(data: Uint8Array): boolean {
	if (data.length < ASE_HEADER_SIZE) return false
	return data[4] === (ASE_MAGIC & 0xff) && data[5] === ASE_MAGIC >> 8
}

function isColorDepth(depth: number): depth is AseColorDepth {
	return depth === 8 || depth === 16 || depth === 32
}

function readHeader(cursor: ByteCursor): AseHeader {
	const fileSize = cursor.readU32()
	const magic = cursor.readU16()
	if (magic !== ASE_MAGIC) {
		throw new AseError('INVALID_SIGNATURE', 'Invalid ASE: bad magic number')
	}

	const frameCount = cursor.readU16()
	const width = cursor.readU16()
	const height = cursor.readU16()
	const depth = cursor.readU16()
	if (!isColorDepth(depth)) {
		throw new AseError('UNSUPPORTED_COLOR_DEPTH', `ASE color depth ${depth} not supported`)
	}

	const flags = cursor.readU32()
	const speed = cursor.readU16()
	cursor.skip(8)
	const transparentIndex = cursor.readU8()
	cursor.skip(3)
	const numberOfColors = cursor.readU16()
	const pixelWidth = cursor.readU8()
	const pixelHeight = cursor.readU8()
	cursor.skip(ASE_HEADER_SIZE - 36) // grid and reserved

	return {
		fileSize,
		magic,
		frameCount,
		width,
		height,
		colorDepth: depth,
		flags,
		speed,
		transparentIndex,
		numberOfColors,
		pixelWidth,
		pixelHeight,
	}
}

function readFrameHeader(cursor: ByteCursor, frameIndex: number): FrameHeader {
	const size = cursor.readU32()
	const magic = cursor.readU16()
	if (magic !== ASE_FRAME_MAGIC) {
		throw new AseError('INVALID_SIGNATURE', `Invalid ASE: bad magic number in frame ${frameIndex}`)
	}
	if (size < ASE_FRAME_HEADER_SIZE) {
		throw new AseError('MALFORMED_CHUNK', `Invalid ASE: frame ${frameIndex} declares ${size} bytes`)
	}

	const oldChunkCount = cursor.readU16()
	const duration = cursor.readU16()
	cursor.skip(2)
	const newChunkCount = cursor.readU32()

	return {
		size,
		chunkCount: newChunkCount === 0 ? oldChunkCount : newChunkCount,
		duration,
	}
}

/**
 * Parse the file header
 */
export function parseAseHeader(data: Uint8Array): AseHeader {
	return readHeader(new ByteCursor(data))
}

/**
 * Parse sprite info from the header and frame headers, without decoding chunks
 */
export function parseAseInfo(data: Uint8Array): AseInfo {
	const cursor = new ByteCursor(data)
	const header = readHeader(cursor)

	const durations: number[] = []
	for (let i = 0; i < header.frameCount; i++) {
		const frame = readFrameHeader(cursor, i)
		durations.push(frame.duration)
		cursor.skip(frame.size - ASE_FRAME_HEADER_SIZE)
	}

	return {
		width: header.width,
		height: header.height,
		colorDepth: header.colorDepth,
		frameCount: header.frameCount,
		durations,
		duration: durations.reduce((sum, d) => sum + d, 0),
	}
}

/**
 * Parse an Aseprite file. Every payload is copied; the input is not
 * referenced by the result.
 */
export function parseAse(data: Uint8Array, options: AseParseOptions = {}): AseDocument {
	const logger = options.logger ?? silentLogger
	const cursor = new ByteCursor(data)
	const header = readHeader(cursor)

	logger.debug(
		`ASE ${header.width}x${header.height}, ${header.colorDepth} bpp, ${header.frameCount} frame(s)`
	)

	const state: ParserState = {
		colorDepth: header.colorDepth,
		palette: createPalette(),
		layers: new LayerTable(),
		usesModernPalette: false,
		logger,
	}

	const frames: AseFrame[] = []

	for (let frameIndex = 0; frameIndex < header.frameCount; frameIndex++) {
		const frameHeader = readFrameHeader(cursor, frameIndex)
		const body = cursor.slice(frameHeader.size - ASE_FRAME_HEADER_SIZE)

		logger.debug(
			`frame ${frameIndex}: ${frameHeader.chunkCount} chunk(s), ${frameHeader.duration} ms`
		)

		const slots: FrameCels = { cels: null }
		for (let i = 0; i < frameHeader.chunkCount; i++) {
			readChunk(body, slots, state)
		}

		frames.push({ duration: frameHeader.duration, cels: slots.cels ?? [] })
	}

	return {
		header,
		width: header.width,
		height: header.height,
		colorDepth: header.colorDepth,
		transparentIndex: header.transparentIndex,
		frames,
		palette: state.palette,
		layers: state.layers.toArray(),
	}
}

/**
 * Decode a frame of an Aseprite file to ImageData (layers composited)
 */
export function decodeAse(data: Uint8Array, frameIndex = 0): ImageData {
	return renderFrameImage(parseAse(data), frameIndex)
}
