/**
 * Chunk dispatcher
 */

import { AseError, type Logger } from '@asekit/core'
import { readCel } from './cel'
import type { ByteCursor } from './cursor'
import { type LayerTable, readLayer } from './layer'
import { readLegacyPalette, readModernPalette } from './palette'
import {
	ASE_CHUNK_HEADER_SIZE,
	type AseCel,
	AseChunkType,
	type AseColorDepth,
	type AsePalette,
} from './types'

/** State shared by all chunks of one file */
export interface ParserState {
	colorDepth: AseColorDepth
	palette: AsePalette
	layers: LayerTable
	/** Set by the first modern palette chunk; legacy chunks are ignored after it */
	usesModernPalette: boolean
	logger: Logger
}

/** Cel slots of the frame being read; null until its first cel */
export interface FrameCels {
	cels: (AseCel | undefined)[] | null
}

const CHUNK_NAMES: Record<number, string> = {
	[AseChunkType.OLD_PALETTE]: 'old palette',
	[AseChunkType.OLD_PALETTE_6BIT]: 'old palette (6-bit)',
	[AseChunkType.LAYER]: 'layer',
	[AseChunkType.CEL]: 'cel',
	[AseChunkType.MASK]: 'mask',
	[AseChunkType.PATH]: 'path',
	[AseChunkType.FRAME_TAGS]: 'frame tags',
	[AseChunkType.PALETTE]: 'palette',
	[AseChunkType.USER_DATA]: 'user data',
}

function hex(value: number): string {
	return `0x${value.toString(16).padStart(4, '0')}`
}

/**
 * Read one chunk and route its payload. The cursor always ends up at
 * chunk start + declared size, however much the handler consumed.
 */
export function readChunk(cursor: ByteCursor, frame: FrameCels, state: ParserState): void {
	const start = cursor.offset
	const size = cursor.readU32()
	const type = cursor.readU16()

	if (size < ASE_CHUNK_HEADER_SIZE || size - ASE_CHUNK_HEADER_SIZE > cursor.remaining) {
		throw new AseError(
			'MALFORMED_CHUNK',
			`Invalid ASE: chunk ${hex(type)} at frame offset ${start} declares ${size} bytes, ` +
				`${cursor.remaining + ASE_CHUNK_HEADER_SIZE} left in frame`
		)
	}

	const payload = cursor.slice(size - ASE_CHUNK_HEADER_SIZE)
	state.logger.debug(`chunk ${hex(type)} (${CHUNK_NAMES[type] ?? 'unknown'}), ${size} bytes`)

	switch (type) {
		case AseChunkType.OLD_PALETTE:
			if (!state.usesModernPalette) {
				readLegacyPalette(payload, state.palette)
			}
			break

		case AseChunkType.LAYER: {
			const layer = readLayer(payload)
			const index = state.layers.push(layer)
			state.logger.debug(
				`  layer ${index} "${layer.name}": ${layer.blendMode}, opacity ${layer.opacity}, ` +
					`${layer.visible ? 'visible' : 'hidden'}`
			)
			break
		}

		case AseChunkType.CEL: {
			if (frame.cels === null) {
				frame.cels = new Array<AseCel | undefined>(state.layers.length).fill(undefined)
			}
			const cel = readCel(payload, state.colorDepth, state.logger)
			if (cel.layerIndex < frame.cels.length) {
				frame.cels[cel.layerIndex] = cel
			} else {
				state.logger.warn(
					`cel for layer ${cel.layerIndex} dropped, frame was sized for ${frame.cels.length} layers`
				)
			}
			break
		}

		case AseChunkType.PALETTE:
			state.usesModernPalette = true
			readModernPalette(payload, state.palette)
			break

		default:
			// Skipped by size: 6-bit palette, mask, path, tags, user data, unknown
			break
	}
}
