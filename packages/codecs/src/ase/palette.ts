/**
 * Palette chunk decoders (legacy 0x0004 and modern 0x2019)
 */

import { type Color, TRANSPARENT, colorFromRgba8 } from '@asekit/composite'
import { AseError } from '@asekit/core'
import type { ByteCursor } from './cursor'
import { ASE_PALETTE_HEADER_SIZE, type AsePalette } from './types'

const LEGACY_PALETTE_SIZE = 256

/** Largest palette a modern palette chunk may declare */
export const MAX_PALETTE_SIZE = 65536

/** Flags (2) + RGBA (4); a named entry is longer */
const PALETTE_ENTRY_MIN_SIZE = 6

export function createPalette(size = 0): AsePalette {
	return {
		colors: new Array<Color>(size).fill(TRANSPARENT),
		names: new Array<string | undefined>(size).fill(undefined),
	}
}

/**
 * Resize in place; kept entries stay, new entries are transparent black
 */
function resizePalette(palette: AsePalette, size: number): void {
	const previous = palette.colors.length
	palette.colors.length = size
	palette.names.length = size
	for (let i = previous; i < size; i++) {
		palette.colors[i] = TRANSPARENT
		palette.names[i] = undefined
	}
}

/**
 * Legacy palette: packets of (start index, count, count * RGB)
 */
export function readLegacyPalette(cursor: ByteCursor, palette: AsePalette): void {
	if (palette.colors.length !== LEGACY_PALETTE_SIZE) {
		resizePalette(palette, LEGACY_PALETTE_SIZE)
	}

	const packets = cursor.readU16()
	for (let p = 0; p < packets; p++) {
		const start = cursor.readU8()
		const count = cursor.readU8() || 256

		for (let i = 0; i < count; i++) {
			const r = cursor.readU8()
			const g = cursor.readU8()
			const b = cursor.readU8()
			const index = start + i
			if (index < LEGACY_PALETTE_SIZE) {
				palette.colors[index] = colorFromRgba8(r, g, b, 255)
			}
		}
	}
}

/**
 * Modern palette: new size, then RGBA entries for [first, last]
 */
export function readModernPalette(cursor: ByteCursor, palette: AsePalette): void {
	const size = cursor.readU32()
	const first = cursor.readU32()
	const last = cursor.readU32()
	cursor.skip(ASE_PALETTE_HEADER_SIZE - 12) // reserved

	if (size > MAX_PALETTE_SIZE) {
		throw new AseError(
			'MALFORMED_CHUNK',
			`Invalid ASE: palette declares ${size} colors, limit is ${MAX_PALETTE_SIZE}`
		)
	}
	if (first > last || last >= size) {
		throw new AseError(
			'MALFORMED_CHUNK',
			`Invalid ASE: palette change range [${first}, ${last}] outside ${size} colors`
		)
	}
	const entries = last - first + 1
	if (entries * PALETTE_ENTRY_MIN_SIZE > cursor.remaining) {
		throw new AseError(
			'MALFORMED_CHUNK',
			`Invalid ASE: palette chunk holds ${cursor.remaining} bytes, too few for ${entries} colors`
		)
	}

	resizePalette(palette, size)

	for (let index = first; index <= last; index++) {
		const flags = cursor.readU16()
		const r = cursor.readU8()
		const g = cursor.readU8()
		const b = cursor.readU8()
		const a = cursor.readU8()
		palette.colors[index] = colorFromRgba8(r, g, b, a)
		palette.names[index] = flags & 1 ? cursor.readString() : undefined
	}
}
