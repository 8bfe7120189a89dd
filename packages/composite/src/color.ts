/**
 * Dual 8-bit / float color construction
 */

import type { Color } from './types'

function clamp01(value: number): number {
	if (value < 0) return 0
	if (value > 1) return 1
	return value
}

function clampByte(value: number): number {
	if (value < 0) return 0
	if (value > 255) return 255
	return value & 0xff
}

/**
 * Create a color from 8-bit channels; the float form is derived
 */
export function colorFromRgba8(r8: number, g8: number, b8: number, a8: number): Color {
	const r = clampByte(r8)
	const g = clampByte(g8)
	const b = clampByte(b8)
	const a = clampByte(a8)
	return {
		r8: r,
		g8: g,
		b8: b,
		a8: a,
		r: r / 255,
		g: g / 255,
		b: b / 255,
		a: a / 255,
	}
}

/**
 * Create a color from normalized channels; the 8-bit form is derived (rounded)
 */
export function colorFromFloat(r: number, g: number, b: number, a: number): Color {
	const rn = clamp01(r)
	const gn = clamp01(g)
	const bn = clamp01(b)
	const an = clamp01(a)
	return {
		r8: Math.round(rn * 255),
		g8: Math.round(gn * 255),
		b8: Math.round(bn * 255),
		a8: Math.round(an * 255),
		r: rn,
		g: gn,
		b: bn,
		a: an,
	}
}

/**
 * Read 4 RGBA bytes at offset
 */
export function colorFromBytes(data: Uint8Array, offset: number): Color {
	return colorFromRgba8(data[offset] ?? 0, data[offset + 1] ?? 0, data[offset + 2] ?? 0, data[offset + 3] ?? 0)
}

/**
 * Same color with its alpha multiplied by factor (0-1)
 */
export function scaleAlpha(color: Color, factor: number): Color {
	if (factor >= 1) return color
	if (factor <= 0) return TRANSPARENT
	return colorFromFloat(color.r, color.g, color.b, color.a * factor)
}

/**
 * Write color as 4 RGBA bytes at offset
 */
export function writeColor(data: Uint8Array, offset: number, color: Color): void {
	data[offset] = color.r8
	data[offset + 1] = color.g8
	data[offset + 2] = color.b8
	data[offset + 3] = color.a8
}

export const TRANSPARENT: Color = colorFromRgba8(0, 0, 0, 0)
