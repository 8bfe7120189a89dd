/**
 * Blend mode implementations
 *
 * Channels are normalized (0-1). `base` is the color already drawn,
 * `blend` the color of the layer being drawn on top of it.
 */

import { TRANSPARENT, colorFromFloat } from './color'
import { BLEND_MODES, type BlendMode, type Color } from './types'

export type BlendFunction = (base: number, blend: number) => number

/**
 * Get blend function for a given mode
 */
export function getBlendFunction(mode: BlendMode): BlendFunction {
	return blendFunctions[mode]
}

/**
 * Map an on-disk blend mode code to its mode; unknown codes draw as normal
 */
export function blendModeFromCode(code: number): BlendMode {
	return BLEND_MODES[code] ?? 'normal'
}

/**
 * On-disk code of a blend mode
 */
export function blendModeCode(mode: BlendMode): number {
	return BLEND_MODES.indexOf(mode)
}

const blendFunctions: Record<BlendMode, BlendFunction> = {
	// Normal - just replaces
	normal: (_base, blend) => blend,

	multiply: (base, blend) => base * blend,

	screen: (base, blend) => 1 - (1 - base) * (1 - blend),

	overlay: (base, blend) => {
		return base < 0.5 ? 2 * blend * base : 1 - 2 * (1 - blend) * (1 - base)
	},

	darken: (base, blend) => Math.min(base, blend),

	lighten: (base, blend) => Math.max(base, blend),

	colorDodge: (base, blend) => {
		if (blend === 1) return 1
		return Math.min(1, base / (1 - blend))
	},

	colorBurn: (base, blend) => {
		if (blend === 0) return 0
		return 1 - Math.min(1, (1 - base) / blend)
	},

	hardLight: (base, blend) => {
		return blend < 0.5 ? 2 * blend * base : 1 - 2 * (1 - blend) * (1 - base)
	},

	softLight: (base, blend) => (1 - 2 * blend) * base * base + 2 * base * blend,

	difference: (base, blend) => Math.abs(base - blend),

	exclusion: (base, blend) => 0.5 - 2 * (base - 0.5) * (blend - 0.5),

	// Component modes are not implemented; they draw like normal
	hue: (_base, blend) => blend,
	saturation: (_base, blend) => blend,
	color: (_base, blend) => blend,
	luminosity: (_base, blend) => blend,
}

/**
 * Check if blend mode is one of the HSL component modes
 */
export function isComponentBlendMode(mode: BlendMode): boolean {
	return mode === 'hue' || mode === 'saturation' || mode === 'color' || mode === 'luminosity'
}

/**
 * Composite `src` over `dest` with a blend mode (straight alpha).
 *
 * outA = srcA + destA * (1 - srcA)
 * outC = (blend(destC, srcC) * srcA + destC * destA * (1 - srcA)) / outA
 */
export function combineColors(src: Color, dest: Color, mode: BlendMode): Color {
	const outA = src.a + dest.a * (1 - src.a)
	if (outA === 0) return TRANSPARENT

	const blendFn = blendFunctions[mode]
	const destWeight = dest.a * (1 - src.a)

	const r = (blendFn(dest.r, src.r) * src.a + dest.r * destWeight) / outA
	const g = (blendFn(dest.g, src.g) * src.a + dest.g * destWeight) / outA
	const b = (blendFn(dest.b, src.b) * src.a + dest.b * destWeight) / outA

	return colorFromFloat(r, g, b, outA)
}
