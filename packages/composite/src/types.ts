/**
 * Compositing types
 */

/** Layer blend modes, in file order (the index is the on-disk code) */
export const BLEND_MODES = [
	'normal',
	'multiply',
	'screen',
	'overlay',
	'darken',
	'lighten',
	'colorDodge',
	'colorBurn',
	'hardLight',
	'softLight',
	'difference',
	'exclusion',
	'hue',
	'saturation',
	'color',
	'luminosity',
] as const

export type BlendMode = (typeof BLEND_MODES)[number]

/**
 * A color held in both 8-bit and normalized float form.
 * Build through colorFromRgba8 / colorFromFloat only, so both forms agree.
 */
export interface Color {
	readonly r8: number
	readonly g8: number
	readonly b8: number
	readonly a8: number
	readonly r: number
	readonly g: number
	readonly b: number
	readonly a: number
}
