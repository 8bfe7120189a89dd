/**
 * Aseprite (.ase / .aseprite) format types
 */

import type { BlendMode, Color } from '@asekit/composite'
import type { Logger } from '@asekit/core'

/** File header magic number */
export const ASE_MAGIC = 0xa5e0

/** Frame header magic number */
export const ASE_FRAME_MAGIC = 0xf1fa

export const ASE_HEADER_SIZE = 128
export const ASE_FRAME_HEADER_SIZE = 16
export const ASE_CHUNK_HEADER_SIZE = 6
export const ASE_CEL_HEADER_SIZE = 16
export const ASE_LAYER_HEADER_SIZE = 16
export const ASE_PALETTE_HEADER_SIZE = 20

/** Chunk types */
export enum AseChunkType {
	OLD_PALETTE = 0x0004, // 8-bit legacy palette
	OLD_PALETTE_6BIT = 0x0011, // 6-bit legacy palette (ignored)
	LAYER = 0x2004,
	CEL = 0x2005,
	MASK = 0x2016, // deprecated
	PATH = 0x2017, // never used
	FRAME_TAGS = 0x2018,
	PALETTE = 0x2019,
	USER_DATA = 0x2020,
}

/** Cel types */
export enum AseCelType {
	RAW = 0,
	LINKED = 1,
	COMPRESSED = 2,
}

/** Layer types */
export enum AseLayerType {
	NORMAL = 0,
	GROUP = 1,
	TILEMAP = 2,
}

/** Layer flag bits */
export enum AseLayerFlag {
	VISIBLE = 1,
	EDITABLE = 2,
	LOCK_MOVEMENT = 4,
	BACKGROUND = 8,
	PREFER_LINKED_CELS = 16,
}

/** Bits per pixel: indexed, grayscale, RGBA */
export type AseColorDepth = 8 | 16 | 32

/** File header */
export interface AseHeader {
	/** File size in bytes */
	fileSize: number
	/** Magic number (0xA5E0) */
	magic: number
	/** Number of frames */
	frameCount: number
	/** Canvas width in pixels */
	width: number
	/** Canvas height in pixels */
	height: number
	colorDepth: AseColorDepth
	flags: number
	/** Frame speed in ms (deprecated, frames carry their own duration) */
	speed: number
	/** Palette entry drawn as transparent in indexed sprites */
	transparentIndex: number
	/** Number of colors (0 means 256 in old files) */
	numberOfColors: number
	/** Pixel aspect ratio (0 = 1:1) */
	pixelWidth: number
	pixelHeight: number
}

/** Decoded layer flags */
export interface AseLayerFlags {
	visible: boolean
	editable: boolean
	lockMovement: boolean
	background: boolean
	preferLinkedCels: boolean
}

/** Layer descriptor, shared by all frames */
export interface AseLayer extends AseLayerFlags {
	/** Raw flag bits */
	flags: number
	type: AseLayerType
	/** Nesting depth below group layers */
	childLevel: number
	blendMode: BlendMode
	/** 0-255 */
	opacity: number
	name: string
}

/** Pixel content of one layer in one frame */
export interface AseCel {
	layerIndex: number
	/** Position on the canvas; may be negative or past the canvas edge */
	x: number
	y: number
	opacity: number
	type: AseCelType
	width: number
	height: number
	/** Row-major pixels: 1 byte (indexed), 2 bytes (grayscale) or 4 bytes (RGBA) each */
	data: Uint8Array | null
	/** Frame the cel links to (linked cels only, not resolved) */
	linkedFrame?: number
}

/** Animation frame */
export interface AseFrame {
	/** Frame duration in milliseconds */
	duration: number
	/** One slot per layer known when the frame's first cel was read */
	cels: (AseCel | undefined)[]
}

/** Global color table */
export interface AsePalette {
	colors: Color[]
	/** Entry names from the modern palette chunk */
	names: (string | undefined)[]
}

/** Parsed sprite */
export interface AseDocument {
	header: AseHeader
	width: number
	height: number
	colorDepth: AseColorDepth
	transparentIndex: number
	frames: AseFrame[]
	palette: AsePalette
	layers: AseLayer[]
}

/** Sprite info (from header and frame headers only) */
export interface AseInfo {
	width: number
	height: number
	colorDepth: AseColorDepth
	frameCount: number
	/** Per-frame durations in ms */
	durations: number[]
	/** Total duration in ms */
	duration: number
}

/** Parse options */
export interface AseParseOptions {
	/** Receives per-chunk debug output and dropped-data warnings */
	logger?: Logger
}

/** Render placement within the destination image */
export interface AseRenderOptions {
	/** X position of the canvas origin in the destination */
	x?: number
	/** Y position of the canvas origin in the destination */
	y?: number
}

/** Encode options */
export interface AseEncodeOptions {
	/** Store cels compressed (true), raw (false), or as each cel says (undefined) */
	compress?: boolean
	/** Write the palette as a legacy 0x0004 chunk instead of 0x2019 */
	legacyPalette?: boolean
}
