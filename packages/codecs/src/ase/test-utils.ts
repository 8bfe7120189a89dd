/**
 * Builders for test sprites
 */

import { type Color, TRANSPARENT } from '@asekit/composite'
import { type AseErrorCode, isAseError } from '@asekit/core'
import {
	ASE_CHUNK_HEADER_SIZE,
	ASE_FRAME_HEADER_SIZE,
	ASE_FRAME_MAGIC,
	ASE_HEADER_SIZE,
	ASE_MAGIC,
	type AseCel,
	AseCelType,
	type AseColorDepth,
	type AseDocument,
	type AseFrame,
	type AseLayer,
	AseLayerType,
} from './types'
import { ByteWriter } from './writer'

/** Code of the AseError fn throws; 'none' if it returns, 'other' for foreign errors */
export function errorCode(fn: () => unknown): AseErrorCode | 'none' | 'other' {
	try {
		fn()
	} catch (err) {
		return isAseError(err) ? err.code : 'other'
	}
	return 'none'
}

export function makeLayer(overrides: Partial<AseLayer> = {}): AseLayer {
	return {
		flags: 3,
		visible: true,
		editable: true,
		lockMovement: false,
		background: false,
		preferLinkedCels: false,
		type: AseLayerType.NORMAL,
		childLevel: 0,
		blendMode: 'normal',
		opacity: 255,
		name: 'Layer',
		...overrides,
	}
}

export function makeCel(
	layerIndex: number,
	width: number,
	height: number,
	pixels: number[],
	overrides: Partial<AseCel> = {}
): AseCel {
	return {
		layerIndex,
		x: 0,
		y: 0,
		opacity: 255,
		type: AseCelType.RAW,
		width,
		height,
		data: new Uint8Array(pixels),
		...overrides,
	}
}

export function makeDocument(options: {
	width: number
	height: number
	colorDepth?: AseColorDepth
	transparentIndex?: number
	layers: AseLayer[]
	frames: AseFrame[]
	colors?: Color[]
}): AseDocument {
	const { width, height, colorDepth = 32, transparentIndex = 0, layers, frames, colors = [] } = options
	return {
		header: {
			fileSize: 0,
			magic: ASE_MAGIC,
			frameCount: frames.length,
			width,
			height,
			colorDepth,
			flags: 1,
			speed: 100,
			transparentIndex,
			numberOfColors: colors.length,
			pixelWidth: 1,
			pixelHeight: 1,
		},
		width,
		height,
		colorDepth,
		transparentIndex,
		frames,
		palette: { colors, names: colors.map(() => undefined) },
		layers,
	}
}

/** Palette of `size` entries, all transparent */
export function emptyColors(size: number): Color[] {
	return new Array<Color>(size).fill(TRANSPARENT)
}

/** Raw chunk bytes with a correct size field */
export function chunkBytes(type: number, body: Uint8Array | number[], size?: number): Uint8Array {
	const payload = body instanceof Uint8Array ? body : new Uint8Array(body)
	return new ByteWriter()
		.u32(size ?? payload.length + ASE_CHUNK_HEADER_SIZE)
		.u16(type)
		.bytes(payload)
		.toUint8Array()
}

/** Hand-built file: header plus frames made of raw chunks */
export function fileBytes(options: {
	width?: number
	height?: number
	colorDepth?: number
	transparentIndex?: number
	frames: { chunks: Uint8Array[]; duration?: number; size?: number; magic?: number }[]
}): Uint8Array {
	const { width = 4, height = 4, colorDepth = 8, transparentIndex = 0, frames } = options
	const out = new ByteWriter()
	out
		.u32(0)
		.u16(ASE_MAGIC)
		.u16(frames.length)
		.u16(width)
		.u16(height)
		.u16(colorDepth)
		.u32(1)
		.u16(100)
		.zeros(8)
		.u8(transparentIndex)
		.zeros(3)
		.u16(0)
		.zeros(ASE_HEADER_SIZE - 34)

	for (const frame of frames) {
		const bytes = frame.chunks.reduce((sum, c) => sum + c.length, ASE_FRAME_HEADER_SIZE)
		out
			.u32(frame.size ?? bytes)
			.u16(frame.magic ?? ASE_FRAME_MAGIC)
			.u16(frame.chunks.length)
			.u16(frame.duration ?? 100)
			.zeros(6)
		for (const c of frame.chunks) out.bytes(c)
	}

	out.patchU32(0, out.length)
	return out.toUint8Array()
}

/** Layer chunk body */
export function layerBody(options: { flags?: number; blendMode?: number; opacity?: number; name?: string } = {}): Uint8Array {
	const { flags = 1, blendMode = 0, opacity = 255, name = 'Layer' } = options
	return new ByteWriter()
		.u16(flags)
		.u16(0)
		.u16(0)
		.u16(0)
		.u16(0)
		.u16(blendMode)
		.u8(opacity)
		.zeros(3)
		.string(name)
		.toUint8Array()
}

/** Raw cel chunk body */
export function rawCelBody(layerIndex: number, width: number, height: number, pixels: number[], x = 0, y = 0): Uint8Array {
	return new ByteWriter()
		.u16(layerIndex)
		.i16(x)
		.i16(y)
		.u8(255)
		.u16(AseCelType.RAW)
		.zeros(7)
		.u16(width)
		.u16(height)
		.bytes(new Uint8Array(pixels))
		.toUint8Array()
}
