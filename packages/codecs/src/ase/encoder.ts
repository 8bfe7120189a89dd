/**
 * Aseprite encoder
 * Writes palette and layers into the first frame, then each frame's cels
 */

import { blendModeCode } from '@asekit/composite'
import type { ImageData } from '@asekit/core'
import { deflateCel } from './inflate'
import { createPalette } from './palette'
import {
	ASE_CEL_HEADER_SIZE,
	ASE_CHUNK_HEADER_SIZE,
	ASE_FRAME_HEADER_SIZE,
	ASE_FRAME_MAGIC,
	ASE_HEADER_SIZE,
	ASE_LAYER_HEADER_SIZE,
	ASE_MAGIC,
	ASE_PALETTE_HEADER_SIZE,
	type AseCel,
	AseCelType,
	AseChunkType,
	type AseDocument,
	type AseEncodeOptions,
	AseLayerFlag,
	type AseLayer,
	AseLayerType,
	type AsePalette,
} from './types'
import { ByteWriter } from './writer'

function chunk(type: AseChunkType, body: ByteWriter): Uint8Array {
	const payload = body.toUint8Array()
	return new ByteWriter(payload.length + ASE_CHUNK_HEADER_SIZE)
		.u32(payload.length + ASE_CHUNK_HEADER_SIZE)
		.u16(type)
		.bytes(payload)
		.toUint8Array()
}

function modernPaletteChunk(palette: AsePalette): Uint8Array {
	const size = palette.colors.length
	const body = new ByteWriter()
	body.u32(size).u32(0).u32(Math.max(0, size - 1)).zeros(ASE_PALETTE_HEADER_SIZE - 12)

	for (let i = 0; i < size; i++) {
		const color = palette.colors[i]!
		const name = palette.names[i]
		body.u16(name === undefined ? 0 : 1).u8(color.r8).u8(color.g8).u8(color.b8).u8(color.a8)
		if (name !== undefined) body.string(name)
	}

	return chunk(AseChunkType.PALETTE, body)
}

function legacyPaletteChunk(palette: AsePalette): Uint8Array {
	const count = Math.min(256, palette.colors.length)
	const body = new ByteWriter()
	// One packet from index 0; a count of 0 means 256
	body.u16(1).u8(0).u8(count & 0xff)

	for (let i = 0; i < count; i++) {
		const color = palette.colors[i]!
		body.u8(color.r8).u8(color.g8).u8(color.b8)
	}

	return chunk(AseChunkType.OLD_PALETTE, body)
}

function layerChunk(layer: AseLayer): Uint8Array {
	const body = new ByteWriter()
	body
		.u16(layer.flags)
		.u16(layer.type)
		.u16(layer.childLevel)
		.u16(0)
		.u16(0)
		.u16(blendModeCode(layer.blendMode))
		.u8(layer.opacity)
		.zeros(ASE_LAYER_HEADER_SIZE - 13)
		.string(layer.name)
	return chunk(AseChunkType.LAYER, body)
}

function celChunk(cel: AseCel, compress: boolean | undefined): Uint8Array {
	let type = cel.type
	if (cel.data && compress !== undefined) {
		type = compress ? AseCelType.COMPRESSED : AseCelType.RAW
	}

	const body = new ByteWriter()
	body.u16(cel.layerIndex).i16(cel.x).i16(cel.y).u8(cel.opacity).u16(type).zeros(ASE_CEL_HEADER_SIZE - 9)

	if (type === AseCelType.LINKED) {
		body.u16(cel.linkedFrame ?? 0)
	} else {
		const pixels = cel.data ?? new Uint8Array(0)
		body.u16(cel.width).u16(cel.height)
		body.bytes(type === AseCelType.COMPRESSED ? deflateCel(pixels) : pixels)
	}

	return chunk(AseChunkType.CEL, body)
}

/**
 * Encode a document to Aseprite bytes
 */
export function encodeAse(doc: AseDocument, options: AseEncodeOptions = {}): Uint8Array {
	const out = new ByteWriter(ASE_HEADER_SIZE * 4)

	// Header (file size patched at the end)
	out
		.u32(0)
		.u16(ASE_MAGIC)
		.u16(doc.frames.length)
		.u16(doc.width)
		.u16(doc.height)
		.u16(doc.colorDepth)
		.u32(doc.header.flags)
		.u16(doc.header.speed)
		.zeros(8)
		.u8(doc.transparentIndex)
		.zeros(3)
		.u16(doc.header.numberOfColors)
		.u8(doc.header.pixelWidth)
		.u8(doc.header.pixelHeight)
		.zeros(ASE_HEADER_SIZE - 36)

	doc.frames.forEach((frame, frameIndex) => {
		const chunks: Uint8Array[] = []

		if (frameIndex === 0) {
			if (doc.palette.colors.length > 0) {
				chunks.push(
					options.legacyPalette ? legacyPaletteChunk(doc.palette) : modernPaletteChunk(doc.palette)
				)
			}
			for (const layer of doc.layers) chunks.push(layerChunk(layer))
		}

		for (const cel of frame.cels) {
			if (cel) chunks.push(celChunk(cel, options.compress))
		}

		const size = chunks.reduce((sum, c) => sum + c.length, ASE_FRAME_HEADER_SIZE)
		out
			.u32(size)
			.u16(ASE_FRAME_MAGIC)
			.u16(Math.min(chunks.length, 0xffff))
			.u16(frame.duration)
			.zeros(2)
			.u32(chunks.length)
		for (const c of chunks) out.bytes(c)
	})

	out.patchU32(0, out.length)
	return out.toUint8Array()
}

/**
 * Wrap an RGBA image as a single-layer, single-frame 32 bpp document
 */
export function createAseDocument(image: ImageData, duration = 100): AseDocument {
	const layer: AseLayer = {
		flags: AseLayerFlag.VISIBLE | AseLayerFlag.EDITABLE,
		visible: true,
		editable: true,
		lockMovement: false,
		background: false,
		preferLinkedCels: false,
		type: AseLayerType.NORMAL,
		childLevel: 0,
		blendMode: 'normal',
		opacity: 255,
		name: 'Layer 1',
	}

	const cel: AseCel = {
		layerIndex: 0,
		x: 0,
		y: 0,
		opacity: 255,
		type: AseCelType.COMPRESSED,
		width: image.width,
		height: image.height,
		data: new Uint8Array(image.data),
	}

	return {
		header: {
			fileSize: 0,
			magic: ASE_MAGIC,
			frameCount: 1,
			width: image.width,
			height: image.height,
			colorDepth: 32,
			flags: 1,
			speed: duration,
			transparentIndex: 0,
			numberOfColors: 0,
			pixelWidth: 1,
			pixelHeight: 1,
		},
		width: image.width,
		height: image.height,
		colorDepth: 32,
		transparentIndex: 0,
		frames: [{ duration, cels: [cel] }],
		palette: createPalette(1),
		layers: [layer],
	}
}
