/**
 * Minimal PNG encoder (8-bit RGBA, unfiltered rows, zlib via pako)
 */

import type { ImageData } from '@asekit/core'
import pako from 'pako'

export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10])

const COLOR_TYPE_RGBA = 6

/**
 * Write 32-bit big-endian unsigned integer
 */
function writeU32BE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >>> 24) & 0xff
	data[offset + 1] = (value >>> 16) & 0xff
	data[offset + 2] = (value >>> 8) & 0xff
	data[offset + 3] = value & 0xff
}

const crcTable: number[] = []
for (let n = 0; n < 256; n++) {
	let c = n
	for (let k = 0; k < 8; k++) {
		c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
	}
	crcTable[n] = c
}

export function crc32(data: Uint8Array, start = 0, length = data.length - start): number {
	let crc = 0xffffffff
	for (let i = start; i < start + length; i++) {
		crc = crcTable[(crc ^ data[i]!) & 0xff]! ^ (crc >>> 8)
	}
	return (crc ^ 0xffffffff) >>> 0
}

/**
 * length, type, data, CRC over type + data
 */
function createChunk(type: string, data: Uint8Array): Uint8Array {
	const chunk = new Uint8Array(12 + data.length)
	writeU32BE(chunk, 0, data.length)
	for (let i = 0; i < 4; i++) chunk[4 + i] = type.charCodeAt(i)
	chunk.set(data, 8)
	writeU32BE(chunk, 8 + data.length, crc32(chunk, 4, data.length + 4))
	return chunk
}

function createIHDR(width: number, height: number): Uint8Array {
	const data = new Uint8Array(13)
	writeU32BE(data, 0, width)
	writeU32BE(data, 4, height)
	data[8] = 8 // Bit depth
	data[9] = COLOR_TYPE_RGBA
	// compression, filter and interlace methods stay 0
	return createChunk('IHDR', data)
}

function createIDAT(image: ImageData): Uint8Array {
	const { width, height, data } = image
	const stride = width * 4
	const raw = new Uint8Array((stride + 1) * height)

	for (let y = 0; y < height; y++) {
		// Filter byte 0 (None), then the row
		raw.set(data.subarray(y * stride, (y + 1) * stride), y * (stride + 1) + 1)
	}

	return createChunk('IDAT', pako.deflate(raw))
}

/**
 * Encode ImageData to PNG
 */
export function encodePng(image: ImageData): Uint8Array {
	const parts = [
		PNG_SIGNATURE,
		createIHDR(image.width, image.height),
		createIDAT(image),
		createChunk('IEND', new Uint8Array(0)),
	]

	const output = new Uint8Array(parts.reduce((sum, p) => sum + p.length, 0))
	let offset = 0
	for (const part of parts) {
		output.set(part, offset)
		offset += part.length
	}
	return output
}
