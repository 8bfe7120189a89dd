/**
 * zlib adapter for compressed cel payloads
 */

import { AseError } from '@asekit/core'
import pako from 'pako'

/** Compressed bytes fed to the inflater between output checks */
const INPUT_SLICE = 4096

/**
 * Inflate a zlib stream into a new buffer. Stops once `maxLength` bytes
 * are produced and returns only those; the rest of the stream is not read.
 */
export function inflateCel(compressed: Uint8Array, maxLength = Infinity): Uint8Array {
	const inflator = new pako.Inflate()
	const chunks: Uint8Array[] = []
	let total = 0
	let ended = false

	inflator.onData = (chunk) => {
		if (chunk instanceof Uint8Array) {
			chunks.push(chunk)
			total += chunk.length
		}
	}
	const onEnd = inflator.onEnd.bind(inflator)
	inflator.onEnd = (status) => {
		ended = true
		onEnd(status)
	}

	for (let offset = 0; offset < compressed.length && !ended && total < maxLength; offset += INPUT_SLICE) {
		const end = Math.min(offset + INPUT_SLICE, compressed.length)
		inflator.push(compressed.subarray(offset, end), end === compressed.length)

		if (inflator.err) {
			throw new AseError('DECOMPRESSION_FAILED', `Invalid ASE: cel data did not inflate (${inflator.msg})`, {
				cause: inflator.msg,
			})
		}
	}

	// A truncated stream ends without an error and without a stream end
	if (!ended && total < maxLength) {
		throw new AseError('DECOMPRESSION_FAILED', 'Invalid ASE: cel data ended before the zlib stream did')
	}

	const output = new Uint8Array(Math.min(total, maxLength))
	let pos = 0
	for (const chunk of chunks) {
		if (pos === output.length) break
		const part = chunk.subarray(0, output.length - pos)
		output.set(part, pos)
		pos += part.length
	}
	return output
}

/**
 * Deflate cel pixels into a zlib stream
 */
export function deflateCel(pixels: Uint8Array): Uint8Array {
	return pako.deflate(pixels)
}
