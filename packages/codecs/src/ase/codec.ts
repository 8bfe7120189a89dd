import type { EncodeOptions, ImageCodec, ImageData } from '@asekit/core'
import { decodeAse } from './decoder'
import { createAseDocument, encodeAse } from './encoder'

/**
 * Aseprite codec implementation (first frame, layers composited)
 */
export const AseCodec: ImageCodec = {
	format: 'ase',

	decode(data: Uint8Array): ImageData {
		return decodeAse(data)
	},

	encode(image: ImageData, options?: EncodeOptions): Uint8Array {
		return encodeAse(createAseDocument(image), { compress: options?.compress ?? true })
	},
}
