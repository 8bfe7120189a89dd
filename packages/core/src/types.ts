/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Image with timing information, one per animation frame
 */
export interface AnimationFrame {
	readonly image: ImageData
	readonly timestamp: number // milliseconds
	readonly duration: number // milliseconds
}

/**
 * Formats with a codec object
 */
export type Format = 'ase'

/**
 * Codec interface for encoding/decoding
 */
export interface Codec<T> {
	readonly format: Format
	decode(data: Uint8Array): T
	encode(input: T, options?: EncodeOptions): Uint8Array
}

/**
 * Image codec
 */
export type ImageCodec = Codec<ImageData>

/**
 * Encode options
 */
export interface EncodeOptions {
	/** Compress pixel payloads where the format allows it (default: true) */
	compress?: boolean
}

/**
 * Create empty ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}
