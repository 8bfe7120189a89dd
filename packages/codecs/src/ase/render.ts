/**
 * Frame compositor
 */

import {
	type Color,
	TRANSPARENT,
	colorFromBytes,
	combineColors,
	scaleAlpha,
	writeColor,
} from '@asekit/composite'
import { type AnimationFrame, AseError, type ImageData, createImageData } from '@asekit/core'
import { bytesPerPixel } from './cel'
import { type AseDocument, AseLayerType, type AseRenderOptions } from './types'

/**
 * Composite one frame of a document into dest, with the canvas origin at
 * (x, y). Only the overlap of each cel, the canvas and dest is touched, so
 * several frames can be packed into one atlas image.
 */
export function renderFrame(
	doc: AseDocument,
	frameIndex: number,
	dest: ImageData,
	options: AseRenderOptions = {}
): void {
	const { x: destX = 0, y: destY = 0 } = options

	const frame = doc.frames[frameIndex]
	if (!Number.isInteger(frameIndex) || frame === undefined) {
		throw new AseError(
			'FRAME_INDEX_OUT_OF_RANGE',
			`Frame ${frameIndex} out of range (${doc.frames.length} frames)`
		)
	}

	if (doc.colorDepth === 16) {
		throw new AseError('UNSUPPORTED_COLOR_DEPTH', 'ASE grayscale (16 bpp) rendering not supported')
	}

	if (dest.data.length < dest.width * dest.height * 4) {
		throw new AseError(
			'OUT_OF_BOUNDS',
			`Destination holds ${dest.data.length} bytes, ${dest.width}x${dest.height} needs ${dest.width * dest.height * 4}`
		)
	}

	const indexed = doc.colorDepth === 8
	const bpp = bytesPerPixel(doc.colorDepth)
	const { colors } = doc.palette
	let firstLayer = true

	for (let layerIndex = 0; layerIndex < doc.layers.length; layerIndex++) {
		const layer = doc.layers[layerIndex]!
		if (layer.opacity === 0 || !layer.visible || layer.type === AseLayerType.GROUP) continue

		const cel = frame.cels[layerIndex]
		if (!cel?.data || cel.width === 0) continue

		const pixels = cel.data
		const pitch = cel.width * bpp
		const rows = Math.min(cel.height, Math.floor(pixels.length / pitch))
		const opacity = layer.opacity / 255

		// Canvas-space intersection of cel, canvas and destination
		const x0 = Math.max(cel.x, 0, -destX)
		const x1 = Math.min(cel.x + cel.width, doc.width, dest.width - destX)
		const y0 = Math.max(cel.y, 0, -destY)
		const y1 = Math.min(cel.y + rows, doc.height, dest.height - destY)

		for (let y = y0; y < y1; y++) {
			const srcRow = (y - cel.y) * pitch
			const destRow = (destY + y) * dest.width + destX

			for (let x = x0; x < x1; x++) {
				const srcIdx = srcRow + (x - cel.x) * bpp
				const destIdx = (destRow + x) * 4

				let src: Color
				if (indexed) {
					const index = pixels[srcIdx]!
					src = index === doc.transparentIndex ? TRANSPARENT : (colors[index] ?? TRANSPARENT)
				} else {
					src = colorFromBytes(pixels, srcIdx)
				}
				src = scaleAlpha(src, opacity)

				if (firstLayer || dest.data[destIdx + 3] === 0) {
					writeColor(dest.data, destIdx, src)
				} else if (src.a8 !== 0) {
					const base = colorFromBytes(dest.data, destIdx)
					writeColor(dest.data, destIdx, combineColors(src, base, layer.blendMode))
				}
			}
		}

		firstLayer = false
	}
}

/**
 * Render a frame into a new canvas-sized image
 */
export function renderFrameImage(doc: AseDocument, frameIndex: number): ImageData {
	const image = createImageData(doc.width, doc.height)
	renderFrame(doc, frameIndex, image)
	return image
}

/**
 * Render every frame with its timing
 */
export function renderAnimation(doc: AseDocument): AnimationFrame[] {
	const frames: AnimationFrame[] = []
	let timestamp = 0

	for (let i = 0; i < doc.frames.length; i++) {
		const { duration } = doc.frames[i]!
		frames.push({ image: renderFrameImage(doc, i), timestamp, duration })
		timestamp += duration
	}

	return frames
}
