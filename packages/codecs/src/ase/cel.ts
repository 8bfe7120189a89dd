/**
 * Cel chunk decoder
 */

import type { Logger } from '@asekit/core'
import type { ByteCursor } from './cursor'
import { inflateCel } from './inflate'
import { ASE_CEL_HEADER_SIZE, type AseCel, AseCelType, type AseColorDepth } from './types'

/**
 * Bytes per pixel in cel payloads
 */
export function bytesPerPixel(colorDepth: AseColorDepth): number {
	return colorDepth / 8
}

export function readCel(cursor: ByteCursor, colorDepth: AseColorDepth, logger: Logger): AseCel {
	const layerIndex = cursor.readU16()
	const x = cursor.readI16()
	const y = cursor.readI16()
	const opacity = cursor.readU8()
	const type = cursor.readU16() as AseCelType
	cursor.skip(ASE_CEL_HEADER_SIZE - 9) // z-index and reserved

	const cel: AseCel = { layerIndex, x, y, opacity, type, width: 0, height: 0, data: null }

	switch (type) {
		case AseCelType.RAW: {
			cel.width = cursor.readU16()
			cel.height = cursor.readU16()
			cel.data = cursor.readBytes(cursor.remaining)
			break
		}

		case AseCelType.LINKED: {
			// Recorded, not resolved
			cel.linkedFrame = cursor.readU16()
			logger.debug(`  linked cel on layer ${layerIndex} -> frame ${cel.linkedFrame} (not resolved)`)
			break
		}

		case AseCelType.COMPRESSED: {
			cel.width = cursor.readU16()
			cel.height = cursor.readU16()
			const expected = cel.width * cel.height * bytesPerPixel(colorDepth)
			// Read at most one byte past the cel size
			const data = inflateCel(cursor.readBytes(cursor.remaining), expected + 1)

			cel.data = data.length > expected ? data.slice(0, expected) : data
			if (data.length > expected) {
				logger.warn(`cel on layer ${layerIndex} inflated past ${expected} bytes, extra data dropped`)
			} else if (data.length < expected) {
				logger.warn(`cel on layer ${layerIndex} inflated to ${data.length} bytes, expected ${expected}`)
			}
			break
		}

		default:
			logger.warn(`cel on layer ${layerIndex} has unknown type ${type}, payload skipped`)
	}

	return cel
}
