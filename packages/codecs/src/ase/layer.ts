/**
 * Layer chunk decoder and the growing layer table
 */

import { blendModeFromCode } from '@asekit/composite'
import type { ByteCursor } from './cursor'
import { ASE_LAYER_HEADER_SIZE, type AseLayer, AseLayerFlag, type AseLayerType } from './types'

/**
 * Append-only layer storage; capacity doubles when full
 */
export class LayerTable {
	private items: (AseLayer | undefined)[]
	private count = 0

	constructor(initialCapacity = 2) {
		this.items = new Array<AseLayer | undefined>(Math.max(1, initialCapacity))
	}

	get length(): number {
		return this.count
	}

	get capacity(): number {
		return this.items.length
	}

	push(layer: AseLayer): number {
		if (this.count === this.items.length) {
			const grown = new Array<AseLayer | undefined>(this.items.length * 2)
			for (let i = 0; i < this.count; i++) grown[i] = this.items[i]
			this.items = grown
		}
		this.items[this.count] = layer
		return this.count++
	}

	get(index: number): AseLayer | undefined {
		return index < this.count ? this.items[index] : undefined
	}

	toArray(): AseLayer[] {
		const layers: AseLayer[] = []
		for (let i = 0; i < this.count; i++) {
			const layer = this.items[i]
			if (layer) layers.push(layer)
		}
		return layers
	}
}

export function readLayer(cursor: ByteCursor): AseLayer {
	const flags = cursor.readU16()
	const type = cursor.readU16() as AseLayerType
	const childLevel = cursor.readU16()
	cursor.skip(4) // default width/height, ignored
	const blendMode = blendModeFromCode(cursor.readU16())
	const opacity = cursor.readU8()
	cursor.skip(ASE_LAYER_HEADER_SIZE - 13)
	const name = cursor.readString()

	return {
		flags,
		visible: (flags & AseLayerFlag.VISIBLE) !== 0,
		editable: (flags & AseLayerFlag.EDITABLE) !== 0,
		lockMovement: (flags & AseLayerFlag.LOCK_MOVEMENT) !== 0,
		background: (flags & AseLayerFlag.BACKGROUND) !== 0,
		preferLinkedCels: (flags & AseLayerFlag.PREFER_LINKED_CELS) !== 0,
		type,
		childLevel,
		blendMode,
		opacity,
		name,
	}
}
