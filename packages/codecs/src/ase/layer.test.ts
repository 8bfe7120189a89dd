import { describe, expect, it } from 'vitest'
import { ByteCursor } from './cursor'
import { LayerTable, readLayer } from './layer'
import { makeLayer } from './test-utils'
import { ASE_LAYER_HEADER_SIZE, AseLayerType } from './types'
import { ByteWriter } from './writer'

describe('layers', () => {
	it('reads a layer chunk body', () => {
		const body = new ByteWriter()
			.u16(1 | 8 | 16)
			.u16(AseLayerType.NORMAL)
			.u16(2)
			.u16(320)
			.u16(240)
			.u16(1)
			.u8(200)
			.zeros(3)
			.string('Ink')
			.toUint8Array()

		const cursor = new ByteCursor(body)
		const layer = readLayer(cursor)

		expect(cursor.offset).toBe(ASE_LAYER_HEADER_SIZE + 2 + 3)
		expect(layer.flags).toBe(25)
		expect(layer.visible).toBe(true)
		expect(layer.editable).toBe(false)
		expect(layer.lockMovement).toBe(false)
		expect(layer.background).toBe(true)
		expect(layer.preferLinkedCels).toBe(true)
		expect(layer.type).toBe(AseLayerType.NORMAL)
		expect(layer.childLevel).toBe(2)
		expect(layer.blendMode).toBe('multiply')
		expect(layer.opacity).toBe(200)
		expect(layer.name).toBe('Ink')
	})

	it('maps unknown blend codes to normal', () => {
		const body = new ByteWriter().u16(1).zeros(8).u16(42).u8(255).zeros(3).string('').toUint8Array()
		expect(readLayer(new ByteCursor(body)).blendMode).toBe('normal')
	})

	it('doubles table capacity as layers are appended', () => {
		const table = new LayerTable()
		expect(table.capacity).toBe(2)

		const names = ['a', 'b', 'c', 'd', 'e']
		const indices = names.map((name) => table.push(makeLayer({ name })))

		expect(indices).toEqual([0, 1, 2, 3, 4])
		expect(table.length).toBe(5)
		expect(table.capacity).toBe(8)
		expect(table.get(2)?.name).toBe('c')
		expect(table.get(5)).toBeUndefined()
		expect(table.toArray().map((l) => l.name)).toEqual(names)
	})
})
