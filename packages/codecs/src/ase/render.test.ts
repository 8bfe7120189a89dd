import { colorFromRgba8 } from '@asekit/composite'
import { createImageData } from '@asekit/core'
import { describe, expect, it } from 'vitest'
import { renderAnimation, renderFrame, renderFrameImage } from './render'
import { errorCode, makeCel, makeDocument, makeLayer } from './test-utils'
import { AseCelType, AseLayerType } from './types'

/** Opaque gray pixel of value v */
function px(v: number): number[] {
	return [v, v, v, 255]
}

const RED = [255, 0, 0, 255]
const GREEN = [0, 255, 0, 255]
const BLUE = [0, 0, 255, 255]

function quadDocument() {
	return makeDocument({
		width: 2,
		height: 2,
		layers: [makeLayer()],
		frames: [
			{ duration: 100, cels: [makeCel(0, 2, 2, [...px(1), ...px(2), ...px(3), ...px(4)])] },
			{ duration: 40, cels: [makeCel(0, 2, 2, [...px(5), ...px(6), ...px(7), ...px(8)])] },
		],
	})
}

describe('renderFrame', () => {
	it('reproduces a single opaque layer unchanged', () => {
		const pixels = [...RED, 0, 255, 0, 128]
		const doc = makeDocument({
			width: 2,
			height: 1,
			layers: [makeLayer()],
			frames: [{ duration: 100, cels: [makeCel(0, 2, 1, pixels)] }],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual(pixels)
	})

	it('multiplies red over green to black', () => {
		const doc = makeDocument({
			width: 1,
			height: 1,
			layers: [makeLayer(), makeLayer({ blendMode: 'multiply' })],
			frames: [{ duration: 100, cels: [makeCel(0, 1, 1, GREEN), makeCel(1, 1, 1, RED)] }],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual([0, 0, 0, 255])
	})

	it('blends half-alpha red over blue', () => {
		const doc = makeDocument({
			width: 1,
			height: 1,
			layers: [makeLayer(), makeLayer()],
			frames: [{ duration: 100, cels: [makeCel(0, 1, 1, BLUE), makeCel(1, 1, 1, [255, 0, 0, 128])] }],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual([128, 0, 127, 255])
	})

	it('leaves two zero-alpha layers fully transparent', () => {
		const doc = makeDocument({
			width: 1,
			height: 1,
			layers: [makeLayer(), makeLayer({ blendMode: 'screen' })],
			frames: [{ duration: 100, cels: [makeCel(0, 1, 1, [0, 0, 0, 0]), makeCel(1, 1, 1, [0, 0, 0, 0])] }],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual([0, 0, 0, 0])
	})

	it('overwrites pixels no lower layer has drawn', () => {
		const doc = makeDocument({
			width: 2,
			height: 1,
			layers: [makeLayer(), makeLayer({ blendMode: 'multiply' })],
			frames: [
				{
					duration: 100,
					cels: [makeCel(0, 1, 1, GREEN, { x: 1 }), makeCel(1, 2, 1, [...RED, ...RED])],
				},
			],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual([...RED, 0, 0, 0, 255])
	})

	it('draws the transparent index as alpha 0 whatever its palette color', () => {
		const colors = [colorFromRgba8(0, 0, 0, 255), colorFromRgba8(255, 255, 255, 255), colorFromRgba8(0, 0, 255, 255)]
		const doc = makeDocument({
			width: 2,
			height: 1,
			colorDepth: 8,
			transparentIndex: 1,
			colors,
			layers: [makeLayer(), makeLayer()],
			frames: [{ duration: 100, cels: [makeCel(0, 1, 1, [2]), makeCel(1, 2, 1, [1, 1])] }],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual([...BLUE, 0, 0, 0, 0])
	})

	it('draws palette indices past the palette end as transparent', () => {
		const doc = makeDocument({
			width: 1,
			height: 1,
			colorDepth: 8,
			transparentIndex: 0,
			colors: [colorFromRgba8(0, 0, 0, 0), colorFromRgba8(9, 9, 9, 255)],
			layers: [makeLayer()],
			frames: [{ duration: 100, cels: [makeCel(0, 1, 1, [7])] }],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual([0, 0, 0, 0])
	})

	it('scales source alpha by layer opacity', () => {
		const doc = makeDocument({
			width: 1,
			height: 1,
			layers: [makeLayer({ opacity: 128 })],
			frames: [{ duration: 100, cels: [makeCel(0, 1, 1, [200, 100, 50, 255])] }],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual([200, 100, 50, 128])
	})

	it('skips hidden, zero-opacity and group layers', () => {
		const doc = makeDocument({
			width: 1,
			height: 1,
			layers: [
				makeLayer(),
				makeLayer({ visible: false, flags: 2 }),
				makeLayer({ opacity: 0 }),
				makeLayer({ type: AseLayerType.GROUP }),
			],
			frames: [
				{
					duration: 100,
					cels: [makeCel(0, 1, 1, px(9)), makeCel(1, 1, 1, RED), makeCel(2, 1, 1, GREEN), makeCel(3, 1, 1, BLUE)],
				},
			],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual(px(9))
	})

	it('skips linked cels', () => {
		const doc = makeDocument({
			width: 1,
			height: 1,
			layers: [makeLayer()],
			frames: [
				{
					duration: 100,
					cels: [makeCel(0, 0, 0, [], { type: AseCelType.LINKED, data: null, linkedFrame: 0 })],
				},
			],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual([0, 0, 0, 0])
	})

	it('clips cels with negative offsets to the canvas', () => {
		const doc = makeDocument({
			width: 3,
			height: 3,
			layers: [makeLayer()],
			frames: [
				{
					duration: 100,
					cels: [makeCel(0, 2, 2, [...px(1), ...px(2), ...px(3), ...px(4)], { x: -1, y: -1 })],
				},
			],
		})

		const expected = new Array<number>(36).fill(0)
		expected.splice(0, 4, ...px(4))
		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual(expected)
	})

	it('clips cels running past the canvas edge', () => {
		const doc = makeDocument({
			width: 3,
			height: 3,
			layers: [makeLayer()],
			frames: [
				{
					duration: 100,
					cels: [makeCel(0, 2, 2, [...px(1), ...px(2), ...px(3), ...px(4)], { x: 2, y: 2 })],
				},
			],
		})

		const expected = new Array<number>(36).fill(0)
		expected.splice(32, 4, ...px(1))
		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual(expected)
	})

	it('draws only the rows a short cel payload holds', () => {
		const doc = makeDocument({
			width: 1,
			height: 2,
			layers: [makeLayer()],
			frames: [{ duration: 100, cels: [makeCel(0, 1, 2, px(5))] }],
		})

		expect(Array.from(renderFrameImage(doc, 0).data)).toEqual([...px(5), 0, 0, 0, 0])
	})

	it('packs frames side by side in one destination', () => {
		const doc = quadDocument()
		const atlas = createImageData(4, 2)

		renderFrame(doc, 0, atlas, { x: 0, y: 0 })
		renderFrame(doc, 1, atlas, { x: 2, y: 0 })

		expect(Array.from(atlas.data)).toEqual([
			...px(1), ...px(2), ...px(5), ...px(6),
			...px(3), ...px(4), ...px(7), ...px(8),
		])
	})

	it('clips to the destination at positive offsets', () => {
		const dest = createImageData(2, 2)
		renderFrame(quadDocument(), 0, dest, { x: 1, y: 1 })

		expect(Array.from(dest.data)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, ...px(1)])
	})

	it('clips to the destination at negative offsets', () => {
		const dest = createImageData(2, 2)
		renderFrame(quadDocument(), 0, dest, { x: -1, y: 0 })

		expect(Array.from(dest.data)).toEqual([...px(2), 0, 0, 0, 0, ...px(4), 0, 0, 0, 0])
	})

	it('rejects frame indices outside the document', () => {
		const doc = quadDocument()
		const dest = createImageData(2, 2)

		expect(errorCode(() => renderFrame(doc, 2, dest))).toBe('FRAME_INDEX_OUT_OF_RANGE')
		expect(errorCode(() => renderFrame(doc, -1, dest))).toBe('FRAME_INDEX_OUT_OF_RANGE')
		expect(errorCode(() => renderFrame(doc, 0.5, dest))).toBe('FRAME_INDEX_OUT_OF_RANGE')
	})

	it('rejects grayscale documents', () => {
		const doc = makeDocument({
			width: 1,
			height: 1,
			colorDepth: 16,
			layers: [makeLayer()],
			frames: [{ duration: 100, cels: [makeCel(0, 1, 1, [128, 255])] }],
		})

		expect(errorCode(() => renderFrameImage(doc, 0))).toBe('UNSUPPORTED_COLOR_DEPTH')
	})

	it('rejects a destination shorter than its dimensions', () => {
		const dest = { width: 2, height: 2, data: new Uint8Array(8) }
		expect(errorCode(() => renderFrame(quadDocument(), 0, dest))).toBe('OUT_OF_BOUNDS')
	})
})

describe('renderAnimation', () => {
	it('renders every frame with its timestamp', () => {
		const frames = renderAnimation(quadDocument())

		expect(frames.map((f) => [f.timestamp, f.duration])).toEqual([
			[0, 100],
			[100, 40],
		])
		expect(Array.from(frames[1]?.image.data ?? [])).toEqual([...px(5), ...px(6), ...px(7), ...px(8)])
	})
})
