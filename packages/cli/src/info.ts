/**
 * Sprite summary printed by --info
 */

import { AseLayerType, type AseColorDepth, type AseDocument } from '@asekit/codecs'

const DEPTH_NAMES: Record<AseColorDepth, string> = {
	8: 'indexed',
	16: 'grayscale',
	32: 'RGBA',
}

export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

export function describeDocument(doc: AseDocument, fileSize: number): string[] {
	const total = doc.frames.reduce((sum, f) => sum + f.duration, 0)
	const lines = [
		`Size: ${formatBytes(fileSize)}`,
		`Canvas: ${doc.width} x ${doc.height}`,
		`Color depth: ${doc.colorDepth} bpp (${DEPTH_NAMES[doc.colorDepth]})`,
		`Frames: ${doc.frames.length} (${total} ms)`,
	]

	doc.frames.forEach((frame, i) => {
		const cels = frame.cels.filter((cel) => cel !== undefined).length
		lines.push(`  ${i}: ${frame.duration} ms, ${cels} cel(s)`)
	})

	lines.push(`Layers: ${doc.layers.length}`)
	doc.layers.forEach((layer, i) => {
		const kind = layer.type === AseLayerType.GROUP ? ', group' : ''
		const indent = '  '.repeat(layer.childLevel + 1)
		lines.push(
			`${indent}${i}: "${layer.name}" ${layer.blendMode}, opacity ${layer.opacity}, ` +
				`${layer.visible ? 'visible' : 'hidden'}${kind}`
		)
	})

	lines.push(`Palette: ${doc.palette.colors.length} color(s)`)
	if (doc.colorDepth === 8) {
		lines.push(`Transparent index: ${doc.transparentIndex}`)
	}

	return lines
}
