/**
 * Growable little-endian byte writer
 */

const textEncoder = new TextEncoder()

function checkRange(kind: string, value: number, min: number, max: number): void {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new RangeError(`${kind} value ${value} outside [${min}, ${max}]`)
	}
}

export class ByteWriter {
	private buffer: Uint8Array
	private view: DataView
	private pos = 0

	constructor(initialSize = 256) {
		this.buffer = new Uint8Array(Math.max(16, initialSize))
		this.view = new DataView(this.buffer.buffer)
	}

	get length(): number {
		return this.pos
	}

	private reserve(n: number): void {
		if (this.pos + n <= this.buffer.length) return
		let size = this.buffer.length * 2
		while (size < this.pos + n) size *= 2
		const grown = new Uint8Array(size)
		grown.set(this.buffer.subarray(0, this.pos))
		this.buffer = grown
		this.view = new DataView(grown.buffer)
	}

	u8(value: number): this {
		checkRange('u8', value, 0, 0xff)
		this.reserve(1)
		this.view.setUint8(this.pos, value)
		this.pos += 1
		return this
	}

	u16(value: number): this {
		checkRange('u16', value, 0, 0xffff)
		this.reserve(2)
		this.view.setUint16(this.pos, value, true)
		this.pos += 2
		return this
	}

	i16(value: number): this {
		checkRange('i16', value, -0x8000, 0x7fff)
		this.reserve(2)
		this.view.setInt16(this.pos, value, true)
		this.pos += 2
		return this
	}

	u32(value: number): this {
		checkRange('u32', value, 0, 0xffffffff)
		this.reserve(4)
		this.view.setUint32(this.pos, value, true)
		this.pos += 4
		return this
	}

	bytes(data: Uint8Array): this {
		this.reserve(data.length)
		this.buffer.set(data, this.pos)
		this.pos += data.length
		return this
	}

	zeros(n: number): this {
		this.reserve(n)
		this.buffer.fill(0, this.pos, this.pos + n)
		this.pos += n
		return this
	}

	/**
	 * Length-prefixed (u16) UTF-8 string; at most 65535 encoded bytes
	 */
	string(value: string): this {
		const encoded = textEncoder.encode(value)
		if (encoded.length > 0xffff) {
			throw new RangeError(`string of ${encoded.length} UTF-8 bytes exceeds the u16 length prefix`)
		}
		return this.u16(encoded.length).bytes(encoded)
	}

	/**
	 * Overwrite a u32 written earlier
	 */
	patchU32(offset: number, value: number): this {
		checkRange('u32', value, 0, 0xffffffff)
		this.view.setUint32(offset, value, true)
		return this
	}

	toUint8Array(): Uint8Array {
		return this.buffer.slice(0, this.pos)
	}
}
