/**
 * Bounds-checked little-endian reader
 */

import { AseError } from '@asekit/core'

const textDecoder = new TextDecoder('utf-8')

export class ByteCursor {
	private readonly data: Uint8Array
	private readonly view: DataView
	private pos = 0

	constructor(data: Uint8Array) {
		this.data = data
		this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	}

	/** Current read position */
	get offset(): number {
		return this.pos
	}

	get length(): number {
		return this.data.length
	}

	/** Bytes left to read */
	get remaining(): number {
		return this.data.length - this.pos
	}

	private ensure(n: number): void {
		if (n < 0 || this.pos + n > this.data.length) {
			throw new AseError(
				'OUT_OF_BOUNDS',
				`Invalid ASE: truncated input (need ${n} bytes at offset ${this.pos}, ${this.remaining} left)`
			)
		}
	}

	readU8(): number {
		this.ensure(1)
		return this.view.getUint8(this.pos++)
	}

	readU16(): number {
		this.ensure(2)
		const value = this.view.getUint16(this.pos, true)
		this.pos += 2
		return value
	}

	readI16(): number {
		this.ensure(2)
		const value = this.view.getInt16(this.pos, true)
		this.pos += 2
		return value
	}

	readU32(): number {
		this.ensure(4)
		const value = this.view.getUint32(this.pos, true)
		this.pos += 4
		return value
	}

	readI32(): number {
		this.ensure(4)
		const value = this.view.getInt32(this.pos, true)
		this.pos += 4
		return value
	}

	/**
	 * Copy the next n bytes
	 */
	readBytes(n: number): Uint8Array {
		this.ensure(n)
		const bytes = this.data.slice(this.pos, this.pos + n)
		this.pos += n
		return bytes
	}

	/**
	 * Copy the next n bytes without advancing
	 */
	peekBytes(n: number): Uint8Array {
		this.ensure(n)
		return this.data.slice(this.pos, this.pos + n)
	}

	/**
	 * Length-prefixed (u16) UTF-8 string
	 */
	readString(): string {
		const length = this.readU16()
		this.ensure(length)
		const value = textDecoder.decode(this.data.subarray(this.pos, this.pos + length))
		this.pos += length
		return value
	}

	skip(n: number): void {
		this.ensure(n)
		this.pos += n
	}

	seek(offset: number): void {
		if (offset < 0 || offset > this.data.length) {
			throw new AseError(
				'OUT_OF_BOUNDS',
				`Invalid ASE: seek to ${offset} outside ${this.data.length} bytes`
			)
		}
		this.pos = offset
	}

	/**
	 * Cursor over the next n bytes; this cursor moves past them
	 */
	slice(n: number): ByteCursor {
		this.ensure(n)
		const child = new ByteCursor(this.data.subarray(this.pos, this.pos + n))
		this.pos += n
		return child
	}
}
