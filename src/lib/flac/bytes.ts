export class FlacFormatError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "FlacFormatError";
	}
}

export class ByteReader {
	private view: DataView;
	offset = 0;

	constructor(
		private bytes: Uint8Array,
		private label: string,
	) {
		this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	}

	get remaining(): number {
		return this.bytes.byteLength - this.offset;
	}

	private need(count: number): void {
		if (count > this.remaining) {
			throw new FlacFormatError(
				`Unexpected end of ${this.label}: needed ${count} bytes at offset ${this.offset}, ${this.remaining} left`,
			);
		}
	}

	u8(): number {
		this.need(1);
		return this.view.getUint8(this.offset++);
	}

	u24be(): number {
		this.need(3);
		const value =
			(this.view.getUint8(this.offset) << 16) |
			(this.view.getUint8(this.offset + 1) << 8) |
			this.view.getUint8(this.offset + 2);
		this.offset += 3;
		return value;
	}

	u32be(): number {
		this.need(4);
		const value = this.view.getUint32(this.offset, false);
		this.offset += 4;
		return value;
	}

	u32le(): number {
		this.need(4);
		const value = this.view.getUint32(this.offset, true);
		this.offset += 4;
		return value;
	}

	bytesOf(count: number): Uint8Array {
		this.need(count);
		const slice = new Uint8Array(
			this.bytes.subarray(this.offset, this.offset + count),
		);
		this.offset += count;
		return slice;
	}

	utf8(count: number): string {
		return Buffer.from(this.bytesOf(count)).toString("utf8");
	}
}

export class ByteWriter {
	private chunks: Uint8Array[] = [];

	u8(value: number): this {
		this.chunks.push(Uint8Array.of(value & 0xff));
		return this;
	}

	u24be(value: number): this {
		this.chunks.push(
			Uint8Array.of((value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff),
		);
		return this;
	}

	u32be(value: number): this {
		const chunk = new Uint8Array(4);
		new DataView(chunk.buffer).setUint32(0, value, false);
		this.chunks.push(chunk);
		return this;
	}

	u32le(value: number): this {
		const chunk = new Uint8Array(4);
		new DataView(chunk.buffer).setUint32(0, value, true);
		this.chunks.push(chunk);
		return this;
	}

	bytes(value: Uint8Array): this {
		this.chunks.push(value);
		return this;
	}

	/** Writes a UTF-8 string without a length prefix. */
	text(value: string): this {
		this.chunks.push(Buffer.from(value, "utf8"));
		return this;
	}

	toBytes(): Uint8Array {
		return Uint8Array.from(Buffer.concat(this.chunks));
	}
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	return Buffer.from(a.buffer, a.byteOffset, a.byteLength).equals(
		Buffer.from(b.buffer, b.byteOffset, b.byteLength),
	);
}

export function utf8Length(value: string): number {
	return Buffer.byteLength(value, "utf8");
}
