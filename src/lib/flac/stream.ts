/**
 * FLAC metadata section layout
 *
 * "fLaC" followed by metadata blocks, each with a 4-byte header:
 * 1 bit last-block flag, 7 bits block type, 24 bits payload length.
 * Audio frames start right after the block carrying the last flag.
 */

import type { MetadataBlock } from "@/types/metadata";
import { ByteReader, ByteWriter, FlacFormatError } from "./bytes";

export const FLAC_MAGIC = Uint8Array.of(0x66, 0x4c, 0x61, 0x43); // "fLaC"
export const MAX_BLOCK_LENGTH = 0xffffff;

export interface ParsedStream {
	blocks: MetadataBlock[];
	/** Byte offset of the first audio frame */
	audioOffset: number;
}

export function hasFlacMagic(bytes: Uint8Array): boolean {
	return (
		bytes.byteLength >= FLAC_MAGIC.byteLength &&
		FLAC_MAGIC.every((value, i) => bytes[i] === value)
	);
}

export function parseStream(bytes: Uint8Array): ParsedStream {
	if (!hasFlacMagic(bytes)) {
		throw new FlacFormatError("Not a FLAC stream (missing fLaC marker)");
	}

	const reader = new ByteReader(bytes, "metadata section");
	reader.offset = FLAC_MAGIC.byteLength;

	const blocks: MetadataBlock[] = [];
	let last = false;
	while (!last) {
		const header = reader.u8();
		last = (header & 0x80) !== 0;
		const code = header & 0x7f;
		const length = reader.u24be();
		blocks.push({ code, payload: reader.bytesOf(length) });
	}

	return { blocks, audioOffset: reader.offset };
}

export function serializeMetadata(blocks: MetadataBlock[]): Uint8Array {
	const writer = new ByteWriter().bytes(FLAC_MAGIC);

	blocks.forEach((block, index) => {
		if (block.payload.byteLength > MAX_BLOCK_LENGTH) {
			throw new FlacFormatError(
				`Block ${index} (code ${block.code}) is ${block.payload.byteLength} bytes, over the 24-bit limit`,
			);
		}
		const lastFlag = index === blocks.length - 1 ? 0x80 : 0;
		writer
			.u8(lastFlag | (block.code & 0x7f))
			.u24be(block.payload.byteLength)
			.bytes(block.payload);
	});

	return writer.toBytes();
}

/** Bytes taken by the marker and every block header and payload. */
export function metadataLength(blocks: MetadataBlock[]): number {
	return blocks.reduce(
		(total, block) => total + 4 + block.payload.byteLength,
		FLAC_MAGIC.byteLength,
	);
}

export function buildStream(
	blocks: MetadataBlock[],
	audio: Uint8Array,
): Uint8Array {
	const metadata = serializeMetadata(blocks);
	const out = new Uint8Array(metadata.byteLength + audio.byteLength);
	out.set(metadata, 0);
	out.set(audio, metadata.byteLength);
	return out;
}
