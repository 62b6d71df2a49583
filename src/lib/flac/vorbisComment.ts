/**
 * Vorbis comment payload: little-endian lengths, a vendor string,
 * then "KEY=value" entries. FLAC omits the trailing framing bit.
 */

import type { TagDict } from "@/types/metadata";
import { ByteReader, ByteWriter, utf8Length } from "./bytes";

export interface VorbisComment {
	vendor: string;
	tags: TagDict;
}

export function decodeVorbisComment(payload: Uint8Array): VorbisComment {
	const reader = new ByteReader(payload, "vorbis comment");
	const vendor = reader.utf8(reader.u32le());
	const count = reader.u32le();

	const tags: TagDict = new Map();
	for (let i = 0; i < count; i++) {
		const entry = reader.utf8(reader.u32le());
		const separator = entry.indexOf("=");
		if (separator <= 0) {
			console.warn(`[FlacCodec] Skipping malformed comment entry: ${entry}`);
			continue;
		}
		const key = entry.slice(0, separator);
		const value = entry.slice(separator + 1);
		const values = tags.get(key);
		if (values) {
			values.push(value);
		} else {
			tags.set(key, [value]);
		}
	}

	return { vendor, tags };
}

export function encodeVorbisComment(vendor: string, tags: TagDict): Uint8Array {
	const entries: string[] = [];
	for (const [key, values] of tags) {
		for (const value of values) {
			entries.push(`${key}=${value}`);
		}
	}

	const writer = new ByteWriter()
		.u32le(utf8Length(vendor))
		.text(vendor)
		.u32le(entries.length);
	for (const entry of entries) {
		writer.u32le(utf8Length(entry)).text(entry);
	}
	return writer.toBytes();
}
