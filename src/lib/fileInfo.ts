/**
 * Stream information view
 *
 * Decoded STREAMINFO parameters shown per file, merged across a selection
 * the same way tag rows are, plus editing of the two writable fields:
 * the Vorbis comment vendor string and the audio MD5 signature.
 */

import { runSequential } from "@/lib/batch";
import type { FlacCodec } from "@/lib/codec";
import { ValidationError } from "@/lib/errors";
import { metadataLength } from "@/lib/flac/stream";
import { withMd5, decodeStreamInfo } from "@/lib/flac/streamInfo";
import { bitsPerSecondToKbps, formatDuration, formatSize } from "@/lib/fileUtils";
import { formatMultivalued, isMultivaluedText } from "@/lib/tagMerge";
import {
	type BatchResult,
	BlockCode,
	type FileInfo,
	type FlacFile,
	type InfoEdit,
	type Selection,
} from "@/types/metadata";

const toHex = (bytes: Uint8Array) => Buffer.from(bytes).toString("hex");

const INFO_FIELDS = [
	"md5",
	"length",
	"sampleRate",
	"bitsPerSample",
	"bitrate",
	"vendor",
	"paddingLength",
	"minBlockSize",
	"maxBlockSize",
	"minFrameSize",
	"maxFrameSize",
	"totalSamples",
	"fileLength",
	"fileHash",
] as const satisfies readonly (keyof FileInfo)[];

export function describeFile(
	file: FlacFile,
	fileSize?: number,
	fileHash = "",
): FileInfo {
	const streamInfoBlock = file.blocks.find(
		(block) => block.code === BlockCode.StreamInfo,
	);
	const padding = file.blocks.find((block) => block.code === BlockCode.Padding);

	const info: FileInfo = {
		md5: "",
		length: "",
		sampleRate: "",
		bitsPerSample: "",
		bitrate: "",
		vendor: file.vendor,
		paddingLength: padding ? String(padding.payload.byteLength) : "",
		minBlockSize: "",
		maxBlockSize: "",
		minFrameSize: "",
		maxFrameSize: "",
		totalSamples: "",
		fileLength:
			fileSize === undefined ? "" : `${fileSize} (${formatSize(fileSize)})`,
		fileHash,
	};
	if (!streamInfoBlock) return info;

	const stream = decodeStreamInfo(streamInfoBlock.payload);
	const seconds =
		stream.sampleRate > 0 ? stream.totalSamples / stream.sampleRate : 0;

	info.md5 = stream.md5.some((byte) => byte !== 0) ? toHex(stream.md5) : "";
	info.length = seconds > 0 ? formatDuration(seconds) : "";
	info.sampleRate = stream.sampleRate ? `${stream.sampleRate / 1000} kHz` : "";
	info.bitsPerSample = `${stream.bitsPerSample} bit`;
	// Audio frames only: the metadata section is not part of the bitrate
	if (fileSize !== undefined && seconds > 0) {
		const audioBytes = Math.max(0, fileSize - metadataLength(file.blocks));
		info.bitrate = `${bitsPerSecondToKbps((audioBytes * 8) / seconds)} kbps`;
	}
	info.minBlockSize = String(stream.minBlockSize);
	info.maxBlockSize = String(stream.maxBlockSize);
	info.minFrameSize = String(stream.minFrameSize);
	info.maxFrameSize = String(stream.maxFrameSize);
	info.totalSamples = String(stream.totalSamples);
	return info;
}

export function mergeFileInfo(infos: FileInfo[]): FileInfo | null {
	const [first] = infos;
	if (!first) return null;

	const merged: FileInfo = { ...first };
	for (const key of INFO_FIELDS) {
		const distinct = [...new Set(infos.map((info) => info[key]))].sort();
		merged[key] = distinct.length === 1 ? distinct[0] : formatMultivalued(distinct);
	}
	return merged;
}

/** Parse up to 32 hex digits into the 16-byte signature; empty clears it. */
export function parseMd5(text: string): Uint8Array {
	const hex = text.trim();
	if (!/^[0-9a-fA-F]{0,32}$/.test(hex)) {
		throw new ValidationError(`Invalid MD5 signature "${text}".`, { md5: text });
	}
	return Uint8Array.from(Buffer.from(hex.padStart(32, "0"), "hex"));
}

export async function saveInfo(
	selection: Selection,
	edit: InfoEdit,
	codec: FlacCodec,
): Promise<BatchResult> {
	const keepVendor = isMultivaluedText(edit.vendor);
	const keepMd5 = isMultivaluedText(edit.md5);
	const md5 = keepMd5 ? null : parseMd5(edit.md5);

	return runSequential(selection, "FileInfo", async (file) => {
		const previous = { blocks: file.blocks, vendor: file.vendor };
		if (!keepVendor) file.vendor = edit.vendor;
		if (md5) {
			file.blocks = file.blocks.map((block) =>
				block.code === BlockCode.StreamInfo
					? { code: block.code, payload: withMd5(block.payload, md5) }
					: block,
			);
		}
		try {
			await codec.save(file);
		} catch (error) {
			file.blocks = previous.blocks;
			file.vendor = previous.vendor;
			throw error;
		}
	});
}
