import { toFlacFile } from "@/lib/flac/container";
import { encodePicture } from "@/lib/flac/picture";
import { encodeStreamInfo } from "@/lib/flac/streamInfo";
import { encodeVorbisComment } from "@/lib/flac/vorbisComment";
import {
	BlockCode,
	type FlacFile,
	type MetadataBlock,
	PictureType,
	type StreamInfo,
} from "@/types/metadata";

export const AUDIO_FRAMES = Uint8Array.of(0xff, 0xf8, 0x69, 0x18, 0x00, 0x00, 0xbf);

export const defaultStreamInfo: StreamInfo = {
	minBlockSize: 4096,
	maxBlockSize: 4096,
	minFrameSize: 14,
	maxFrameSize: 8000,
	sampleRate: 44100,
	channels: 2,
	bitsPerSample: 16,
	totalSamples: 441000,
	md5: new Uint8Array(16),
};

export function streamInfoBlock(overrides: Partial<StreamInfo> = {}): MetadataBlock {
	return {
		code: BlockCode.StreamInfo,
		payload: encodeStreamInfo({ ...defaultStreamInfo, ...overrides }),
	};
}

export function paddingBlock(length = 8): MetadataBlock {
	return { code: BlockCode.Padding, payload: new Uint8Array(length) };
}

export function commentBlock(
	entries: [string, string][],
	vendor = "test-vendor",
): MetadataBlock {
	const tags = new Map<string, string[]>();
	for (const [key, value] of entries) {
		tags.set(key, [...(tags.get(key) ?? []), value]);
	}
	return { code: BlockCode.VorbisComment, payload: encodeVorbisComment(vendor, tags) };
}

export function pictureBlock(
	data: Uint8Array,
	pictureType: number = PictureType.FrontCover,
): MetadataBlock {
	return {
		code: BlockCode.Picture,
		payload: encodePicture({
			pictureType,
			mime: "image/jpeg",
			description: "",
			width: 1,
			height: 1,
			depth: 24,
			colors: 0,
			data,
		}),
	};
}

export function makeFile(path: string, blocks: MetadataBlock[]): FlacFile {
	return toFlacFile(path, blocks);
}

/** A file with StreamInfo, a Vorbis comment and trailing padding. */
export function taggedFile(path: string, entries: [string, string][]): FlacFile {
	return makeFile(path, [streamInfoBlock(), commentBlock(entries), paddingBlock()]);
}
