import { BlockCode, type FlacFile, type MetadataBlock, type TagDict } from "@/types/metadata";
import { FlacFormatError } from "./bytes";
import { decodeVorbisComment, encodeVorbisComment } from "./vorbisComment";

export function toFlacFile(path: string, blocks: MetadataBlock[]): FlacFile {
	const streamInfoCount = blocks.filter(
		(block) => block.code === BlockCode.StreamInfo,
	).length;
	if (streamInfoCount !== 1) {
		throw new FlacFormatError(
			`Expected exactly one STREAMINFO block, found ${streamInfoCount}`,
		);
	}

	const comment = blocks.find((block) => block.code === BlockCode.VorbisComment);
	if (!comment) {
		return { path, blocks, tags: new Map(), vendor: "" };
	}
	const { vendor, tags } = decodeVorbisComment(comment.payload);
	return { path, blocks, tags, vendor };
}

export function tagDictsEqual(a: TagDict, b: TagDict): boolean {
	if (a.size !== b.size) return false;
	const left = [...a];
	const right = [...b];
	return left.every(([key, values], i) => {
		const [otherKey, otherValues] = right[i];
		return (
			key === otherKey &&
			values.length === otherValues.length &&
			values.every((value, j) => value === otherValues[j])
		);
	});
}

/**
 * Produce the block sequence to write for a file: the in-memory tags go into
 * the Vorbis comment block, and a padding override replaces every padding
 * block with a single trailing one.
 *
 * A Vorbis comment block whose decoded content already matches the in-memory
 * tags keeps its payload bytes unchanged.
 */
export function layoutBlocks(
	file: FlacFile,
	paddingOverride?: number,
): MetadataBlock[] {
	const blocks = [...file.blocks];
	const commentIndex = blocks.findIndex(
		(block) => block.code === BlockCode.VorbisComment,
	);

	if (commentIndex >= 0) {
		const current = decodeVorbisComment(blocks[commentIndex].payload);
		if (current.vendor !== file.vendor || !tagDictsEqual(current.tags, file.tags)) {
			blocks[commentIndex] = {
				code: BlockCode.VorbisComment,
				payload: encodeVorbisComment(file.vendor, file.tags),
			};
		}
	} else if (file.tags.size > 0) {
		const streamInfoIndex = blocks.findIndex(
			(block) => block.code === BlockCode.StreamInfo,
		);
		blocks.splice(streamInfoIndex + 1, 0, {
			code: BlockCode.VorbisComment,
			payload: encodeVorbisComment(file.vendor, file.tags),
		});
	}

	if (paddingOverride === undefined) return blocks;

	return [
		...blocks.filter((block) => block.code !== BlockCode.Padding),
		{ code: BlockCode.Padding, payload: new Uint8Array(paddingOverride) },
	];
}
