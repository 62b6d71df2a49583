import { runSequential } from "@/lib/batch";
import type { FlacCodec } from "@/lib/codec";
import { ValidationError, describeError } from "@/lib/errors";
import { bytesEqual } from "@/lib/flac/bytes";
import { decodePicture, encodePicture } from "@/lib/flac/picture";
import {
	type BatchResult,
	BlockCode,
	type CoverState,
	type FlacFile,
	type MetadataBlock,
	type Picture,
	PictureType,
	type Selection,
} from "@/types/metadata";

export interface CoverAttributes {
	mime: string;
	description: string;
	width: number;
	height: number;
	depth: number;
	colors?: number;
}

function isFrontCover(block: MetadataBlock): boolean {
	if (block.code !== BlockCode.Picture) return false;
	try {
		return decodePicture(block.payload).pictureType === PictureType.FrontCover;
	} catch (error) {
		console.warn("[PictureConsistency] Skipping undecodable picture block:", describeError(error));
		return false;
	}
}

export function findCover(file: FlacFile): Picture | null {
	const block = file.blocks.find(isFrontCover);
	return block ? decodePicture(block.payload) : null;
}

/**
 * True when every file carries the same front cover image bytes, or when
 * no file has a front cover at all.
 */
export function checkConsistency(selection: Selection): boolean {
	return inspectCover(selection).kind !== "mixed";
}

export function inspectCover(selection: Selection): CoverState {
	const covers = selection.map(findCover);
	const first = covers[0];

	if (covers.every((cover) => cover === null)) {
		return { kind: "none" };
	}
	if (!first) return { kind: "mixed" };

	const same = covers.every(
		(cover) => cover !== null && bytesEqual(cover.data, first.data),
	);
	return same ? { kind: "consistent", picture: first } : { kind: "mixed" };
}

const UINT32_MAX = 0xffffffff;

export function validateCover(image: Uint8Array, attributes: CoverAttributes): void {
	if (image.byteLength === 0) {
		throw new ValidationError("No cover image selected.");
	}
	if (!/^[\x20-\x7E]+$/.test(attributes.mime)) {
		throw new ValidationError(`Invalid MIME type "${attributes.mime}".`, {
			mime: attributes.mime,
		});
	}
	const numeric = {
		width: attributes.width,
		height: attributes.height,
		depth: attributes.depth,
		colors: attributes.colors ?? 0,
	};
	for (const [name, value] of Object.entries(numeric)) {
		if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
			throw new ValidationError(
				"Invalid input. Please enter valid numbers for height, width, and depth.",
				{ [name]: value },
			);
		}
	}
}

/**
 * Replace front covers with one new cover block. It takes the place of the
 * first removed cover, otherwise goes before a trailing padding block,
 * otherwise at the end.
 */
export function withCover(blocks: MetadataBlock[], cover: MetadataBlock): MetadataBlock[] {
	const firstCover = blocks.findIndex(isFrontCover);
	const kept = blocks.filter((block) => !isFrontCover(block));

	let insertAt = kept.length;
	if (firstCover !== -1) {
		insertAt = blocks.slice(0, firstCover).filter((block) => !isFrontCover(block)).length;
	} else if (kept.length > 0 && kept[kept.length - 1].code === BlockCode.Padding) {
		insertAt = kept.length - 1;
	}

	return [...kept.slice(0, insertAt), cover, ...kept.slice(insertAt)];
}

export interface ApplyPictureOptions {
	paddingOverride?: number;
}

export async function applyPicture(
	selection: Selection,
	image: Uint8Array,
	attributes: CoverAttributes,
	codec: FlacCodec,
	options: ApplyPictureOptions = {},
): Promise<BatchResult> {
	validateCover(image, attributes);

	const cover: MetadataBlock = {
		code: BlockCode.Picture,
		payload: encodePicture({
			pictureType: PictureType.FrontCover,
			mime: attributes.mime,
			description: attributes.description,
			width: attributes.width,
			height: attributes.height,
			depth: attributes.depth,
			colors: attributes.colors ?? 0,
			data: image,
		}),
	};

	return runSequential(selection, "PictureConsistency", async (file) => {
		const backup = file.blocks;
		file.blocks = withCover(file.blocks, cover);
		try {
			await codec.save(file, options.paddingOverride);
		} catch (error) {
			file.blocks = backup;
			throw error;
		}
	});
}
