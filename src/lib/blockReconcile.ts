/**
 * Block Reconciliation
 *
 * The block editor shows one block list for the whole selection and lets
 * the user reorder or delete entries. Each entry is remembered only as a
 * (code, contentHash) pair. On save, every file's new block sequence is
 * rebuilt by finding, for each entry in order, a block in a backup of that
 * file's blocks with the same code and the same freshly computed hash.
 *
 * Identical duplicate blocks are interchangeable: the first unused match
 * is taken, and each backup block is used at most once.
 */

import { runSequential } from "@/lib/batch";
import {
	classify,
	isDeletable,
	isOrderable,
	isUnique,
	mustBeLast,
	typeName,
} from "@/lib/blockCatalog";
import type { FlacCodec } from "@/lib/codec";
import { computeBlockHash, isSameBlock, toBlockRef } from "@/lib/contentHash";
import {
	UnresolvedBlockError,
	ValidationError,
	describeError,
} from "@/lib/errors";
import { decodePicture } from "@/lib/flac/picture";
import { decodeStreamInfo } from "@/lib/flac/streamInfo";
import { decodeVorbisComment } from "@/lib/flac/vorbisComment";
import {
	type BatchResult,
	BlockCode,
	type BlockRef,
	type BlockRow,
	type FlacFile,
	type MetadataBlock,
	type Selection,
} from "@/types/metadata";

// ============================================================================
// Display
// ============================================================================

export function blockOrderOf(file: FlacFile): BlockRef[] {
	return file.blocks.map(toBlockRef);
}

const SEEK_POINT_LENGTH = 18;

function summarize(block: MetadataBlock): string {
	const length = block.payload.byteLength;
	switch (classify(block.code)) {
		case "StreamInfo": {
			const info = decodeStreamInfo(block.payload);
			return `${info.sampleRate} Hz, ${info.channels} ch, ${info.bitsPerSample} bit, ${info.totalSamples} samples`;
		}
		case "Padding":
			return `${length} bytes`;
		case "Application": {
			const id = Buffer.from(block.payload.subarray(0, 4)).toString("latin1");
			return `id "${id}", ${Math.max(0, length - 4)} bytes of data`;
		}
		case "SeekTable":
			return `${Math.floor(length / SEEK_POINT_LENGTH)} seek points`;
		case "VorbisComment": {
			const { vendor, tags } = decodeVorbisComment(block.payload);
			return `vendor "${vendor}", ${tags.size} fields`;
		}
		case "Picture": {
			const picture = decodePicture(block.payload);
			return `type ${picture.pictureType}, ${picture.mime}, ${picture.width}x${picture.height}, ${picture.data.byteLength} bytes`;
		}
		default:
			return `${length} bytes`;
	}
}

function safeSummary(block: MetadataBlock): string {
	try {
		return summarize(block);
	} catch (error) {
		console.warn(
			`[BlockReconcile] Could not decode block code ${block.code}:`,
			describeError(error),
		);
		return `${block.payload.byteLength} bytes (undecodable)`;
	}
}

export function describeBlocks(file: FlacFile): BlockRow[] {
	return file.blocks.map((block) => ({
		code: block.code,
		contentHash: computeBlockHash(block),
		typeName: typeName(block.code),
		summary: safeSummary(block),
	}));
}

// ============================================================================
// Editing the block order
// ============================================================================

/** Remove one entry. The StreamInfo entry is rejected before anything changes. */
export function deleteBlockAt(order: BlockRef[], index: number): BlockRef[] {
	const entry = order[index];
	if (!entry) {
		throw new ValidationError(`No block at position ${index}.`, {
			index,
			length: order.length,
		});
	}
	if (!isDeletable(classify(entry.code))) {
		throw new ValidationError(`${typeName(entry.code)} block cannot be deleted.`, {
			index,
			code: entry.code,
		});
	}
	return order.filter((_, i) => i !== index);
}

const refKey = (ref: BlockRef) => `${ref.code}:${ref.contentHash}`;

/**
 * Accept a rearranged order only if it uses entries of the current order
 * (each at most as often as it appears there), holds at most one block of
 * each unique kind and keeps StreamInfo first.
 */
export function validateReorder(current: BlockRef[], next: BlockRef[]): BlockRef[] {
	const available = new Map<string, number>();
	for (const ref of current) {
		available.set(refKey(ref), (available.get(refKey(ref)) ?? 0) + 1);
	}
	for (const ref of next) {
		const left = available.get(refKey(ref)) ?? 0;
		if (left === 0) {
			throw new ValidationError(
				`Block ${typeName(ref.code)} (${ref.contentHash.slice(0, 12)}) is not part of the current block list.`,
				{ code: ref.code, contentHash: ref.contentHash },
			);
		}
		available.set(refKey(ref), left - 1);
	}

	for (const ref of current) {
		if (isDeletable(classify(ref.code))) continue;
		if (!next.some((entry) => refKey(entry) === refKey(ref))) {
			throw new ValidationError(`${typeName(ref.code)} block cannot be deleted.`, {
				code: ref.code,
			});
		}
	}

	const seen = new Set<number>();
	for (const ref of next) {
		if (!isUnique(classify(ref.code))) continue;
		if (seen.has(ref.code)) {
			throw new ValidationError(`Only one ${typeName(ref.code)} block is allowed.`, {
				code: ref.code,
			});
		}
		seen.add(ref.code);
	}

	const pinned = next.findIndex((ref) => !isOrderable(classify(ref.code)));
	if (pinned > 0) {
		throw new ValidationError(`${typeName(next[pinned].code)} block must stay first.`, {
			index: pinned,
		});
	}
	return next;
}

// ============================================================================
// Reconciliation
// ============================================================================

export function reconcileFile(file: FlacFile, order: BlockRef[]): MetadataBlock[] {
	const backup = [...file.blocks];
	const used = new Set<number>();

	return order.map((ref) => {
		const index = backup.findIndex(
			(block, i) => !used.has(i) && isSameBlock(block, ref),
		);
		if (index === -1) {
			throw new UnresolvedBlockError(
				`No ${typeName(ref.code)} block with hash ${ref.contentHash} in ${file.path}.`,
				file.path,
				ref.code,
				ref.contentHash,
			);
		}
		used.add(index);
		return backup[index];
	});
}

export function reconcile(
	selection: Selection,
	order: BlockRef[],
): Map<string, MetadataBlock[]> {
	const sequences = new Map<string, MetadataBlock[]>();
	for (const file of selection) {
		sequences.set(file.path, reconcileFile(file, order));
	}
	return sequences;
}

export function paddingAdvisory(path: string, codes: number[]): string | null {
	const paddingIndex = codes.findIndex((code) => mustBeLast(classify(code)));
	if (paddingIndex === -1 || paddingIndex === codes.length - 1) return null;
	return `${path}: PADDING block is not the last block, padding changes may not take effect.`;
}

export interface ApplyBlockOrderOptions {
	paddingOverride?: number;
	verifyPadding?: boolean;
}

export async function applyBlockOrder(
	selection: Selection,
	order: BlockRef[],
	codec: FlacCodec,
	options: ApplyBlockOrderOptions = {},
): Promise<BatchResult> {
	const { paddingOverride, verifyPadding = true } = options;

	// Every file must resolve before the first write
	let sequences: Map<string, MetadataBlock[]>;
	try {
		sequences = reconcile(selection, order);
	} catch (e) {
		if (!(e instanceof UnresolvedBlockError)) throw e;
		console.error(`[BlockReconcile] Nothing written: ${e.message}`);
		return {
			success: false,
			completed: [],
			failure: { path: e.path, message: e.message, error: e },
			advisories: [],
		};
	}

	const result = await runSequential(selection, "BlockReconcile", async (file) => {
		const backup = file.blocks;
		const previousTags = file.tags;
		file.blocks = sequences.get(file.path) ?? reconcileFile(file, order);
		if (!file.blocks.some((block) => block.code === BlockCode.VorbisComment)) {
			file.tags = new Map();
		}
		try {
			await codec.save(file, paddingOverride);
		} catch (error) {
			file.blocks = backup;
			file.tags = previousTags;
			throw error;
		}
	});

	if (!verifyPadding) return result;

	const advisories: string[] = [];
	for (const path of result.completed) {
		try {
			const fresh = await codec.load(path);
			const advisory = paddingAdvisory(
				path,
				fresh.blocks.map((block) => block.code),
			);
			if (advisory) {
				console.warn(`[BlockReconcile] ${advisory}`);
				advisories.push(advisory);
			}
		} catch (error) {
			console.warn(`[BlockReconcile] Could not re-read ${path}:`, describeError(error));
			advisories.push(`${path}: could not verify block order after saving.`);
		}
	}
	return { ...result, advisories };
}
