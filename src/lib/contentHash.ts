/**
 * Content identity for metadata blocks.
 *
 * Position in a block list changes whenever the user reorders or deletes
 * blocks, so blocks are recognised across snapshots by a SHA-256 digest of
 * their payload instead. The block code is not part of the digest; callers
 * compare it separately.
 */

import { createHash } from "node:crypto";
import type { BlockRef, MetadataBlock } from "@/types/metadata";

export function computeBlockHash(block: Pick<MetadataBlock, "payload">): string {
	return createHash("sha256").update(block.payload).digest("hex");
}

export function toBlockRef(block: MetadataBlock): BlockRef {
	return { code: block.code, contentHash: computeBlockHash(block) };
}

export function isSameBlock(block: MetadataBlock, ref: BlockRef): boolean {
	return block.code === ref.code && computeBlockHash(block) === ref.contentHash;
}
