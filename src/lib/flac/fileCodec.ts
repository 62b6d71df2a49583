import { createHash } from "node:crypto";
import { readFile, stat, writeFile } from "node:fs/promises";
import type { FlacCodec } from "@/lib/codec";
import { ContainerReadError, ContainerWriteError, describeError } from "@/lib/errors";
import type { FlacFile } from "@/types/metadata";
import { layoutBlocks, toFlacFile } from "./container";
import { buildStream, parseStream } from "./stream";

async function readBytes(path: string): Promise<Uint8Array> {
	return new Uint8Array(await readFile(path));
}

/**
 * Codec backed by the local file system. Saving rewrites the metadata
 * section and copies the audio frames that follow it unchanged.
 */
export class FileFlacCodec implements FlacCodec {
	async load(path: string): Promise<FlacFile> {
		try {
			const { blocks } = parseStream(await readBytes(path));
			return toFlacFile(path, blocks);
		} catch (error) {
			throw new ContainerReadError(
				`Failed to read ${path}: ${describeError(error)}`,
				path,
				error,
			);
		}
	}

	async save(file: FlacFile, paddingOverride?: number): Promise<void> {
		try {
			const existing = await readBytes(file.path);
			const { audioOffset } = parseStream(existing);
			const blocks = layoutBlocks(file, paddingOverride);

			await writeFile(file.path, buildStream(blocks, existing.subarray(audioOffset)));
			file.blocks = blocks;
			console.log(`[FlacCodec] Saved ${file.path} (${blocks.length} blocks)`);
		} catch (error) {
			throw new ContainerWriteError(
				`Failed to save ${file.path}: ${describeError(error)}`,
				file.path,
				error,
			);
		}
	}

	async fileSize(path: string): Promise<number> {
		return (await stat(path)).size;
	}

	async fileHash(path: string): Promise<string> {
		return createHash("md5").update(await readFile(path)).digest("hex");
	}
}
