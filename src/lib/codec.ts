import type { FlacFile } from "@/types/metadata";

/**
 * Reads and writes whole files. The engine never touches container bytes
 * itself; everything goes through an implementation of this interface.
 */
export interface FlacCodec {
	/** Rejects with ContainerReadError */
	load(path: string): Promise<FlacFile>;
	/** Rejects with ContainerWriteError */
	save(file: FlacFile, paddingOverride?: number): Promise<void>;
	/** Size of the file on disk, when the codec can tell */
	fileSize?(path: string): Promise<number>;
	/** Hex MD5 of the whole file */
	fileHash?(path: string): Promise<string>;
}
