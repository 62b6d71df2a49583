import { BlockCode, type BlockKind } from "@/types/metadata";

const KIND_BY_CODE: Record<number, BlockKind> = {
	[BlockCode.StreamInfo]: "StreamInfo",
	[BlockCode.Padding]: "Padding",
	[BlockCode.Application]: "Application",
	[BlockCode.SeekTable]: "SeekTable",
	[BlockCode.VorbisComment]: "VorbisComment",
	[BlockCode.Picture]: "Picture",
};

const TYPE_NAMES: Record<BlockKind, string> = {
	StreamInfo: "STREAMINFO",
	Padding: "PADDING",
	Application: "APPLICATION",
	SeekTable: "SEEKTABLE",
	VorbisComment: "VORBIS COMMENT",
	Picture: "PICTURE",
	Unknown: "Unknown",
};

// Kinds the container allows at most once per file
const UNIQUE_KINDS: BlockKind[] = ["StreamInfo", "SeekTable", "VorbisComment"];

export function classify(code: number): BlockKind {
	return KIND_BY_CODE[code] ?? "Unknown";
}

export function typeName(code: number): string {
	return TYPE_NAMES[classify(code)];
}

export function isDeletable(kind: BlockKind): boolean {
	return kind !== "StreamInfo";
}

/** Advisory only: other tools may reinterpret a padding block that is not last. */
export function mustBeLast(kind: BlockKind): boolean {
	return kind === "Padding";
}

export function isUnique(kind: BlockKind): boolean {
	return UNIQUE_KINDS.includes(kind);
}

/** StreamInfo has to stay the first block of the stream. */
export function isOrderable(kind: BlockKind): boolean {
	return kind !== "StreamInfo";
}
