export const BlockCode = {
	StreamInfo: 0,
	Padding: 1,
	Application: 2,
	SeekTable: 3,
	VorbisComment: 4,
	Picture: 6,
} as const;

export type BlockKind =
	| "StreamInfo"
	| "Padding"
	| "Application"
	| "SeekTable"
	| "VorbisComment"
	| "Picture"
	| "Unknown";

export interface MetadataBlock {
	code: number;
	payload: Uint8Array;
}

/** Ordered tag dictionary; keys are stored as given and looked up case-insensitively. */
export type TagDict = Map<string, string[]>;

export interface FlacFile {
	path: string;
	blocks: MetadataBlock[];
	tags: TagDict;
	vendor: string;
}

export type Selection = FlacFile[];

export interface BlockRef {
	code: number;
	contentHash: string;
}

export interface BlockRow extends BlockRef {
	typeName: string;
	summary: string;
}

export type MergedValue =
	| { kind: "single"; value: string }
	| { kind: "multivalued"; values: string[] };

export interface MergedTagRow {
	fieldName: string;
	displayValue: MergedValue;
	perFileOriginal: Record<string, string>;
}

/** A row as it stands in the editor, after the user has (possibly) changed it. */
export interface EditedTagRow {
	fieldName: string;
	value: string;
}

export type TagSnapshot = Record<string, Record<string, string[] | undefined>>;

export const PictureType = {
	Other: 0,
	FrontCover: 3,
	BackCover: 4,
} as const;

export interface PictureAttributes {
	pictureType: number;
	mime: string;
	description: string;
	width: number;
	height: number;
	depth: number;
	colors: number;
}

export interface Picture extends PictureAttributes {
	data: Uint8Array;
}

export type CoverState =
	| { kind: "none" }
	| { kind: "consistent"; picture: Picture }
	| { kind: "mixed" };

export interface StreamInfo {
	minBlockSize: number;
	maxBlockSize: number;
	minFrameSize: number;
	maxFrameSize: number;
	sampleRate: number;
	channels: number;
	bitsPerSample: number;
	totalSamples: number;
	md5: Uint8Array;
}

export interface FileInfo {
	md5: string;
	length: string;
	sampleRate: string;
	bitsPerSample: string;
	bitrate: string;
	vendor: string;
	paddingLength: string;
	minBlockSize: string;
	maxBlockSize: string;
	minFrameSize: string;
	maxFrameSize: string;
	totalSamples: string;
	fileLength: string;
	/** MD5 of the whole file, empty when unknown */
	fileHash: string;
}

export interface InfoEdit {
	vendor: string;
	md5: string;
}

export interface BatchFailure {
	path: string;
	message: string;
	error: Error;
}

export interface BatchResult {
	success: boolean;
	completed: string[];
	failure: BatchFailure | null;
	advisories: string[];
}

export interface TagSaveResult extends BatchResult {
	snapshot: TagSnapshot;
}
