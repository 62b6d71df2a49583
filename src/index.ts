export * from "@/types/metadata";
export * from "@/lib/errors";
export type { FlacCodec } from "@/lib/codec";
export { computeBlockHash, isSameBlock, toBlockRef } from "@/lib/contentHash";
export {
	classify,
	isDeletable,
	isOrderable,
	isUnique,
	mustBeLast,
	typeName,
} from "@/lib/blockCatalog";
export {
	assertBlockShape,
	assertTagShape,
	type BlockShape,
	type BlockShapeCheck,
	checkBlockShape,
	checkTagShape,
	type TagShapeCheck,
} from "@/lib/consistency";
export {
	displayText,
	firstValue,
	formatMultivalued,
	getTagValues,
	isMultivaluedText,
	MULTIVALUED_MARKER,
	mergeTags,
	mergeValues,
	resolveTags,
	type SaveTagsOptions,
	saveTags,
	snapshotTags,
	toEditedRows,
	validateRows,
} from "@/lib/tagMerge";
export {
	type ApplyBlockOrderOptions,
	applyBlockOrder,
	blockOrderOf,
	deleteBlockAt,
	describeBlocks,
	paddingAdvisory,
	reconcile,
	reconcileFile,
	validateReorder,
} from "@/lib/blockReconcile";
export {
	type ApplyPictureOptions,
	applyPicture,
	type CoverAttributes,
	checkConsistency,
	findCover,
	inspectCover,
	validateCover,
	withCover,
} from "@/lib/pictureConsistency";
export { describeFile, mergeFileInfo, parseMd5, saveInfo } from "@/lib/fileInfo";
export {
	bitsPerSecondToKbps,
	collectFlacFiles,
	formatDuration,
	formatSize,
	isFlacFile,
} from "@/lib/fileUtils";
export { FileFlacCodec } from "@/lib/flac/fileCodec";
export { layoutBlocks, toFlacFile } from "@/lib/flac/container";
export {
	buildStream,
	metadataLength,
	parseStream,
	serializeMetadata,
} from "@/lib/flac/stream";
export { decodePicture, encodePicture } from "@/lib/flac/picture";
export { decodeStreamInfo, encodeStreamInfo } from "@/lib/flac/streamInfo";
export { decodeVorbisComment, encodeVorbisComment } from "@/lib/flac/vorbisComment";
export {
	type AppSettings,
	createSettingsStore,
	defaultSettings,
	readSettingsFrom,
	resolvePaddingOverride,
	type SettingsStore,
} from "@/stores/settingsStore";
export { createEditorStore, type EditorStore, type EditorStoreOptions } from "@/stores/editorStore";
