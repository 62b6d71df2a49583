import { createStore } from "zustand/vanilla";
import {
	applyBlockOrder,
	blockOrderOf,
	deleteBlockAt,
	describeBlocks,
	reconcile,
	validateReorder,
} from "@/lib/blockReconcile";
import type { FlacCodec } from "@/lib/codec";
import { assertBlockShape, assertTagShape } from "@/lib/consistency";
import { UnresolvedBlockError, ValidationError, describeError } from "@/lib/errors";
import { describeFile, mergeFileInfo, saveInfo } from "@/lib/fileInfo";
import { collectFlacFiles } from "@/lib/fileUtils";
import { applyPicture, type CoverAttributes, inspectCover } from "@/lib/pictureConsistency";
import { mergeTags, saveTags, toEditedRows } from "@/lib/tagMerge";
import {
	createSettingsStore,
	resolvePaddingOverride,
	type SettingsStore,
} from "@/stores/settingsStore";
import type {
	BatchResult,
	BlockRef,
	BlockRow,
	CoverState,
	EditedTagRow,
	FileInfo,
	InfoEdit,
	MergedTagRow,
	Selection,
	TagSaveResult,
} from "@/types/metadata";

interface EditorState {
	paths: string[];
	selection: Selection;
	loading: boolean;
	saving: boolean;
	error: string | null;
	lastResult: BatchResult | null;

	// Tag table
	tagRows: MergedTagRow[];
	editedRows: EditedTagRow[];
	tagsDirty: boolean;
	tagError: string | null;

	// Block list
	blockOrder: BlockRef[];
	blockRows: BlockRow[];
	blocksDirty: boolean;
	blockError: string | null;

	cover: CoverState | null;
	info: FileInfo | null;

	openPaths: (paths: string[]) => Promise<void>;
	selectFiles: (paths: string[]) => Promise<void>;
	reload: () => Promise<void>;
	reset: () => void;

	editTagRow: (fieldName: string, newValue: string) => void;
	addTagRow: (fieldName: string, value?: string) => void;
	removeTagRow: (fieldName: string) => void;

	reorderBlocks: (newOrder: BlockRef[]) => void;
	deleteBlockAt: (index: number) => void;

	setCoverImage: (
		image: Uint8Array,
		attributes: CoverAttributes,
	) => Promise<BatchResult | null>;
	saveInfo: (edit: InfoEdit) => Promise<BatchResult | null>;
	saveTags: () => Promise<TagSaveResult | null>;
	saveBlocks: () => Promise<BatchResult | null>;
	save: () => Promise<BatchResult | null>;
}

type EditorData = Omit<
	EditorState,
	| "openPaths"
	| "selectFiles"
	| "reload"
	| "reset"
	| "editTagRow"
	| "addTagRow"
	| "removeTagRow"
	| "reorderBlocks"
	| "deleteBlockAt"
	| "setCoverImage"
	| "saveInfo"
	| "saveTags"
	| "saveBlocks"
	| "save"
>;

const initialState: EditorData = {
	paths: [],
	selection: [],
	loading: false,
	saving: false,
	error: null,
	lastResult: null,
	tagRows: [],
	editedRows: [],
	tagsDirty: false,
	tagError: null,
	blockOrder: [],
	blockRows: [],
	blocksDirty: false,
	blockError: null,
	cover: null,
	info: null,
};

const refKey = (ref: BlockRef) => `${ref.code}:${ref.contentHash}`;

/** Lay the displayed rows out in the order of the edited block list. */
function rowsInOrder(order: BlockRef[], rows: BlockRow[]): BlockRow[] {
	const pool = [...rows];
	return order.flatMap((ref) => {
		const index = pool.findIndex((row) => refKey(row) === refKey(ref));
		return index === -1 ? [] : pool.splice(index, 1);
	});
}

export interface EditorStoreOptions {
	codec: FlacCodec;
	settings?: SettingsStore;
}

/**
 * One editing session over a selection of files. Consistency checks run
 * as soon as the selection is loaded; every save reloads the selection.
 */
export function createEditorStore({
	codec,
	settings = createSettingsStore(),
}: EditorStoreOptions) {
	const paddingOverride = () => resolvePaddingOverride(settings.getState().settings);

	return createStore<EditorState>((set, get) => {
		// Shared wrapper for the save commands
		const runSave = async <T extends BatchResult>(
			label: string,
			action: () => Promise<T>,
		): Promise<T | null> => {
			set({ saving: true, error: null });
			try {
				const result = await action();
				set({ lastResult: result });
				await get().reload();
				// A failed reload leaves its own error in place
				set({
					saving: false,
					error: result.failure ? result.failure.message : get().error,
				});
				return result;
			} catch (e) {
				console.error(`[EditorSession] ${label} failed:`, describeError(e));
				set({ saving: false, error: describeError(e) });
				return null;
			}
		};

		const reject = (error: ValidationError): never => {
			set({ error: error.message });
			throw error;
		};

		return {
			...initialState,

			// Expand files and folders into FLAC paths, then select them
			openPaths: async (paths: string[]) => {
				let found: string[];
				try {
					found = await collectFlacFiles(
						paths,
						settings.getState().settings.recurseDirectories,
					);
				} catch (e) {
					console.error("[EditorSession] Failed to open paths:", describeError(e));
					set({ ...initialState, error: describeError(e) });
					return;
				}
				await get().selectFiles(found);
			},

			selectFiles: async (paths: string[]) => {
				const ordered = settings.getState().settings.sortSelection
					? [...paths].sort()
					: [...paths];
				set({ ...initialState, paths: ordered, loading: true });

				try {
					const selection: Selection = [];
					for (const path of ordered) {
						selection.push(await codec.load(path));
					}

					let tagRows: MergedTagRow[] = [];
					let tagError: string | null = null;
					try {
						tagRows = mergeTags(selection, assertTagShape(selection));
					} catch (e) {
						tagError = describeError(e);
					}

					let blockOrder: BlockRef[] = [];
					let blockRows: BlockRow[] = [];
					let blockError: string | null = null;
					try {
						assertBlockShape(selection);
						if (selection.length > 0) {
							blockOrder = blockOrderOf(selection[0]);
							blockRows = describeBlocks(selection[0]);
						}
						reconcile(selection, blockOrder);
					} catch (e) {
						blockError =
							e instanceof UnresolvedBlockError
								? `Batch block editing is not supported for this selection: ${e.message}`
								: describeError(e);
					}

					const infos: FileInfo[] = [];
					for (const file of selection) {
						const size = codec.fileSize ? await codec.fileSize(file.path) : undefined;
						const hash = codec.fileHash ? await codec.fileHash(file.path) : undefined;
						infos.push(describeFile(file, size, hash));
					}

					set({
						selection,
						tagRows,
						editedRows: toEditedRows(tagRows),
						tagError,
						blockOrder,
						blockRows,
						blockError,
						cover: inspectCover(selection),
						info: mergeFileInfo(infos),
						loading: false,
					});
					console.log(`[EditorSession] Selected ${selection.length} file(s)`);
				} catch (e) {
					console.error("[EditorSession] Failed to load selection:", describeError(e));
					set({ ...initialState, paths: ordered, error: describeError(e) });
				}
			},

			reload: async () => {
				const { paths, lastResult } = get();
				await get().selectFiles(paths);
				set({ lastResult });
			},

			reset: () => set(initialState),

			editTagRow: (fieldName, newValue) => {
				const { editedRows } = get();
				if (!editedRows.some((row) => row.fieldName === fieldName)) {
					reject(new ValidationError(`No tag row named "${fieldName}".`, { fieldName }));
				}
				set({
					editedRows: editedRows.map((row) =>
						row.fieldName === fieldName ? { ...row, value: newValue } : row,
					),
					tagsDirty: true,
				});
			},

			addTagRow: (fieldName, value = "") => {
				const { editedRows, tagError } = get();
				if (tagError) reject(new ValidationError(tagError));
				if (
					editedRows.some(
						(row) => row.fieldName.toLowerCase() === fieldName.toLowerCase(),
					)
				) {
					reject(
						new ValidationError(`Field "${fieldName}" already exists.`, { fieldName }),
					);
				}
				set({ editedRows: [...editedRows, { fieldName, value }], tagsDirty: true });
			},

			removeTagRow: (fieldName) => {
				const { editedRows } = get();
				set({
					editedRows: editedRows.filter((row) => row.fieldName !== fieldName),
					tagsDirty: true,
				});
			},

			reorderBlocks: (newOrder) => {
				const { blockOrder, blockRows, blockError } = get();
				if (blockError) reject(new ValidationError(blockError));
				try {
					validateReorder(blockOrder, newOrder);
				} catch (e) {
					if (e instanceof ValidationError) reject(e);
					throw e;
				}
				set({
					blockOrder: newOrder,
					blockRows: rowsInOrder(newOrder, blockRows),
					blocksDirty: true,
				});
			},

			deleteBlockAt: (index) => {
				const { blockOrder, blockRows } = get();
				let next: BlockRef[] = blockOrder;
				try {
					next = deleteBlockAt(blockOrder, index);
				} catch (e) {
					if (e instanceof ValidationError) reject(e);
					throw e;
				}
				set({
					blockOrder: next,
					blockRows: rowsInOrder(next, blockRows),
					blocksDirty: true,
				});
			},

			setCoverImage: (image, attributes) =>
				runSave("Set cover", () =>
					applyPicture(get().selection, image, attributes, codec, {
						paddingOverride: paddingOverride(),
					}),
				),

			saveInfo: (edit) =>
				runSave("Save info", () => saveInfo(get().selection, edit, codec)),

			saveTags: () =>
				runSave("Save tags", async () => {
					const { selection, editedRows, tagError } = get();
					if (tagError) throw new ValidationError(tagError);
					return saveTags(selection, editedRows, codec, {
						paddingOverride: paddingOverride(),
					});
				}),

			saveBlocks: () =>
				runSave("Save blocks", async () => {
					const { selection, blockOrder, blockError } = get();
					if (blockError) throw new ValidationError(blockError);
					return applyBlockOrder(selection, blockOrder, codec, {
						paddingOverride: paddingOverride(),
						verifyPadding: settings.getState().settings.verifyPaddingAfterSave,
					});
				}),

			// Blocks go first: their hashes were taken before any tag rewrite
			save: async () => {
				const { blocksDirty, tagsDirty, editedRows } = get();
				let result: BatchResult | null = null;

				if (blocksDirty) {
					result = await get().saveBlocks();
					if (!result?.success) return result;
				}
				if (tagsDirty) {
					// The reload after the block save resets the staged rows
					if (blocksDirty) set({ editedRows, tagsDirty: true });
					result = await get().saveTags();
				}
				return result;
			},
		};
	});
}

export type EditorStore = ReturnType<typeof createEditorStore>;
