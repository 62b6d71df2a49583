/**
 * Merging tag dictionaries of several files into one editable table,
 * and writing the edited table back to every file.
 */

import { runSequential } from "@/lib/batch";
import type { FlacCodec } from "@/lib/codec";
import { ValidationError } from "@/lib/errors";
import type {
	EditedTagRow,
	FlacFile,
	MergedTagRow,
	MergedValue,
	Selection,
	TagDict,
	TagSaveResult,
	TagSnapshot,
} from "@/types/metadata";

export const MULTIVALUED_MARKER = "≪Multivalued≫";

export function getTagValues(
	tags: TagDict,
	fieldName: string,
): string[] | undefined {
	const exact = tags.get(fieldName);
	if (exact) return exact;

	const wanted = fieldName.toLowerCase();
	for (const [key, values] of tags) {
		if (key.toLowerCase() === wanted) return values;
	}
	return undefined;
}

/** First value of a field; an absent field reads as the empty string. */
export function firstValue(file: FlacFile, fieldName: string): string {
	return getTagValues(file.tags, fieldName)?.[0] ?? "";
}

export function mergeValues(values: string[]): MergedValue {
	const distinct = [...new Set(values)].sort();
	if (distinct.length <= 1) {
		return { kind: "single", value: distinct[0] ?? "" };
	}
	return { kind: "multivalued", values: distinct };
}

export function formatMultivalued(values: string[]): string {
	return `${MULTIVALUED_MARKER} ${values.join("; ")}`;
}

export function displayText(value: MergedValue): string {
	return value.kind === "single" ? value.value : formatMultivalued(value.values);
}

export function isMultivaluedText(value: string): boolean {
	return value.startsWith(MULTIVALUED_MARKER);
}

export function mergeTags(
	selection: Selection,
	fieldNames: string[],
): MergedTagRow[] {
	return fieldNames.map((fieldName) => {
		const perFileOriginal: Record<string, string> = {};
		for (const file of selection) {
			perFileOriginal[file.path] = firstValue(file, fieldName);
		}
		return {
			fieldName,
			displayValue: mergeValues(Object.values(perFileOriginal)),
			perFileOriginal,
		};
	});
}

export function toEditedRows(rows: MergedTagRow[]): EditedTagRow[] {
	return rows.map((row) => ({
		fieldName: row.fieldName,
		value: displayText(row.displayValue),
	}));
}

// Vorbis field names: printable ASCII 0x20-0x7D without '='
const FIELD_NAME_PATTERN = /^[\x20-\x3C\x3E-\x7D]+$/;

export function validateRows(rows: EditedTagRow[]): void {
	const seen = new Set<string>();
	rows.forEach((row, index) => {
		if (!row.fieldName) {
			throw new ValidationError(`Row ${index + 1} has an empty field name.`, {
				index,
			});
		}
		if (!FIELD_NAME_PATTERN.test(row.fieldName)) {
			throw new ValidationError(
				`Invalid field name "${row.fieldName}": use printable ASCII without "=".`,
				{ index, fieldName: row.fieldName },
			);
		}
		const key = row.fieldName.toLowerCase();
		if (seen.has(key)) {
			throw new ValidationError(`Field "${row.fieldName}" appears more than once.`, {
				index,
				fieldName: row.fieldName,
			});
		}
		seen.add(key);
	});
}

/**
 * Build a file's new tag dictionary from the edited rows, in row order.
 * A row still carrying the multivalued marker restores the file's own
 * values; a field the file never had stays absent.
 */
export function resolveTags(
	rows: EditedTagRow[],
	original: Record<string, string[] | undefined>,
): TagDict {
	const tags: TagDict = new Map();
	for (const row of rows) {
		if (isMultivaluedText(row.value)) {
			const kept = original[row.fieldName];
			if (kept) tags.set(row.fieldName, [...kept]);
		} else {
			tags.set(row.fieldName, [row.value]);
		}
	}
	return tags;
}

/**
 * Re-read every file and record its current values for the given fields
 * plus every field it holds. Any read failure rejects before anything
 * has been modified.
 */
export async function snapshotTags(
	selection: Selection,
	fieldNames: string[],
	codec: FlacCodec,
): Promise<TagSnapshot> {
	const snapshot: TagSnapshot = {};
	for (const file of selection) {
		const fresh = await codec.load(file.path);
		const fields: Record<string, string[] | undefined> = {};
		for (const [key, values] of fresh.tags) {
			fields[key] = [...values];
		}
		for (const fieldName of fieldNames) {
			const values = getTagValues(fresh.tags, fieldName);
			fields[fieldName] = values ? [...values] : undefined;
		}
		snapshot[file.path] = fields;
	}
	return snapshot;
}

export interface SaveTagsOptions {
	paddingOverride?: number;
}

export async function saveTags(
	selection: Selection,
	rows: EditedTagRow[],
	codec: FlacCodec,
	options: SaveTagsOptions = {},
): Promise<TagSaveResult> {
	validateRows(rows);

	const fieldNames = rows.map((row) => row.fieldName);
	const snapshot = await snapshotTags(selection, fieldNames, codec);
	console.log(
		`[TagMerge] Snapshot taken for ${selection.length} file(s), ${fieldNames.length} field(s)`,
	);

	const result = await runSequential(selection, "TagMerge", async (file) => {
		const previous = file.tags;
		file.tags = resolveTags(rows, snapshot[file.path]);
		try {
			await codec.save(file, options.paddingOverride);
		} catch (error) {
			file.tags = previous;
			throw error;
		}
	});

	return { ...result, snapshot };
}
