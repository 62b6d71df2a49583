/**
 * Structural checks that gate batch editing across a selection.
 *
 * Both checks run when the selection is built, before any editable view
 * exists, so incompatible selections are reported before the user edits.
 */

import { ConsistencyError } from "@/lib/errors";
import type { FlacFile, Selection } from "@/types/metadata";

export interface BlockShape {
	count: number;
	codes: number[];
}

export type BlockShapeCheck =
	| { ok: true; shape: BlockShape }
	| {
			ok: false;
			aspect: "count" | "codes";
			expected: BlockShape;
			path: string;
			actual: BlockShape;
	  };

export type TagShapeCheck =
	| { ok: true; fieldNames: string[] }
	| { ok: false; expected: string[]; path: string; actual: string[] };

export function blockShapeOf(file: FlacFile): BlockShape {
	return {
		count: file.blocks.length,
		codes: file.blocks.map((block) => block.code),
	};
}

export function fieldNamesOf(file: FlacFile): string[] {
	return [...file.tags.keys()];
}

const sameSequence = <T>(a: T[], b: T[]) =>
	a.length === b.length && a.every((value, i) => value === b[i]);

export function checkBlockShape(selection: Selection): BlockShapeCheck {
	if (selection.length === 0) {
		return { ok: true, shape: { count: 0, codes: [] } };
	}

	const expected = blockShapeOf(selection[0]);
	for (const file of selection.slice(1)) {
		const actual = blockShapeOf(file);
		if (actual.count !== expected.count) {
			return { ok: false, aspect: "count", expected, path: file.path, actual };
		}
		if (!sameSequence(actual.codes, expected.codes)) {
			return { ok: false, aspect: "codes", expected, path: file.path, actual };
		}
	}
	return { ok: true, shape: expected };
}

export function checkTagShape(selection: Selection): TagShapeCheck {
	if (selection.length === 0) {
		return { ok: true, fieldNames: [] };
	}

	const expected = fieldNamesOf(selection[0]);
	for (const file of selection.slice(1)) {
		const actual = fieldNamesOf(file);
		if (!sameSequence(actual, expected)) {
			return { ok: false, expected, path: file.path, actual };
		}
	}
	return { ok: true, fieldNames: expected };
}

export function assertBlockShape(selection: Selection): BlockShape {
	const result = checkBlockShape(selection);
	if (result.ok) return result.shape;

	const message =
		result.aspect === "count"
			? `Metadata block counts are not consistent among files (${result.expected.count} vs ${result.actual.count} in ${result.path}).`
			: `Metadata block codes combination is not consistent among files ([${result.expected.codes.join(", ")}] vs [${result.actual.codes.join(", ")}] in ${result.path}).`;
	throw new ConsistencyError(message, result.aspect, [result.path]);
}

export function assertTagShape(selection: Selection): string[] {
	const result = checkTagShape(selection);
	if (result.ok) return result.fieldNames;

	throw new ConsistencyError(
		`Batch tag editing is not supported for this selection: ${result.path} has different tag fields or order.`,
		"fields",
		[result.path],
	);
}
