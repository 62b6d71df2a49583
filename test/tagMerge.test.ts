import { beforeEach, describe, expect, it } from "vitest";
import { ContainerReadError, PARTIAL_WRITE_NOTICE, ValidationError } from "@/lib/errors";
import {
	displayText,
	getTagValues,
	mergeTags,
	resolveTags,
	saveTags,
	toEditedRows,
	validateRows,
} from "@/lib/tagMerge";
import { taggedFile } from "./helpers/fixtures";
import { MemoryCodec } from "./helpers/memoryCodec";

describe("mergeTags", () => {
	it("returns a single-value row when every file agrees", () => {
		const selection = [
			taggedFile("a.flac", [["ARTIST", "Same"]]),
			taggedFile("b.flac", [["ARTIST", "Same"]]),
		];

		const [row] = mergeTags(selection, ["ARTIST"]);
		expect(row.displayValue).toEqual({ kind: "single", value: "Same" });
		expect(row.perFileOriginal).toEqual({ "a.flac": "Same", "b.flac": "Same" });
	});

	it("returns a sorted multivalued row for divergent values", () => {
		const selection = [
			taggedFile("a.flac", [["ARTIST", "B"]]),
			taggedFile("b.flac", [["ARTIST", "A"]]),
		];

		const [row] = mergeTags(selection, ["ARTIST"]);
		expect(row.displayValue).toEqual({ kind: "multivalued", values: ["A", "B"] });
		expect(displayText(row.displayValue)).toBe("≪Multivalued≫ A; B");
		expect(row.perFileOriginal).toEqual({ "a.flac": "B", "b.flac": "A" });
	});

	it("lists distinct values once", () => {
		const selection = [
			taggedFile("a.flac", [["GENRE", "Rock"]]),
			taggedFile("b.flac", [["GENRE", "Jazz"]]),
			taggedFile("c.flac", [["GENRE", "Rock"]]),
		];
		const [row] = mergeTags(selection, ["GENRE"]);
		expect(displayText(row.displayValue)).toBe("≪Multivalued≫ Jazz; Rock");
	});

	it("uses the first container value and treats absent fields as empty", () => {
		const a = taggedFile("a.flac", [
			["ARTIST", "First"],
			["ARTIST", "Second"],
		]);
		const b = taggedFile("b.flac", []);

		const [row] = mergeTags([a, b], ["ARTIST"]);
		expect(row.perFileOriginal).toEqual({ "a.flac": "First", "b.flac": "" });
		expect(displayText(row.displayValue)).toBe("≪Multivalued≫ ; First");
	});
});

describe("getTagValues", () => {
	it("looks keys up case-insensitively", () => {
		const file = taggedFile("a.flac", [["Title", "Song"]]);
		expect(getTagValues(file.tags, "TITLE")).toEqual(["Song"]);
		expect(getTagValues(file.tags, "ALBUM")).toBeUndefined();
	});
});

describe("resolveTags", () => {
	it("applies edited values and restores marker rows per file", () => {
		const tags = resolveTags(
			[
				{ fieldName: "TITLE", value: "New Title" },
				{ fieldName: "ARTIST", value: "≪Multivalued≫ A; B" },
			],
			{ TITLE: ["Old"], ARTIST: ["A", "A2"] },
		);

		expect([...tags]).toEqual([
			["TITLE", ["New Title"]],
			["ARTIST", ["A", "A2"]],
		]);
	});

	it("leaves a marker row out for a file that never had the field", () => {
		const tags = resolveTags([{ fieldName: "ALBUM", value: "≪Multivalued≫ X; Y" }], {
			ALBUM: undefined,
		});
		expect(tags.size).toBe(0);
	});
});

describe("validateRows", () => {
	it("rejects empty, invalid and duplicate field names", () => {
		expect(() => validateRows([{ fieldName: "", value: "x" }])).toThrow(ValidationError);
		expect(() => validateRows([{ fieldName: "A=B", value: "x" }])).toThrow(ValidationError);
		expect(() =>
			validateRows([
				{ fieldName: "Title", value: "x" },
				{ fieldName: "TITLE", value: "y" },
			]),
		).toThrow('Field "TITLE" appears more than once.');
	});

	it("accepts ordinary field names", () => {
		expect(() =>
			validateRows([
				{ fieldName: "TITLE", value: "" },
				{ fieldName: "REPLAYGAIN_TRACK_GAIN", value: "-6.2 dB" },
			]),
		).not.toThrow();
	});
});

describe("saveTags", () => {
	let codec: MemoryCodec;

	beforeEach(() => {
		codec = new MemoryCodec();
	});

	async function loadAll(paths: string[]) {
		const files = [];
		for (const path of paths) files.push(await codec.load(path));
		return files;
	}

	it("applies an edited single value to every file", async () => {
		codec.putFile(taggedFile("a.flac", [["TITLE", "Song"]]));
		codec.putFile(taggedFile("b.flac", [["TITLE", "Song"]]));
		const selection = await loadAll(["a.flac", "b.flac"]);

		const rows = toEditedRows(mergeTags(selection, ["TITLE"]));
		expect(rows).toEqual([{ fieldName: "TITLE", value: "Song" }]);

		const result = await saveTags(selection, [{ fieldName: "TITLE", value: "New Title" }], codec);
		expect(result.success).toBe(true);
		expect(result.completed).toEqual(["a.flac", "b.flac"]);

		const reloaded = await loadAll(["a.flac", "b.flac"]);
		expect(reloaded.map((file) => file.tags.get("TITLE"))).toEqual([
			["New Title"],
			["New Title"],
		]);
	});

	it("keeps each file's own value for an untouched multivalued row", async () => {
		codec.putFile(
			taggedFile("a.flac", [
				["TITLE", "One"],
				["ARTIST", "A"],
			]),
		);
		codec.putFile(
			taggedFile("b.flac", [
				["TITLE", "Two"],
				["ARTIST", "A"],
			]),
		);
		const selection = await loadAll(["a.flac", "b.flac"]);
		const rows = toEditedRows(mergeTags(selection, ["TITLE", "ARTIST"]));
		rows[1] = { fieldName: "ARTIST", value: "C" };

		const result = await saveTags(selection, rows, codec);
		expect(result.snapshot["a.flac"].TITLE).toEqual(["One"]);
		expect(result.snapshot["b.flac"].ARTIST).toEqual(["A"]);

		const [a, b] = await loadAll(["a.flac", "b.flac"]);
		expect([...a.tags]).toEqual([
			["TITLE", ["One"]],
			["ARTIST", ["C"]],
		]);
		expect([...b.tags]).toEqual([
			["TITLE", ["Two"]],
			["ARTIST", ["C"]],
		]);
	});

	it("drops removed rows and appends added rows", async () => {
		codec.putFile(
			taggedFile("a.flac", [
				["TITLE", "Song"],
				["COMMENT", "old"],
			]),
		);
		const selection = await loadAll(["a.flac"]);

		await saveTags(
			selection,
			[
				{ fieldName: "TITLE", value: "Song" },
				{ fieldName: "DATE", value: "2024" },
			],
			codec,
		);

		const [a] = await loadAll(["a.flac"]);
		expect([...a.tags.keys()]).toEqual(["TITLE", "DATE"]);
	});

	it("aborts before writing anything when a snapshot read fails", async () => {
		codec.putFile(taggedFile("a.flac", [["TITLE", "Song"]]));
		codec.putFile(taggedFile("b.flac", [["TITLE", "Song"]]));
		const selection = await loadAll(["a.flac", "b.flac"]);
		codec.failLoad.set("b.flac", "permission denied");

		await expect(
			saveTags(selection, [{ fieldName: "TITLE", value: "New" }], codec),
		).rejects.toBeInstanceOf(ContainerReadError);
		expect(codec.saves).toEqual([]);
		expect(selection[0].tags.get("TITLE")).toEqual(["Song"]);
	});

	it("rejects invalid rows before reading any file", async () => {
		codec.putFile(taggedFile("a.flac", [["TITLE", "Song"]]));
		const selection = await loadAll(["a.flac"]);
		codec.failLoad.set("a.flac", "should not be read");

		await expect(
			saveTags(selection, [{ fieldName: "", value: "x" }], codec),
		).rejects.toBeInstanceOf(ValidationError);
	});

	it("stops at the first write failure and reports completed files", async () => {
		for (const path of ["a.flac", "b.flac", "c.flac"]) {
			codec.putFile(taggedFile(path, [["TITLE", "Song"]]));
		}
		const selection = await loadAll(["a.flac", "b.flac", "c.flac"]);
		codec.failSave.set("b.flac", "disk full");

		const result = await saveTags(selection, [{ fieldName: "TITLE", value: "New" }], codec);

		expect(result.success).toBe(false);
		expect(result.completed).toEqual(["a.flac"]);
		expect(result.failure?.path).toBe("b.flac");
		expect(result.failure?.message).toBe(
			`Failed to save b.flac: disk full ${PARTIAL_WRITE_NOTICE}`,
		);
		expect(codec.saves).toEqual(["a.flac"]);
		expect(selection[1].tags.get("TITLE")).toEqual(["Song"]);
	});
});
