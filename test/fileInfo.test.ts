import { describe, expect, it } from "vitest";
import { ValidationError } from "@/lib/errors";
import { describeFile, mergeFileInfo, parseMd5, saveInfo } from "@/lib/fileInfo";
import { metadataLength } from "@/lib/flac/stream";
import { decodeStreamInfo } from "@/lib/flac/streamInfo";
import { BlockCode } from "@/types/metadata";
import {
	commentBlock,
	makeFile,
	paddingBlock,
	pictureBlock,
	streamInfoBlock,
	taggedFile,
} from "./helpers/fixtures";
import { MemoryCodec } from "./helpers/memoryCodec";

describe("describeFile", () => {
	it("formats the stream parameters of one file", () => {
		const info = describeFile(taggedFile("a.flac", []), 1764000);

		expect(info).toEqual({
			md5: "",
			length: "00:00:10",
			sampleRate: "44.1 kHz",
			bitsPerSample: "16 bit",
			bitrate: "1411 kbps",
			vendor: "test-vendor",
			paddingLength: "8",
			minBlockSize: "4096",
			maxBlockSize: "4096",
			minFrameSize: "14",
			maxFrameSize: "8000",
			totalSamples: "441000",
			fileLength: "1764000 (1.68 MB)",
			fileHash: "",
		});
	});

	it("leaves the metadata section out of the bitrate", () => {
		const plain = makeFile("a.flac", [streamInfoBlock(), commentBlock([]), paddingBlock()]);
		const withArt = makeFile("b.flac", [
			streamInfoBlock(),
			commentBlock([]),
			pictureBlock(new Uint8Array(500_000)),
			paddingBlock(),
		]);
		const audioBytes = 1_000_000;

		expect(metadataLength(plain.blocks)).toBe(77);
		expect(describeFile(plain, metadataLength(plain.blocks) + audioBytes).bitrate).toBe(
			"800 kbps",
		);
		expect(describeFile(withArt, metadataLength(withArt.blocks) + audioBytes).bitrate).toBe(
			"800 kbps",
		);
	});

	it("passes the whole-file hash through", () => {
		const hash = "d41d8cd98f00b204e9800998ecf8427e";
		const info = describeFile(taggedFile("a.flac", []), undefined, hash);
		expect(info.fileHash).toBe(hash);
	});

	it("shows the MD5 signature as hex with leading zeros", () => {
		const md5 = new Uint8Array(16);
		md5[15] = 0x2a;
		const info = describeFile(makeFile("a.flac", [streamInfoBlock({ md5 })]));

		expect(info.md5).toBe("0000000000000000000000000000002a");
		expect(info.bitrate).toBe("");
		expect(info.fileLength).toBe("");
		expect(info.paddingLength).toBe("");
	});
});

describe("mergeFileInfo", () => {
	it("collapses equal fields and marks divergent ones", () => {
		const merged = mergeFileInfo([
			describeFile(makeFile("a.flac", [streamInfoBlock()])),
			describeFile(makeFile("b.flac", [streamInfoBlock({ sampleRate: 48000 })])),
		]);

		expect(merged?.sampleRate).toBe("≪Multivalued≫ 44.1 kHz; 48 kHz");
		expect(merged?.bitsPerSample).toBe("16 bit");
		expect(merged?.totalSamples).toBe("441000");
	});

	it("returns null for an empty selection", () => {
		expect(mergeFileInfo([])).toBeNull();
	});
});

describe("parseMd5", () => {
	it("left-pads short input to 16 bytes", () => {
		const md5 = parseMd5("abc");
		expect(md5).toHaveLength(16);
		expect([...md5.subarray(14)]).toEqual([0x0a, 0xbc]);
	});

	it("clears the signature for empty input", () => {
		expect(parseMd5("")).toEqual(new Uint8Array(16));
	});

	it("rejects non-hex or over-long input", () => {
		expect(() => parseMd5("xyz")).toThrow('Invalid MD5 signature "xyz".');
		expect(() => parseMd5("0".repeat(33))).toThrow(ValidationError);
	});
});

describe("saveInfo", () => {
	const vendorFile = (path: string, vendor: string) =>
		makeFile(path, [streamInfoBlock(), commentBlock([["TITLE", "Song"]], vendor), paddingBlock()]);

	it("writes vendor and MD5 to every file", async () => {
		const codec = new MemoryCodec();
		codec.putFile(vendorFile("a.flac", "vendor-a"));
		codec.putFile(vendorFile("b.flac", "vendor-b"));
		const selection = [await codec.load("a.flac"), await codec.load("b.flac")];

		const result = await saveInfo(
			selection,
			{ vendor: "editor", md5: "00112233445566778899aabbccddeeff" },
			codec,
		);
		expect(result.success).toBe(true);

		const b = await codec.load("b.flac");
		expect(b.vendor).toBe("editor");
		expect(b.tags.get("TITLE")).toEqual(["Song"]);
		expect(describeFile(b).md5).toBe("00112233445566778899aabbccddeeff");
	});

	it("keeps each file's own values for marker input", async () => {
		const codec = new MemoryCodec();
		codec.putFile(vendorFile("a.flac", "vendor-a"));
		codec.putFile(vendorFile("b.flac", "vendor-b"));
		const selection = [await codec.load("a.flac"), await codec.load("b.flac")];

		await saveInfo(
			selection,
			{ vendor: "≪Multivalued≫ vendor-a; vendor-b", md5: "≪Multivalued≫ " },
			codec,
		);

		const [a, b] = [await codec.load("a.flac"), await codec.load("b.flac")];
		expect([a.vendor, b.vendor]).toEqual(["vendor-a", "vendor-b"]);
		const streamInfo = a.blocks.find((block) => block.code === BlockCode.StreamInfo);
		expect(streamInfo && decodeStreamInfo(streamInfo.payload).md5).toEqual(new Uint8Array(16));
	});

	it("rejects an invalid signature before writing", async () => {
		const codec = new MemoryCodec();
		codec.putFile(vendorFile("a.flac", "vendor-a"));
		const selection = [await codec.load("a.flac")];

		await expect(
			saveInfo(selection, { vendor: "editor", md5: "not-hex" }, codec),
		).rejects.toBeInstanceOf(ValidationError);
		expect(codec.saves).toEqual([]);
	});
});
