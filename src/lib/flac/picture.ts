/**
 * PICTURE block payload. All integers are big-endian.
 */

import type { Picture } from "@/types/metadata";
import { ByteReader, ByteWriter, utf8Length } from "./bytes";

export function decodePicture(payload: Uint8Array): Picture {
	const reader = new ByteReader(payload, "picture block");
	const pictureType = reader.u32be();
	const mime = reader.utf8(reader.u32be());
	const description = reader.utf8(reader.u32be());
	const width = reader.u32be();
	const height = reader.u32be();
	const depth = reader.u32be();
	const colors = reader.u32be();
	const data = reader.bytesOf(reader.u32be());

	return { pictureType, mime, description, width, height, depth, colors, data };
}

export function encodePicture(picture: Picture): Uint8Array {
	return new ByteWriter()
		.u32be(picture.pictureType)
		.u32be(utf8Length(picture.mime))
		.text(picture.mime)
		.u32be(utf8Length(picture.description))
		.text(picture.description)
		.u32be(picture.width)
		.u32be(picture.height)
		.u32be(picture.depth)
		.u32be(picture.colors)
		.u32be(picture.data.byteLength)
		.bytes(picture.data)
		.toBytes();
}
