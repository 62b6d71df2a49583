/**
 * STREAMINFO payload (34 bytes):
 *   u16 min block size, u16 max block size,
 *   u24 min frame size, u24 max frame size,
 *   20 bits sample rate, 3 bits channels - 1, 5 bits bits-per-sample - 1,
 *   36 bits total samples, 16 bytes MD5 of the decoded audio.
 */

import type { StreamInfo } from "@/types/metadata";
import { FlacFormatError } from "./bytes";

export const STREAM_INFO_LENGTH = 34;
const MD5_OFFSET = 18;
const TWO_POW_32 = 2 ** 32;

export function decodeStreamInfo(payload: Uint8Array): StreamInfo {
	if (payload.byteLength < STREAM_INFO_LENGTH) {
		throw new FlacFormatError(
			`STREAMINFO is ${payload.byteLength} bytes, expected ${STREAM_INFO_LENGTH}`,
		);
	}
	const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
	const b = (i: number) => view.getUint8(i);

	return {
		minBlockSize: view.getUint16(0, false),
		maxBlockSize: view.getUint16(2, false),
		minFrameSize: (b(4) << 16) | (b(5) << 8) | b(6),
		maxFrameSize: (b(7) << 16) | (b(8) << 8) | b(9),
		sampleRate: (b(10) << 12) | (b(11) << 4) | (b(12) >> 4),
		channels: ((b(12) >> 1) & 0x07) + 1,
		bitsPerSample: (((b(12) & 0x01) << 4) | (b(13) >> 4)) + 1,
		totalSamples: (b(13) & 0x0f) * TWO_POW_32 + view.getUint32(14, false),
		md5: payload.slice(MD5_OFFSET, MD5_OFFSET + 16),
	};
}

export function encodeStreamInfo(info: StreamInfo): Uint8Array {
	const payload = new Uint8Array(STREAM_INFO_LENGTH);
	const view = new DataView(payload.buffer);
	const bps = info.bitsPerSample - 1;

	view.setUint16(0, info.minBlockSize, false);
	view.setUint16(2, info.maxBlockSize, false);
	payload.set(
		[
			(info.minFrameSize >>> 16) & 0xff,
			(info.minFrameSize >>> 8) & 0xff,
			info.minFrameSize & 0xff,
			(info.maxFrameSize >>> 16) & 0xff,
			(info.maxFrameSize >>> 8) & 0xff,
			info.maxFrameSize & 0xff,
			(info.sampleRate >>> 12) & 0xff,
			(info.sampleRate >>> 4) & 0xff,
			((info.sampleRate & 0x0f) << 4) |
				(((info.channels - 1) & 0x07) << 1) |
				((bps >> 4) & 0x01),
			((bps & 0x0f) << 4) | (Math.floor(info.totalSamples / TWO_POW_32) & 0x0f),
		],
		4,
	);
	view.setUint32(14, info.totalSamples % TWO_POW_32, false);
	payload.set(info.md5.subarray(0, 16), MD5_OFFSET);
	return payload;
}

/** Returns a copy of the payload with the MD5 signature replaced. */
export function withMd5(payload: Uint8Array, md5: Uint8Array): Uint8Array {
	if (payload.byteLength < STREAM_INFO_LENGTH) {
		throw new FlacFormatError(
			`STREAMINFO is ${payload.byteLength} bytes, expected ${STREAM_INFO_LENGTH}`,
		);
	}
	const copy = payload.slice();
	copy.set(md5.subarray(0, 16), MD5_OFFSET);
	return copy;
}
