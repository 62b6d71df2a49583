import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";

/**
 * Format bytes to human-readable size string
 */
export function formatSize(bytes: number): string {
	if (bytes === 0) return "0 B";
	const units = ["B", "KB", "MB", "GB", "TB"];
	const i = Math.min(
		Math.floor(Math.log(bytes) / Math.log(1024)),
		units.length - 1,
	);
	return `${(bytes / 1024 ** i).toFixed(2)} ${units[i]}`;
}

/**
 * Format a duration as HH:MM:SS (wraps at 24 hours)
 */
export function formatDuration(seconds: number): string {
	const total = Math.floor(seconds) % 86400;
	const hours = Math.floor(total / 3600);
	const minutes = Math.floor((total % 3600) / 60);
	const secs = total % 60;
	return [hours, minutes, secs].map((n) => String(n).padStart(2, "0")).join(":");
}

export function bitsPerSecondToKbps(bitsPerSecond: number): number {
	return Math.round(bitsPerSecond / 1000);
}

export function isFlacFile(filePath: string | null): boolean {
	if (!filePath) return false;

	const extension = filePath.split(".").pop()?.toLowerCase();
	return filePath.includes(".") && extension === "flac";
}

async function walk(directory: string, recurse: boolean, found: string[]): Promise<void> {
	const entries = await readdir(directory, { withFileTypes: true });
	for (const entry of entries) {
		const fullPath = join(directory, entry.name);
		if (entry.isDirectory()) {
			if (recurse) await walk(fullPath, recurse, found);
		} else if (isFlacFile(entry.name)) {
			found.push(fullPath);
		}
	}
}

/**
 * Expand a mix of file and directory paths into a sorted list of FLAC files.
 * Paths that are neither a directory nor a FLAC file are skipped.
 */
export async function collectFlacFiles(
	paths: string[],
	recurse = true,
): Promise<string[]> {
	const found: string[] = [];

	for (const path of paths) {
		const info = await stat(path);
		if (info.isDirectory()) {
			await walk(path, recurse, found);
		} else if (isFlacFile(path)) {
			found.push(path);
		} else {
			console.log(`[FileUtils] ${path} is not a directory or a FLAC file. Skipping.`);
		}
	}

	return [...new Set(found)].sort();
}
