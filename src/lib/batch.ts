import { PARTIAL_WRITE_NOTICE, toError } from "@/lib/errors";
import type { BatchResult, FlacFile, Selection } from "@/types/metadata";

/**
 * Run a write step over each file in order, one at a time.
 * The loop stops at the first failure; files before it stay written.
 */
export async function runSequential(
	selection: Selection,
	scope: string,
	step: (file: FlacFile) => Promise<void>,
): Promise<BatchResult> {
	const completed: string[] = [];

	for (const file of selection) {
		try {
			await step(file);
			completed.push(file.path);
		} catch (e) {
			const error = toError(e);
			console.error(`[${scope}] Failed on ${file.path}:`, error.message);
			return {
				success: false,
				completed,
				failure: {
					path: file.path,
					message:
						completed.length > 0
							? `${error.message} ${PARTIAL_WRITE_NOTICE}`
							: error.message,
					error,
				},
				advisories: [],
			};
		}
	}

	console.log(`[${scope}] Updated ${completed.length} file(s)`);
	return { success: true, completed, failure: null, advisories: [] };
}
