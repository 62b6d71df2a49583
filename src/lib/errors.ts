/**
 * Error taxonomy for batch metadata editing
 */

export class MetadataError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MetadataError";
	}
}

export class ContainerReadError extends MetadataError {
	constructor(
		message: string,
		public path: string,
		public originalError?: unknown,
	) {
		super(message);
		this.name = "ContainerReadError";
	}
}

export class ContainerWriteError extends MetadataError {
	constructor(
		message: string,
		public path: string,
		public originalError?: unknown,
	) {
		super(message);
		this.name = "ContainerWriteError";
	}
}

export type ConsistencyAspect = "count" | "codes" | "fields";

export class ConsistencyError extends MetadataError {
	constructor(
		message: string,
		public aspect: ConsistencyAspect,
		public paths: string[] = [],
	) {
		super(message);
		this.name = "ConsistencyError";
	}
}

export class UnresolvedBlockError extends MetadataError {
	constructor(
		message: string,
		public path: string,
		public code: number,
		public contentHash: string,
	) {
		super(message);
		this.name = "UnresolvedBlockError";
	}
}

export class ValidationError extends MetadataError {
	constructor(
		message: string,
		public details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "ValidationError";
	}
}

export const PARTIAL_WRITE_NOTICE = "Some files may have been updated already.";

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
