export type AnalysisErrorCode = "NotFound" | "PermissionDenied" | "Cancelled" | "InvalidArgument";

export interface AnalysisErrorPayload {
    code: AnalysisErrorCode;
    message: string;
    details?: Record<string, unknown>;
}

export class AnalysisError extends Error {
    public readonly code: AnalysisErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(code: AnalysisErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = "AnalysisError";
        this.code = code;
        this.details = details;
    }

    public toPayload(): AnalysisErrorPayload {
        return this.details
            ? { code: this.code, message: this.message, details: this.details }
            : { code: this.code, message: this.message };
    }
}

export type QueryOutcome<T> =
    | { ok: true; value: T }
    | { ok: false; error: AnalysisErrorPayload };

export function success<T>(value: T): QueryOutcome<T> {
    return { ok: true, value };
}

export function failure<T>(code: AnalysisErrorCode, message: string, details?: Record<string, unknown>): QueryOutcome<T> {
    return { ok: false, error: new AnalysisError(code, message, details).toPayload() };
}

/**
 * Converts an AnalysisError into a failed outcome. Anything else is rethrown so
 * unexpected faults keep their stack.
 */
export function toOutcome<T>(error: unknown): QueryOutcome<T> {
    if (error instanceof AnalysisError) {
        return { ok: false, error: error.toPayload() };
    }
    throw error;
}

export function isCancelled(error: unknown): boolean {
    return error instanceof AnalysisError && error.code === "Cancelled";
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
    if (signal?.aborted) {
        throw new AnalysisError("Cancelled", `Operation cancelled during ${stage}`);
    }
}

/** Maps Node-style errno failures from the file system onto the query taxonomy. */
export function fromFileSystemError(error: unknown, filePath: string): AnalysisError {
    const code = errnoCode(error);
    if (code === "EACCES" || code === "EPERM") {
        return new AnalysisError("PermissionDenied", `Permission denied: ${filePath}`, { filePath });
    }
    if (code === "ENOENT" || code === "ENOTDIR" || code === "EISDIR") {
        return new AnalysisError("NotFound", `File not found: ${filePath}`, { filePath });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new AnalysisError("PermissionDenied", `Unable to read ${filePath}: ${message}`, { filePath });
}

export function errnoCode(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error) {
        const code = error.code;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}
