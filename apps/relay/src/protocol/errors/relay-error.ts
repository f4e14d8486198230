import { ErrorCatalog, type ErrorCode } from "@/protocol/types/enums";

export class RelayError extends Error {
    readonly code: ErrorCode;
    readonly context?: Record<string, unknown>;

    constructor(code: ErrorCode, message?: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
        super(message ?? ErrorCatalog[code].message, { cause: options?.cause });
        this.name = "RelayError";
        this.code = code;
        this.context = options?.context;
    }
}
