export type CollectorErrorCode =
    | "api.network_error"
    | "api.timeout"
    | "api.http_status"
    | "api.invalid_json"
    | "api.invalid_payload"
    | "influx.write_failed"
    | "config.invalid"
    | "collector.unexpected_error";

export interface CollectorErrorInput {
    code: CollectorErrorCode;
    message: string;
    status?: number;
    cause?: unknown;
}

export class CollectorError extends Error {
    readonly code: CollectorErrorCode;
    readonly status?: number;

    constructor(input: CollectorErrorInput) {
        super(input.message, { cause: input.cause });
        this.name = "CollectorError";
        this.code = input.code;
        this.status = input.status;
    }
}

export function asCollectorError(error: unknown): CollectorError {
    if (error instanceof CollectorError) return error;

    if (error instanceof Error) {
        return new CollectorError({
            code: "collector.unexpected_error",
            message: error.message,
            cause: error,
        });
    }

    return new CollectorError({
        code: "collector.unexpected_error",
        message: String(error),
    });
}
