import type { ZodType } from "zod";
import { requestSchema } from "@/protocol/messages/schemas";
import { ErrorCode, type RelayRequest } from "@/protocol/types";

export type ValidationResult<T> =
    | { valid: true; data: T }
    | { valid: false; error: { code: ErrorCode; message: string } };

type ValidationFunction<T> = (data: unknown) => ValidationResult<T>;

function validate<T>(data: unknown, schema: ZodType<T>, errorMessage: string): ValidationResult<T> {
    const result = schema.safeParse(data);

    if (result.success) {
        return { valid: true, data: result.data };
    }

    const issue = result.error.issues[0];

    return {
        valid: false,
        error: {
            code: ErrorCode.INVALID_MESSAGE,
            message: issue ? `${issue.path.map(String).join(".") || "message"}: ${issue.message}` : errorMessage,
        },
    };
}

export const validateRequest: ValidationFunction<RelayRequest> = (data): ValidationResult<RelayRequest> =>
    validate(data, requestSchema, "Invalid request");
