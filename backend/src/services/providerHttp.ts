import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";

const BROWSER_USER_AGENT =
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface ProviderClientOptions {
    timeoutMs: number;
}

export function createProviderClient(
    referer: string,
    options: ProviderClientOptions,
    extraHeaders: Record<string, string> = {}
): AxiosInstance {
    return axios.create({
        timeout: options.timeoutMs,
        headers: {
            "User-Agent": BROWSER_USER_AGENT,
            Accept: "application/json",
            Referer: referer,
            ...extraHeaders,
        },
    });
}

/**
 * Both providers sometimes answer JSON with a text/html content type, which
 * axios hands back as a string.
 */
export function parseProviderBody<S extends z.ZodTypeAny>(
    schema: S,
    body: unknown,
    context: string
): z.infer<S> {
    let candidate: unknown = body;
    if (typeof body === "string") {
        try {
            candidate = JSON.parse(body);
        } catch (error) {
            throw new AppError(
                ErrorCode.LOOKUP_FAILED,
                ErrorCategory.TRANSIENT,
                `Malformed response from ${context}`,
                { originalError: error instanceof Error ? error.message : String(error) }
            );
        }
    }

    const result: z.SafeParseReturnType<unknown, z.infer<S>> =
        schema.safeParse(candidate);
    if (!result.success) {
        throw new AppError(
            ErrorCode.LOOKUP_FAILED,
            ErrorCategory.TRANSIENT,
            `Unexpected response shape from ${context}`,
            { issues: result.error.errors.map((issue) => issue.path.join(".")) }
        );
    }
    return result.data;
}

/**
 * Parses list entries one at a time; entries that still fail the schema are
 * dropped instead of failing the whole response.
 */
export function parseProviderItems<S extends z.ZodTypeAny>(
    schema: S,
    items: unknown[]
): z.infer<S>[] {
    const parsed: z.infer<S>[] = [];
    for (const item of items) {
        const result: z.SafeParseReturnType<unknown, z.infer<S>> = schema.safeParse(item);
        if (result.success) parsed.push(result.data);
    }
    return parsed;
}

export function lookupFailed(context: string, details: Record<string, unknown>): AppError {
    return new AppError(
        ErrorCode.LOOKUP_FAILED,
        ErrorCategory.TRANSIENT,
        `${context} returned an unsuccessful status`,
        details
    );
}
