export type PipelineErrorKind = 'conversion' | 'detection' | 'source-unavailable';

export abstract class PipelineError extends Error {
    abstract readonly kind: PipelineErrorKind;
}

/** `unknown` covers failures thrown by a custom converter. */
export type ConversionFailureReason = 'no-planes' | 'invalid-size' | 'unknown';

/** Malformed frame. The caller drops the frame; nothing is detected. */
export class ConversionError extends PipelineError {
    readonly kind = 'conversion';

    constructor(
        readonly reason: ConversionFailureReason,
        message: string,
        cause?: unknown,
    ) {
        super(message, { cause });
        this.name = 'ConversionError';
    }
}

/** The detector rejected or threw. The previous overlay stays on screen. */
export class DetectionError extends PipelineError {
    readonly kind = 'detection';

    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'DetectionError';
    }
}

/** No camera, or the stream failed to start. Terminal until a camera is reselected. */
export class SourceUnavailableError extends PipelineError {
    readonly kind = 'source-unavailable';

    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'SourceUnavailableError';
    }
}

export interface NormalizedPipelineError {
    message: string;
    kind?: PipelineErrorKind;
}

export const normalizePipelineError = (error: unknown): NormalizedPipelineError => {
    if (error instanceof PipelineError) {
        return { message: error.message, kind: error.kind };
    }

    if (error instanceof Error) {
        return {
            message: error.message,
        };
    }

    if (typeof error === 'string' && error.trim().length > 0) {
        return { message: error };
    }

    return {
        message: 'Unknown pipeline failure',
    };
};
