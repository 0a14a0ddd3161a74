import type {
    DetectionInput,
    Detector,
    Face,
    FrameSource,
    LensFacing,
    PixelFormat,
    RawFrame,
    RenderState,
    Size,
} from '@/types';
import {
    ConversionError,
    DetectionError,
    SourceUnavailableError,
    normalizePipelineError,
} from '@/utils/pipelineErrors';

import { DetectionThrottler, type ThrottlerStats } from './detectionThrottler';
import {
    detectPlatform,
    orientedImageSize,
    resolvePixelFormat,
    resolveRotation,
} from './frameConverter';

export const PIPELINE_LOG_SCOPE = 'pipeline';

export type PipelineStatus = 'idle' | 'starting' | 'running' | 'unavailable';

export interface PipelineSnapshot {
    renderState: RenderState;
    status: PipelineStatus;
    error: string | null;
    stats: ThrottlerStats;
}

/** Same shape as the log store's helpers, so the UI can pass them straight through. */
export interface PipelineLogger {
    logInfo: (scope: string, message: string, metadata?: Record<string, unknown>) => void;
    logWarning: (scope: string, message: string, metadata?: Record<string, unknown>) => void;
    logError: (scope: string, message: string, metadata?: Record<string, unknown>) => void;
}

export const consoleLogger: PipelineLogger = {
    logInfo: (scope, message, metadata) => console.info(`[${scope}]`, message, metadata ?? ''),
    logWarning: (scope, message, metadata) => console.warn(`[${scope}]`, message, metadata ?? ''),
    logError: (scope, message, metadata) => console.error(`[${scope}]`, message, metadata ?? ''),
};

export interface FaceDetectionPipelineOptions {
    detector: Detector;
    /** Resolved from the platform when omitted. */
    format?: PixelFormat;
    logger?: PipelineLogger;
    initialLensFacing?: LensFacing;
}

type SnapshotListener = (snapshot: PipelineSnapshot) => void;

const EMPTY_SIZE: Size = Object.freeze({ width: 0, height: 0 });

export const createRenderState = (
    faces: readonly Face[],
    imageSize: Size,
    lensFacing: LensFacing,
): RenderState =>
    Object.freeze({
        faces: Object.freeze([...faces]),
        imageSize: Object.freeze({ width: imageSize.width, height: imageSize.height }),
        lensFacing,
    });

/**
 * Owns the frame stream, the throttler and the RenderState.
 *
 * The RenderState is only ever replaced whole, by the detection completion
 * path or by a source switch. Each source gets a generation number; results
 * from frames of an older generation are discarded.
 */
export class FaceDetectionPipeline {
    private readonly throttler: DetectionThrottler;

    private readonly logger: PipelineLogger;

    private readonly listeners = new Set<SnapshotListener>();

    private readonly frameGenerations = new WeakMap<RawFrame, number>();

    private source: FrameSource | null = null;

    private unsubscribeFrames: (() => void) | null = null;

    private generation = 0;

    private rotationWarned = false;

    private snapshot: PipelineSnapshot;

    constructor(options: FaceDetectionPipelineOptions) {
        this.logger = options.logger ?? consoleLogger;
        this.throttler = new DetectionThrottler({
            detector: options.detector,
            format: options.format ?? resolvePixelFormat(detectPlatform()),
            onResult: this.handleResult,
            onDetectionError: this.handleDetectionError,
            onConversionError: this.handleConversionError,
        });
        this.snapshot = {
            renderState: createRenderState([], EMPTY_SIZE, options.initialLensFacing ?? 'front'),
            status: 'idle',
            error: null,
            stats: this.throttler.stats,
        };
    }

    getSnapshot(): PipelineSnapshot {
        return this.snapshot;
    }

    subscribe(listener: SnapshotListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Start streaming from `source`. Any running stream is stopped first and
     * the face list is cleared before the new stream's first result.
     * A source that fails to start leaves the pipeline `unavailable`.
     */
    async start(source: FrameSource): Promise<void> {
        this.detachSource();
        const generation = ++this.generation;
        this.rotationWarned = false;
        this.source = source;
        this.update({
            renderState: createRenderState([], EMPTY_SIZE, source.lensFacing),
            status: 'starting',
            error: null,
        });
        this.unsubscribeFrames = source.onFrame((frame) => this.handleFrame(frame, generation));

        try {
            await source.start();
        } catch (error) {
            if (generation !== this.generation) {
                return;
            }
            const failure =
                error instanceof SourceUnavailableError
                    ? error
                    : new SourceUnavailableError(normalizePipelineError(error).message, error);
            this.detachSource();
            this.logger.logError(PIPELINE_LOG_SCOPE, failure.message);
            this.update({ status: 'unavailable', error: failure.message });
            return;
        }

        if (generation !== this.generation) {
            // Superseded while starting
            source.stop();
            return;
        }
        this.logger.logInfo(PIPELINE_LOG_SCOPE, `Camera stream started (${source.lensFacing})`);
        this.update({ status: 'running' });
    }

    /** Lens toggle: same as start, named for the call site. */
    switchSource(source: FrameSource): Promise<void> {
        return this.start(source);
    }

    stop(): void {
        this.generation += 1;
        this.detachSource();
        this.update({ status: 'idle' });
    }

    /** Resolves once no detection is in flight. */
    idle(): Promise<void> {
        return this.throttler.idle();
    }

    private detachSource() {
        this.unsubscribeFrames?.();
        this.unsubscribeFrames = null;
        if (this.source) {
            this.source.stop();
            this.source = null;
        }
    }

    private handleFrame(frame: RawFrame, generation: number) {
        if (generation !== this.generation) {
            return;
        }
        const rotation = resolveRotation(frame.sensorOrientation);
        if (!this.rotationWarned && rotation !== frame.sensorOrientation) {
            this.rotationWarned = true;
            this.logger.logWarning(
                PIPELINE_LOG_SCOPE,
                `Unrecognized sensor orientation ${frame.sensorOrientation}; using 0 degrees`,
            );
        }
        this.frameGenerations.set(frame, generation);
        this.throttler.submit(frame);
    }

    private handleResult = (faces: Face[], input: DetectionInput, frame: RawFrame) => {
        if (this.frameGenerations.get(frame) !== this.generation) {
            this.update({ stats: this.throttler.stats });
            return;
        }
        this.update({
            renderState: createRenderState(
                faces,
                orientedImageSize(input.metadata),
                frame.lensFacing,
            ),
            stats: this.throttler.stats,
        });
    };

    private handleDetectionError = (error: DetectionError) => {
        this.logger.logWarning(PIPELINE_LOG_SCOPE, error.message);
        this.update({ stats: this.throttler.stats });
    };

    private handleConversionError = (error: ConversionError) => {
        this.logger.logWarning(PIPELINE_LOG_SCOPE, error.message, { reason: error.reason });
        this.update({ stats: this.throttler.stats });
    };

    private update(partial: Partial<PipelineSnapshot>) {
        this.snapshot = { ...this.snapshot, ...partial };
        this.listeners.forEach((listener) => listener(this.snapshot));
    }
}
