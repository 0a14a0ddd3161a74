import type { DetectionInput, Detector, Face, PixelFormat, RawFrame } from '@/types';
import { ConversionError, DetectionError } from '@/utils/pipelineErrors';

import { convertFrame } from './frameConverter';

export type FrameSubmission = 'accepted' | 'dropped' | 'conversion-failed';

export interface ThrottlerStats {
    accepted: number;
    dropped: number;
    failedConversions: number;
    failedDetections: number;
    completed: number;
}

export interface DetectionThrottlerOptions {
    detector: Detector;
    format: PixelFormat;
    onResult: (faces: Face[], input: DetectionInput, frame: RawFrame) => void;
    onDetectionError?: (error: DetectionError, frame: RawFrame) => void;
    onConversionError?: (error: ConversionError, frame: RawFrame) => void;
    /** Defaults to `convertFrame`; overridable for tests. */
    convert?: (frame: RawFrame, format: PixelFormat) => DetectionInput;
}

const toConversionError = (error: unknown): ConversionError =>
    error instanceof ConversionError
        ? error
        : new ConversionError(
              'unknown',
              error instanceof Error ? error.message : 'Frame conversion failed',
              error,
          );

/**
 * At-most-one-in-flight gate in front of the detector.
 *
 * Frames arriving while a detection is running are dropped, never queued.
 * `busy` is cleared on every exit path of a detection.
 */
export class DetectionThrottler {
    private pending: Promise<void> | null = null;

    private counters: ThrottlerStats = {
        accepted: 0,
        dropped: 0,
        failedConversions: 0,
        failedDetections: 0,
        completed: 0,
    };

    constructor(private readonly options: DetectionThrottlerOptions) {}

    get busy(): boolean {
        return this.pending !== null;
    }

    get stats(): ThrottlerStats {
        return { ...this.counters };
    }

    submit(frame: RawFrame): FrameSubmission {
        if (this.pending) {
            this.counters.dropped += 1;
            return 'dropped';
        }

        let input: DetectionInput;
        try {
            const convert = this.options.convert ?? convertFrame;
            input = convert(frame, this.options.format);
        } catch (error) {
            this.counters.failedConversions += 1;
            this.options.onConversionError?.(toConversionError(error), frame);
            return 'conversion-failed';
        }

        this.counters.accepted += 1;
        this.pending = this.run(input, frame).finally(() => {
            this.pending = null;
        });
        return 'accepted';
    }

    /** Resolves once the in-flight detection, if any, has settled. */
    idle(): Promise<void> {
        return this.pending ?? Promise.resolve();
    }

    private async run(input: DetectionInput, frame: RawFrame): Promise<void> {
        let faces: Face[];
        try {
            faces = await this.options.detector.detect(input);
        } catch (error) {
            this.counters.failedDetections += 1;
            const message = error instanceof Error ? error.message : 'Face detection failed';
            try {
                this.options.onDetectionError?.(new DetectionError(message, error), frame);
            } catch (handlerError) {
                console.error('Detection error handler failed', handlerError);
            }
            return;
        }
        this.counters.completed += 1;
        try {
            this.options.onResult(faces, input, frame);
        } catch (error) {
            console.error('Detection result handler failed', error);
        }
    }
}
