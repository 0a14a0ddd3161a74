// @vitest-environment node
import { describe, expect, it, vi } from 'vitest';

import type { Detector, Face, RawFrame } from '@/types';
import { ConversionError, DetectionError } from '@/utils/pipelineErrors';

import { DetectionThrottler } from '../detectionThrottler';

interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (reason: unknown) => void;
}

const createDeferred = <T>(): Deferred<T> => {
    let resolve: (value: T) => void = () => {};
    let reject: (reason: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
};

const createFrame = (overrides: Partial<RawFrame> = {}): RawFrame => ({
    planes: [{ bytes: new Uint8Array([0, 0, 0, 0]), bytesPerRow: 4 }],
    width: 1,
    height: 1,
    sensorOrientation: 0,
    lensFacing: 'back',
    ...overrides,
});

const FACE: Face = { boundingBox: { left: 1, top: 2, right: 3, bottom: 4 } };

/** Detector whose calls stay pending until the test settles them. */
const createControlledDetector = () => {
    const calls: Deferred<Face[]>[] = [];
    const detector: Detector = {
        detect: vi.fn(() => {
            const deferred = createDeferred<Face[]>();
            calls.push(deferred);
            return deferred.promise;
        }),
    };
    return { detector, calls };
};

describe('DetectionThrottler', () => {
    it('starts idle', () => {
        const { detector } = createControlledDetector();
        const throttler = new DetectionThrottler({ detector, format: 'nv21', onResult: vi.fn() });

        expect(throttler.busy).toBe(false);
    });

    it('accepts one frame and drops the rest while a detection is in flight', async () => {
        const { detector, calls } = createControlledDetector();
        const onResult = vi.fn();
        const throttler = new DetectionThrottler({ detector, format: 'nv21', onResult });

        const outcomes = Array.from({ length: 5 }, () => throttler.submit(createFrame()));

        expect(outcomes).toEqual(['accepted', 'dropped', 'dropped', 'dropped', 'dropped']);
        expect(detector.detect).toHaveBeenCalledTimes(1);
        expect(throttler.busy).toBe(true);

        calls[0].resolve([FACE]);
        await throttler.idle();

        expect(throttler.busy).toBe(false);
        expect(onResult).toHaveBeenCalledTimes(1);
        expect(throttler.stats).toEqual({
            accepted: 1,
            dropped: 4,
            failedConversions: 0,
            failedDetections: 0,
            completed: 1,
        });
    });

    it('passes faces, input and the originating frame to onResult', async () => {
        const { detector, calls } = createControlledDetector();
        const onResult = vi.fn();
        const throttler = new DetectionThrottler({ detector, format: 'rgba8888', onResult });
        const frame = createFrame({
            planes: [{ bytes: new Uint8Array(24), bytesPerRow: 8 }],
            width: 2,
            height: 3,
            sensorOrientation: 270,
        });

        throttler.submit(frame);
        calls[0].resolve([FACE]);
        await throttler.idle();

        const [faces, input, sourceFrame] = onResult.mock.calls[0];
        expect(faces).toEqual([FACE]);
        expect(input.metadata).toEqual({
            size: { width: 2, height: 3 },
            rotation: 270,
            format: 'rgba8888',
            bytesPerRow: 8,
        });
        expect(sourceFrame).toBe(frame);
    });

    it('accepts again once the previous detection completed', async () => {
        const { detector, calls } = createControlledDetector();
        const throttler = new DetectionThrottler({ detector, format: 'nv21', onResult: vi.fn() });

        throttler.submit(createFrame());
        calls[0].resolve([]);
        await throttler.idle();

        expect(throttler.submit(createFrame())).toBe('accepted');
        expect(detector.detect).toHaveBeenCalledTimes(2);
    });

    it('clears busy and reports a DetectionError when the detector rejects', async () => {
        const { detector, calls } = createControlledDetector();
        const onResult = vi.fn();
        const onDetectionError = vi.fn();
        const throttler = new DetectionThrottler({
            detector,
            format: 'nv21',
            onResult,
            onDetectionError,
        });

        throttler.submit(createFrame());
        const cause = new Error('model crashed');
        calls[0].reject(cause);
        await throttler.idle();

        expect(throttler.busy).toBe(false);
        expect(onResult).not.toHaveBeenCalled();
        const [error] = onDetectionError.mock.calls[0];
        expect(error).toBeInstanceOf(DetectionError);
        expect(error.message).toBe('model crashed');
        expect(error.cause).toBe(cause);
        expect(throttler.stats.failedDetections).toBe(1);
    });

    it('clears busy when the detector throws synchronously', async () => {
        const detector: Detector = {
            detect: () => {
                throw new Error('sync failure');
            },
        };
        const onDetectionError = vi.fn();
        const throttler = new DetectionThrottler({
            detector,
            format: 'nv21',
            onResult: vi.fn(),
            onDetectionError,
        });

        expect(throttler.submit(createFrame())).toBe('accepted');
        await throttler.idle();

        expect(throttler.busy).toBe(false);
        expect(onDetectionError).toHaveBeenCalledTimes(1);
    });

    it('clears busy when the result handler throws', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const { detector, calls } = createControlledDetector();
        const throttler = new DetectionThrottler({
            detector,
            format: 'nv21',
            onResult: () => {
                throw new Error('handler failure');
            },
        });

        throttler.submit(createFrame());
        calls[0].resolve([FACE]);
        await throttler.idle();

        expect(throttler.busy).toBe(false);
        expect(errorSpy).toHaveBeenCalledWith(
            'Detection result handler failed',
            expect.any(Error),
        );
        errorSpy.mockRestore();
    });

    it('reports conversion failures without invoking the detector', () => {
        const { detector } = createControlledDetector();
        const onConversionError = vi.fn();
        const throttler = new DetectionThrottler({
            detector,
            format: 'nv21',
            onResult: vi.fn(),
            onConversionError,
        });

        expect(throttler.submit(createFrame({ planes: [] }))).toBe('conversion-failed');
        expect(throttler.busy).toBe(false);
        expect(detector.detect).not.toHaveBeenCalled();
        const [error] = onConversionError.mock.calls[0];
        expect(error).toBeInstanceOf(ConversionError);
        expect(error.reason).toBe('no-planes');
        expect(throttler.stats.failedConversions).toBe(1);
    });

    it('uses a custom converter when provided', () => {
        const { detector } = createControlledDetector();
        const convert = vi.fn(() => ({
            bytes: new Uint8Array(1),
            metadata: {
                size: { width: 1, height: 1 },
                rotation: 0 as const,
                format: 'nv21' as const,
                bytesPerRow: 1,
            },
        }));
        const throttler = new DetectionThrottler({
            detector,
            format: 'nv21',
            onResult: vi.fn(),
            convert,
        });

        throttler.submit(createFrame());

        expect(convert).toHaveBeenCalledTimes(1);
        expect(detector.detect).toHaveBeenCalledWith(convert.mock.results[0].value);
    });

    it('keeps the original failure of a custom converter as the cause', () => {
        const { detector } = createControlledDetector();
        const failure = new Error('decoder exploded');
        const onConversionError = vi.fn();
        const throttler = new DetectionThrottler({
            detector,
            format: 'nv21',
            onResult: vi.fn(),
            onConversionError,
            convert: () => {
                throw failure;
            },
        });

        expect(throttler.submit(createFrame())).toBe('conversion-failed');

        const [error] = onConversionError.mock.calls[0];
        expect(error).toBeInstanceOf(ConversionError);
        expect(error.reason).toBe('unknown');
        expect(error.message).toBe('decoder exploded');
        expect(error.cause).toBe(failure);
    });

    it('resolves idle immediately when nothing is in flight', async () => {
        const { detector } = createControlledDetector();
        const throttler = new DetectionThrottler({ detector, format: 'nv21', onResult: vi.fn() });

        await expect(throttler.idle()).resolves.toBeUndefined();
    });
});
