import { DEFAULT_SENSOR_ORIENTATION, type ResolutionOption } from '@/constants/camera';
import type { FrameListener, FrameSource, LensFacing, RawFrame } from '@/types';
import { SourceUnavailableError } from '@/utils/pipelineErrors';

export interface FrameCaptureContext {
    drawImage(image: HTMLVideoElement, dx: number, dy: number, dw: number, dh: number): void;
    getImageData(sx: number, sy: number, sw: number, sh: number): { data: Uint8ClampedArray };
}

/** The part of `HTMLCanvasElement` used for readback. */
export interface FrameCaptureCanvas {
    width: number;
    height: number;
    getContext(
        contextId: '2d',
        options: { willReadFrequently: boolean },
    ): FrameCaptureContext | null;
}

export interface VideoFrameSourceOptions {
    video: HTMLVideoElement;
    lensFacing: LensFacing;
    /** Omit to let the browser pick by facing mode. */
    deviceId?: string;
    resolution?: ResolutionOption;
    sensorOrientation?: number;
    createCanvas?: () => FrameCaptureCanvas;
}

const createDefaultCanvas = (): FrameCaptureCanvas => document.createElement('canvas');

/**
 * FrameSource over getUserMedia.
 *
 * Each animation frame the current picture is copied into an offscreen canvas
 * and emitted as a single packed RGBA plane.
 */
export class VideoFrameSource implements FrameSource {
    readonly lensFacing: LensFacing;

    private stream: MediaStream | null = null;

    private listeners = new Set<FrameListener>();

    private animationFrameId = 0;

    private canvas: FrameCaptureCanvas | null = null;

    private running = false;

    // Set by stop(); a start() still awaiting the camera must not touch the video
    private stopped = false;

    constructor(private readonly options: VideoFrameSourceOptions) {
        this.lensFacing = options.lensFacing;
    }

    onFrame(listener: FrameListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    async start(): Promise<void> {
        if (typeof navigator === 'undefined' || !navigator.mediaDevices) {
            throw new SourceUnavailableError('Browser does not support camera access.');
        }
        const { deviceId, resolution, video } = this.options;
        let stream: MediaStream;
        try {
            stream = await navigator.mediaDevices.getUserMedia({
                audio: false,
                video: {
                    deviceId: deviceId ? { exact: deviceId } : undefined,
                    facingMode: deviceId
                        ? undefined
                        : this.lensFacing === 'front'
                          ? 'user'
                          : 'environment',
                    width: resolution?.width,
                    height: resolution?.height,
                },
            });
        } catch (error) {
            throw new SourceUnavailableError(
                'Unable to access the selected camera. Please check permissions.',
                error,
            );
        }
        if (this.stopped) {
            stream.getTracks().forEach((track) => track.stop());
            return;
        }
        this.stream = stream;
        video.srcObject = stream;
        try {
            await video.play();
        } catch (playError) {
            console.warn('Video playback was blocked until user interaction', playError);
        }
        if (this.stopped) {
            return;
        }
        this.running = true;
        this.animationFrameId = requestAnimationFrame(this.loop);
    }

    stop(): void {
        this.stopped = true;
        this.running = false;
        cancelAnimationFrame(this.animationFrameId);
        if (this.stream) {
            const { video } = this.options;
            // The video element is shared with the next source
            if (video.srcObject === this.stream) {
                video.srcObject = null;
            }
            this.stream.getTracks().forEach((track) => track.stop());
            this.stream = null;
        }
    }

    private loop = () => {
        if (!this.running) {
            return;
        }
        const frame = this.captureFrame();
        if (frame) {
            this.listeners.forEach((listener) => listener(frame));
        }
        this.animationFrameId = requestAnimationFrame(this.loop);
    };

    private captureFrame(): RawFrame | null {
        const { video } = this.options;
        // HAVE_CURRENT_DATA
        if (video.readyState < 2 || !video.videoWidth || !video.videoHeight) {
            return null;
        }
        const width = video.videoWidth;
        const height = video.videoHeight;
        if (!this.canvas) {
            this.canvas = (this.options.createCanvas ?? createDefaultCanvas)();
        }
        if (this.canvas.width !== width || this.canvas.height !== height) {
            this.canvas.width = width;
            this.canvas.height = height;
        }
        const ctx = this.canvas.getContext('2d', { willReadFrequently: true });
        if (!ctx) {
            return null;
        }
        ctx.drawImage(video, 0, 0, width, height);
        const image = ctx.getImageData(0, 0, width, height);
        return {
            planes: [
                {
                    bytes: new Uint8Array(image.data.buffer),
                    bytesPerRow: width * 4,
                },
            ],
            width,
            height,
            sensorOrientation: this.options.sensorOrientation ?? DEFAULT_SENSOR_ORIENTATION,
            lensFacing: this.lensFacing,
        };
    }
}
