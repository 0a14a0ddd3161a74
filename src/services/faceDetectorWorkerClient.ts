import { FACE_DETECTOR_OPTIONS, FACE_DETECTOR_WORKER_URL } from '@/constants/camera';
import type { DetectionInput, Detector, Face } from '@/types';

export type FaceDetectorStatus = 'idle' | 'loading' | 'ready' | 'error';

export interface FaceDetectorReadyMessage {
    model?: string;
    version?: string;
}

interface StatusMessage extends FaceDetectorReadyMessage {
    type: 'STATUS';
    status: FaceDetectorStatus;
    message?: string;
}

interface ReadyMessage extends FaceDetectorReadyMessage {
    type: 'READY';
}

interface DetectionResultMessage {
    type: 'DETECTION_RESULT';
    requestId: number;
    faces: Face[];
}

interface ErrorMessage {
    type: 'ERROR';
    requestId?: number;
    message: string;
}

export type FaceDetectorWorkerMessage =
    | StatusMessage
    | ReadyMessage
    | DetectionResultMessage
    | ErrorMessage;

type StatusListener = (
    status: FaceDetectorStatus,
    payload?: FaceDetectorReadyMessage | string,
) => void;

interface PendingRequest {
    resolve: (faces: Face[]) => void;
    reject: (reason: unknown) => void;
}

/** The slice of Worker the client talks to. */
export interface DetectorWorker {
    postMessage(message: unknown, transfer: Transferable[]): void;
    addEventListener(type: 'message', listener: (event: MessageEvent) => void): void;
    addEventListener(type: 'error', listener: (event: ErrorEvent) => void): void;
    removeEventListener(type: 'message', listener: (event: MessageEvent) => void): void;
    removeEventListener(type: 'error', listener: (event: ErrorEvent) => void): void;
    terminate(): void;
}

const createDefaultWorker = (): DetectorWorker => {
    if (typeof Worker === 'undefined') {
        throw new Error('Web Workers are not supported in this environment');
    }
    return new Worker(FACE_DETECTOR_WORKER_URL, { type: 'classic' });
};

/**
 * Detector backed by a worker that runs the face model.
 * Requests are matched to responses by id; the worker owns the model.
 */
export class FaceDetectorWorkerClient implements Detector {
    private worker: DetectorWorker;

    private status: FaceDetectorStatus = 'idle';

    private listeners = new Set<StatusListener>();

    private requestId = 0;

    private pending = new Map<number, PendingRequest>();

    private readyResolver: ((payload: FaceDetectorReadyMessage) => void) | null = null;

    private readyReject: ((reason: unknown) => void) | null = null;

    private readyPromise: Promise<FaceDetectorReadyMessage> | null = null;

    private readyPayload: FaceDetectorReadyMessage | null = null;

    constructor(createWorker: () => DetectorWorker = createDefaultWorker) {
        this.worker = createWorker();
        this.worker.addEventListener('message', this.handleMessage);
        this.worker.addEventListener('error', this.handleWorkerError);
        this.worker.postMessage({ type: 'INIT', options: FACE_DETECTOR_OPTIONS }, []);
        this.updateStatus('loading');
    }

    init(): Promise<FaceDetectorReadyMessage> {
        if (this.readyPayload) {
            return Promise.resolve(this.readyPayload);
        }
        if (!this.readyPromise) {
            this.readyPromise = new Promise<FaceDetectorReadyMessage>((resolve, reject) => {
                this.readyResolver = resolve;
                this.readyReject = reject;
            });
        }
        return this.readyPromise;
    }

    getStatus(): FaceDetectorStatus {
        return this.status;
    }

    onStatus(listener: StatusListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    detect(input: DetectionInput): Promise<Face[]> {
        if (this.status !== 'ready') {
            return Promise.reject(new Error('Face detector is not ready'));
        }
        const requestId = ++this.requestId;
        // The buffer is transferred, so the caller must not touch input.bytes afterwards.
        const { buffer } = input.bytes;
        const transfer = buffer instanceof ArrayBuffer ? [buffer] : [];
        this.worker.postMessage({ type: 'DETECT', requestId, input }, transfer);
        return new Promise<Face[]>((resolve, reject) => {
            this.pending.set(requestId, { resolve, reject });
        });
    }

    dispose(): void {
        this.worker.removeEventListener('message', this.handleMessage);
        this.worker.removeEventListener('error', this.handleWorkerError);
        this.worker.terminate();
        this.updateStatus('idle');
        this.pending.forEach(({ reject }) => reject(new Error('Worker disposed')));
        this.pending.clear();
        if (this.readyReject) {
            this.readyReject(new Error('Worker disposed'));
            this.readyReject = null;
        }
        this.readyPromise = null;
        this.readyResolver = null;
        this.readyPayload = null;
    }

    private handleMessage = (event: MessageEvent<FaceDetectorWorkerMessage>) => {
        const message = event.data;
        switch (message.type) {
            case 'STATUS':
                this.updateStatus(message.status, message.message ?? message);
                break;
            case 'READY':
                this.readyPayload = {
                    model: message.model,
                    version: message.version,
                };
                this.updateStatus('ready', this.readyPayload);
                if (this.readyResolver) {
                    this.readyResolver(this.readyPayload);
                    this.readyResolver = null;
                    this.readyReject = null;
                }
                if (!this.readyPromise) {
                    this.readyPromise = Promise.resolve(this.readyPayload);
                }
                break;
            case 'DETECTION_RESULT':
                this.settleRequest(message.requestId, (pending) => pending.resolve(message.faces));
                break;
            case 'ERROR':
                if (typeof message.requestId === 'number' && this.pending.has(message.requestId)) {
                    this.settleRequest(message.requestId, (pending) =>
                        pending.reject(new Error(message.message)),
                    );
                } else {
                    this.updateStatus('error', message.message);
                    if (this.readyReject) {
                        this.readyReject(new Error(message.message));
                        this.readyReject = null;
                    }
                }
                break;
            default:
                break;
        }
    };

    private handleWorkerError = (event: ErrorEvent) => {
        this.updateStatus('error', event.message);
        this.pending.forEach(({ reject }) => reject(new Error(event.message)));
        this.pending.clear();
        if (this.readyReject) {
            this.readyReject(new Error(event.message));
            this.readyReject = null;
        }
    };

    private settleRequest(requestId: number, settle: (pending: PendingRequest) => void) {
        const pending = this.pending.get(requestId);
        if (!pending) {
            return;
        }
        this.pending.delete(requestId);
        settle(pending);
    }

    private updateStatus(status: FaceDetectorStatus, payload?: FaceDetectorReadyMessage | string) {
        this.status = status;
        this.listeners.forEach((listener) => listener(status, payload));
    }
}
