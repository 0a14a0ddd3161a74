import { describe, expect, it, vi } from 'vitest';

import type { DetectionInput, Face } from '@/types';

import {
    FaceDetectorWorkerClient,
    type DetectorWorker,
    type FaceDetectorWorkerMessage,
} from '../faceDetectorWorkerClient';

class FakeWorker implements DetectorWorker {
    readonly posted: { message: unknown; transfer: Transferable[] }[] = [];

    terminated = false;

    private readonly events = new EventTarget();

    addEventListener(type: 'message' | 'error', listener: (event: Event) => void): void {
        this.events.addEventListener(type, listener);
    }

    removeEventListener(type: 'message' | 'error', listener: (event: Event) => void): void {
        this.events.removeEventListener(type, listener);
    }

    postMessage(message: unknown, transfer: Transferable[]): void {
        this.posted.push({ message, transfer });
    }

    terminate(): void {
        this.terminated = true;
    }

    emit(data: FaceDetectorWorkerMessage): void {
        this.events.dispatchEvent(new MessageEvent('message', { data }));
    }

    fail(message: string): void {
        this.events.dispatchEvent(new ErrorEvent('error', { message }));
    }
}

const createClient = () => {
    const worker = new FakeWorker();
    const client = new FaceDetectorWorkerClient(() => worker);
    return { worker, client };
};

const createInput = (): DetectionInput => ({
    bytes: new Uint8Array([1, 2, 3, 4]),
    metadata: {
        size: { width: 1, height: 1 },
        rotation: 0,
        format: 'rgba8888',
        bytesPerRow: 4,
    },
});

const FACE: Face = {
    boundingBox: { left: 1, top: 2, right: 3, bottom: 4 },
    smilingProbability: 0.5,
};

describe('FaceDetectorWorkerClient', () => {
    it('sends the detector options on construction', () => {
        const { worker, client } = createClient();

        expect(worker.posted).toEqual([
            {
                message: {
                    type: 'INIT',
                    options: {
                        enableClassification: true,
                        enableLandmarks: true,
                        performanceMode: 'fast',
                    },
                },
                transfer: [],
            },
        ]);
        expect(client.getStatus()).toBe('loading');
    });

    it('rejects detection until the worker is ready', async () => {
        const { client } = createClient();

        await expect(client.detect(createInput())).rejects.toThrow('Face detector is not ready');
    });

    it('resolves init and notifies listeners on READY', async () => {
        const { worker, client } = createClient();
        const listener = vi.fn();
        client.onStatus(listener);
        const ready = client.init();

        worker.emit({ type: 'READY', model: 'face-lite', version: '2' });

        await expect(ready).resolves.toEqual({ model: 'face-lite', version: '2' });
        expect(client.getStatus()).toBe('ready');
        expect(listener).toHaveBeenCalledWith('ready', { model: 'face-lite', version: '2' });
        await expect(client.init()).resolves.toEqual({ model: 'face-lite', version: '2' });
    });

    it('transfers the frame buffer and resolves with the matching result', async () => {
        const { worker, client } = createClient();
        worker.emit({ type: 'READY' });
        const input = createInput();
        const { buffer } = input.bytes;

        const pending = client.detect(input);

        expect(worker.posted[1]).toEqual({
            message: { type: 'DETECT', requestId: 1, input },
            transfer: [buffer],
        });
        worker.emit({ type: 'DETECTION_RESULT', requestId: 1, faces: [FACE] });
        await expect(pending).resolves.toEqual([FACE]);
    });

    it('ignores results for unknown requests', async () => {
        const { worker, client } = createClient();
        worker.emit({ type: 'READY' });

        const pending = client.detect(createInput());
        worker.emit({ type: 'DETECTION_RESULT', requestId: 99, faces: [] });
        worker.emit({ type: 'DETECTION_RESULT', requestId: 1, faces: [FACE] });

        await expect(pending).resolves.toEqual([FACE]);
    });

    it('rejects only the request an ERROR refers to', async () => {
        const { worker, client } = createClient();
        worker.emit({ type: 'READY' });

        const first = client.detect(createInput());
        const second = client.detect(createInput());
        worker.emit({ type: 'ERROR', requestId: 1, message: 'bad frame' });
        worker.emit({ type: 'DETECTION_RESULT', requestId: 2, faces: [] });

        await expect(first).rejects.toThrow('bad frame');
        await expect(second).resolves.toEqual([]);
        expect(client.getStatus()).toBe('ready');
    });

    it('moves to error and rejects init on a general ERROR', async () => {
        const { worker, client } = createClient();
        const ready = client.init();

        worker.emit({ type: 'ERROR', message: 'model missing' });

        await expect(ready).rejects.toThrow('model missing');
        expect(client.getStatus()).toBe('error');
    });

    it('rejects pending requests when the worker crashes', async () => {
        const { worker, client } = createClient();
        worker.emit({ type: 'READY' });

        const pending = client.detect(createInput());
        worker.fail('worker crashed');

        await expect(pending).rejects.toThrow('worker crashed');
        expect(client.getStatus()).toBe('error');
    });

    it('terminates the worker and rejects pending requests on dispose', async () => {
        const { worker, client } = createClient();
        worker.emit({ type: 'READY' });
        const pending = client.detect(createInput());

        client.dispose();

        await expect(pending).rejects.toThrow('Worker disposed');
        expect(worker.terminated).toBe(true);
        expect(client.getStatus()).toBe('idle');
    });
});
