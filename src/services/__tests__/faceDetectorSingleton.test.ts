import { afterEach, describe, expect, it, vi } from 'vitest';

import { getFaceDetectorClient, resetFaceDetectorClient } from '../faceDetectorSingleton';

const terminated: string[] = [];

class StubWorker {
    constructor(readonly url: string) {}

    postMessage(): void {}

    addEventListener(): void {}

    removeEventListener(): void {}

    terminate(): void {
        terminated.push(this.url);
    }
}

describe('faceDetectorSingleton', () => {
    afterEach(() => {
        resetFaceDetectorClient();
        terminated.length = 0;
        vi.unstubAllGlobals();
    });

    it('reuses one client until it is reset', () => {
        vi.stubGlobal('Worker', StubWorker);

        const first = getFaceDetectorClient();
        expect(getFaceDetectorClient()).toBe(first);

        resetFaceDetectorClient();

        expect(terminated).toHaveLength(1);
        expect(first.getStatus()).toBe('idle');
        expect(getFaceDetectorClient()).not.toBe(first);
    });

    it('does nothing when no client was created', () => {
        resetFaceDetectorClient();

        expect(terminated).toEqual([]);
    });
});
