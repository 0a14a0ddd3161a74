import { afterEach, describe, expect, it, vi } from 'vitest';

import type { CameraDescriptor } from '@/types';
import { SourceUnavailableError } from '@/utils/pipelineErrors';

import {
    canToggleCamera,
    inferLensFacing,
    listCameras,
    nextCameraIndex,
    pickInitialCamera,
    toCameraDescriptors,
} from '../cameraDevices';

const createDevice = (kind: MediaDeviceKind, label: string, deviceId = label): MediaDeviceInfo => ({
    deviceId,
    groupId: 'group',
    kind,
    label,
    toJSON: () => ({}),
});

const camera = (lensFacing: CameraDescriptor['lensFacing'], deviceId: string): CameraDescriptor => ({
    deviceId,
    label: deviceId,
    lensFacing,
});

describe('inferLensFacing', () => {
    it('reads the facing from common label hints', () => {
        expect(inferLensFacing('Back Camera')).toBe('back');
        expect(inferLensFacing('camera2 1, facing back')).toBe('back');
        expect(inferLensFacing('Rear Wide')).toBe('back');
        expect(inferLensFacing('environment')).toBe('back');
        expect(inferLensFacing('Front Camera')).toBe('front');
        expect(inferLensFacing('FaceTime HD Camera')).toBe('front');
        expect(inferLensFacing('Integrated Webcam')).toBe('front');
    });

    it('assumes a user-facing camera without a hint', () => {
        expect(inferLensFacing('USB Video Device')).toBe('front');
        expect(inferLensFacing('')).toBe('front');
    });
});

describe('toCameraDescriptors', () => {
    it('keeps video inputs and names unlabeled ones', () => {
        const descriptors = toCameraDescriptors([
            createDevice('audioinput', 'Microphone'),
            createDevice('videoinput', 'Back Camera', 'cam-back'),
            createDevice('videoinput', '', 'cam-unknown'),
        ]);

        expect(descriptors).toEqual([
            { deviceId: 'cam-back', label: 'Back Camera', lensFacing: 'back' },
            { deviceId: 'cam-unknown', label: 'Camera 2', lensFacing: 'front' },
        ]);
    });
});

describe('camera selection', () => {
    it('prefers the first front camera', () => {
        expect(pickInitialCamera([camera('back', 'a'), camera('front', 'b')])).toBe(1);
    });

    it('falls back to the first camera, or -1 when there are none', () => {
        expect(pickInitialCamera([camera('back', 'a'), camera('back', 'b')])).toBe(0);
        expect(pickInitialCamera([])).toBe(-1);
    });

    it('offers toggling only with two or more cameras', () => {
        expect(canToggleCamera([camera('front', 'a')])).toBe(false);
        expect(canToggleCamera([camera('front', 'a'), camera('back', 'b')])).toBe(true);
    });

    it('cycles through cameras', () => {
        expect(nextCameraIndex(0, 2)).toBe(1);
        expect(nextCameraIndex(1, 2)).toBe(0);
        expect(nextCameraIndex(2, 3)).toBe(0);
        expect(nextCameraIndex(0, 0)).toBe(-1);
    });
});

describe('listCameras', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('fails with SourceUnavailableError without a media devices API', async () => {
        vi.stubGlobal('navigator', {});

        await expect(listCameras()).rejects.toBeInstanceOf(SourceUnavailableError);
    });

    it('enumerates video inputs', async () => {
        const enumerateDevices = vi.fn(async () => [
            createDevice('videoinput', 'Front Camera', 'front-1'),
        ]);
        vi.stubGlobal('navigator', { mediaDevices: { enumerateDevices } });

        await expect(listCameras()).resolves.toEqual([
            { deviceId: 'front-1', label: 'Front Camera', lensFacing: 'front' },
        ]);
    });
});
