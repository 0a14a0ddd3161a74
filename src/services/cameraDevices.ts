import type { CameraDescriptor, LensFacing } from '@/types';
import { SourceUnavailableError } from '@/utils/pipelineErrors';

const FRONT_LABEL = /front|user|facetime|integrated/i;
const BACK_LABEL = /back|rear|environment/i;

export const inferLensFacing = (label: string): LensFacing => {
    if (BACK_LABEL.test(label)) {
        return 'back';
    }
    if (FRONT_LABEL.test(label)) {
        return 'front';
    }
    // Desktop webcams without a hint face the user.
    return 'front';
};

export const toCameraDescriptors = (devices: readonly MediaDeviceInfo[]): CameraDescriptor[] =>
    devices
        .filter((device) => device.kind === 'videoinput')
        .map((device, index) => ({
            deviceId: device.deviceId,
            label: device.label || `Camera ${index + 1}`,
            lensFacing: inferLensFacing(device.label),
        }));

/** Index of the first front camera, 0 if none faces front, -1 when there are none. */
export const pickInitialCamera = (cameras: readonly CameraDescriptor[]): number => {
    if (cameras.length === 0) {
        return -1;
    }
    const front = cameras.findIndex((camera) => camera.lensFacing === 'front');
    return front === -1 ? 0 : front;
};

export const canToggleCamera = (cameras: readonly CameraDescriptor[]): boolean =>
    cameras.length >= 2;

export const nextCameraIndex = (current: number, count: number): number =>
    count <= 0 ? -1 : (current + 1) % count;

export const listCameras = async (): Promise<CameraDescriptor[]> => {
    if (typeof navigator === 'undefined' || !navigator.mediaDevices) {
        throw new SourceUnavailableError('Media devices API is unavailable in this environment.');
    }
    const devices = await navigator.mediaDevices.enumerateDevices();
    return toCameraDescriptors(devices);
};
