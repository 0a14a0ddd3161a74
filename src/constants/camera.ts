import type { LensFacing } from '@/types';

export interface ResolutionOption {
    id: string;
    label: string;
    width?: number;
    height?: number;
}

export const RESOLUTION_OPTIONS: ResolutionOption[] = [
    { id: 'auto', label: 'Auto' },
    { id: 'vga', label: '640 x 480', width: 640, height: 480 },
    { id: '720p', label: '1280 x 720', width: 1280, height: 720 },
    { id: '1080p', label: '1920 x 1080', width: 1920, height: 1080 },
];

export const DEFAULT_RESOLUTION_ID = '720p';

export const resolveResolution = (id: string): ResolutionOption =>
    RESOLUTION_OPTIONS.find((option) => option.id === id) ?? RESOLUTION_OPTIONS[0];

// Browser video frames arrive upright, so the default is no rotation.
export const DEFAULT_SENSOR_ORIENTATION = 0;

export const DEFAULT_LENS_FACING: LensFacing = 'front';

export const FACE_DETECTOR_WORKER_URL =
    process.env.FACE_DETECTOR_WORKER_URL || '/face-detector-worker.js';

/** Options handed to the detector worker on init. */
export const FACE_DETECTOR_OPTIONS = {
    enableClassification: true,
    enableLandmarks: true,
    performanceMode: 'fast',
} as const;
