export type LensFacing = 'front' | 'back';

/** Canonical clockwise rotations a detector understands. */
export type SensorRotation = 0 | 90 | 180 | 270;

export const SENSOR_ROTATIONS: readonly SensorRotation[] = [0, 90, 180, 270];

/**
 * Pixel layout of a detection buffer.
 * - nv21: planar YUV 4:2:0 (Android camera streams)
 * - bgra8888: packed BGRA (iOS camera streams)
 * - rgba8888: packed RGBA (canvas ImageData in the browser)
 */
export type PixelFormat = 'nv21' | 'bgra8888' | 'rgba8888';

export type Platform = 'ios' | 'android' | 'web';

export interface Size {
    width: number;
    height: number;
}

export interface Point {
    x: number;
    y: number;
}

// =============================================================================
// FRAMES
// =============================================================================

export interface FramePlane {
    bytes: Uint8Array;
    bytesPerRow: number;
}

/**
 * One capture tick as delivered by a FrameSource.
 * `sensorOrientation` is whatever the source reports and may be non-canonical.
 */
export interface RawFrame {
    readonly planes: readonly FramePlane[];
    readonly width: number;
    readonly height: number;
    readonly sensorOrientation: number;
    readonly lensFacing: LensFacing;
}

export interface DetectionInputMetadata {
    size: Size;
    rotation: SensorRotation;
    format: PixelFormat;
    bytesPerRow: number;
}

export interface DetectionInput {
    bytes: Uint8Array;
    metadata: DetectionInputMetadata;
}

// =============================================================================
// FACES
// =============================================================================

export type FaceLandmarkType =
    | 'leftEar'
    | 'rightEar'
    | 'leftEye'
    | 'rightEye'
    | 'noseBase'
    | 'leftCheek'
    | 'rightCheek'
    | 'leftMouth'
    | 'rightMouth'
    | 'bottomMouth';

/** Landmarks drawn by the overlay, in draw order. */
export const FACE_LANDMARK_TYPES: readonly FaceLandmarkType[] = [
    'leftEar',
    'rightEar',
    'leftEye',
    'rightEye',
    'noseBase',
    'leftCheek',
    'rightCheek',
    'leftMouth',
    'rightMouth',
    'bottomMouth',
];

export interface BoundingBox {
    left: number;
    top: number;
    right: number;
    bottom: number;
}

/** A detected face. All coordinates are in the pixel space of the image fed to the detector. */
export interface Face {
    boundingBox: BoundingBox;
    landmarks?: Partial<Record<FaceLandmarkType, Point>>;
    /** Probability in [0, 1] */
    smilingProbability?: number;
    leftEyeOpenProbability?: number;
    rightEyeOpenProbability?: number;
    trackingId?: number;
}

// =============================================================================
// OVERLAY
// =============================================================================

export type FitMode = 'uniform-fit' | 'raw';

export interface OverlayTransform {
    scale: number;
    offsetX: number;
    offsetY: number;
    mirror: boolean;
    /** Width of the detector image, needed to mirror X coordinates */
    imageWidth: number;
}

/**
 * Everything the overlay needs to draw one detection result.
 * Replaced as a whole; never mutated.
 */
export interface RenderState {
    readonly faces: readonly Face[];
    readonly imageSize: Size;
    readonly lensFacing: LensFacing;
}

// =============================================================================
// EXTERNAL COLLABORATORS
// =============================================================================

export interface Detector {
    detect(input: DetectionInput): Promise<Face[]>;
}

export type FrameListener = (frame: RawFrame) => void;

export interface FrameSource {
    readonly lensFacing: LensFacing;
    /** Returns an unsubscribe function. */
    onFrame(listener: FrameListener): () => void;
    start(): Promise<void>;
    stop(): void;
}

export interface CameraDescriptor {
    deviceId: string;
    label: string;
    lensFacing: LensFacing;
}
