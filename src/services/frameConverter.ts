import {
    SENSOR_ROTATIONS,
    type DetectionInput,
    type DetectionInputMetadata,
    type FramePlane,
    type PixelFormat,
    type Platform,
    type RawFrame,
    type SensorRotation,
    type Size,
} from '@/types';
import { ConversionError } from '@/utils/pipelineErrors';

const PLATFORM_PIXEL_FORMATS: Record<Platform, PixelFormat> = {
    ios: 'bgra8888',
    android: 'nv21',
    web: 'rgba8888',
};

export const resolvePixelFormat = (platform: Platform): PixelFormat =>
    PLATFORM_PIXEL_FORMATS[platform];

export const detectPlatform = (userAgent?: string): Platform => {
    const agent = userAgent ?? (typeof navigator === 'undefined' ? '' : navigator.userAgent);
    if (/iPhone|iPad|iPod/i.test(agent)) {
        return 'ios';
    }
    if (/Android/i.test(agent)) {
        return 'android';
    }
    return 'web';
};

/**
 * Map a raw sensor orientation onto a canonical rotation.
 * Anything that is not exactly 0/90/180/270 falls back to 0.
 */
export const resolveRotation = (sensorOrientation: number): SensorRotation =>
    SENSOR_ROTATIONS.find((rotation) => rotation === sensorOrientation) ?? 0;

export const concatenatePlanes = (planes: readonly FramePlane[]): Uint8Array => {
    const total = planes.reduce((sum, plane) => sum + plane.bytes.byteLength, 0);
    const bytes = new Uint8Array(total);
    let offset = 0;
    for (const plane of planes) {
        bytes.set(plane.bytes, offset);
        offset += plane.bytes.byteLength;
    }
    return bytes;
};

const isPositiveDimension = (value: number): boolean => Number.isFinite(value) && value > 0;

export const convertFrame = (frame: RawFrame, format: PixelFormat): DetectionInput => {
    if (frame.planes.length === 0) {
        throw new ConversionError('no-planes', 'Frame has no pixel planes');
    }
    if (!isPositiveDimension(frame.width) || !isPositiveDimension(frame.height)) {
        throw new ConversionError(
            'invalid-size',
            `Frame size ${frame.width}x${frame.height} is not positive`,
        );
    }
    return {
        bytes: concatenatePlanes(frame.planes),
        metadata: {
            size: { width: frame.width, height: frame.height },
            rotation: resolveRotation(frame.sensorOrientation),
            format,
            bytesPerRow: frame.planes[0].bytesPerRow,
        },
    };
};

/** Size of the upright image the detector reports coordinates in. */
export const orientedImageSize = (metadata: DetectionInputMetadata): Size => {
    const { size, rotation } = metadata;
    if (rotation === 90 || rotation === 270) {
        return { width: size.height, height: size.width };
    }
    return { width: size.width, height: size.height };
};
