/**
 * Maps detector image coordinates onto the render surface.
 *
 * The transform is a pure function of image size, surface size, lens and fit
 * mode. It is rebuilt for every draw from the RenderState being drawn, so a
 * face list is never paired with geometry from a different frame.
 */
import type { BoundingBox, FitMode, LensFacing, OverlayTransform, Point, Size } from '@/types';
import { buildLetterboxTransform, IDENTITY_LETTERBOX } from '@/utils/letterbox';

export interface OverlayTransformParams {
    imageSize: Size;
    surfaceSize: Size;
    lensFacing: LensFacing;
    fitMode?: FitMode;
}

export const computeOverlayTransform = ({
    imageSize,
    surfaceSize,
    lensFacing,
    fitMode = 'uniform-fit',
}: OverlayTransformParams): OverlayTransform => {
    const letterbox =
        fitMode === 'raw' ? IDENTITY_LETTERBOX : buildLetterboxTransform(imageSize, surfaceSize);
    return {
        scale: letterbox.scale,
        offsetX: letterbox.offsetX,
        offsetY: letterbox.offsetY,
        mirror: lensFacing === 'front',
        imageWidth: imageSize.width,
    };
};

/** Front-camera images are mirrored horizontally: x becomes imageWidth - x. */
export const mapX = (x: number, transform: OverlayTransform): number => {
    const source = transform.mirror ? transform.imageWidth - x : x;
    return source * transform.scale + transform.offsetX;
};

// Y is never mirrored.
export const mapY = (y: number, transform: OverlayTransform): number =>
    y * transform.scale + transform.offsetY;

export const mapPoint = (point: Point, transform: OverlayTransform): Point => ({
    x: mapX(point.x, transform),
    y: mapY(point.y, transform),
});

/**
 * Map a box onto the surface. Under mirroring the image's right edge becomes
 * the screen's left edge, so the result always has left <= right.
 */
export const mapBoundingBox = (box: BoundingBox, transform: OverlayTransform): BoundingBox => {
    const left = transform.mirror ? mapX(box.right, transform) : mapX(box.left, transform);
    const right = transform.mirror ? mapX(box.left, transform) : mapX(box.right, transform);
    return {
        left,
        top: mapY(box.top, transform),
        right,
        bottom: mapY(box.bottom, transform),
    };
};
