/**
 * Builder functions to convert detection results to overlay descriptors.
 *
 * Coordinate mapping happens here, at the boundary: every descriptor leaving
 * this module is already in surface pixels.
 */
import {
    BOX_LINE_WIDTH,
    BOX_STROKE_COLOR,
    LANDMARK_COLOR,
    LANDMARK_RADIUS,
} from '@/constants/overlay';
import { FACE_LANDMARK_TYPES, type Face, type OverlayTransform } from '@/types';

import { buildFaceAnnotation } from './annotations';
import { mapBoundingBox, mapPoint } from './projection';

import type { AnnotationOverlay, BoxOverlay, LandmarkOverlay, Overlay } from './types';

export interface FaceOverlayParams {
    face: Face;
    transform: OverlayTransform;
    showLandmarks?: boolean;
    showAnnotations?: boolean;
}

export const buildBoxOverlay = (face: Face, transform: OverlayTransform): BoxOverlay => ({
    type: 'box',
    bounds: mapBoundingBox(face.boundingBox, transform),
    strokeColor: BOX_STROKE_COLOR,
    lineWidth: BOX_LINE_WIDTH,
});

/** Landmarks missing from the face are skipped. */
export const buildLandmarkOverlays = (
    face: Face,
    transform: OverlayTransform,
): LandmarkOverlay[] => {
    const overlays: LandmarkOverlay[] = [];
    for (const type of FACE_LANDMARK_TYPES) {
        const point = face.landmarks?.[type];
        if (!point) {
            continue;
        }
        overlays.push({
            type: 'landmark',
            position: mapPoint(point, transform),
            radius: LANDMARK_RADIUS,
            color: LANDMARK_COLOR,
        });
    }
    return overlays;
};

export const buildAnnotationOverlay = (
    face: Face,
    box: BoxOverlay,
): AnnotationOverlay | null => {
    const lines = buildFaceAnnotation(face);
    if (!lines) {
        return null;
    }
    return {
        type: 'annotation',
        anchor: { x: box.bounds.left, y: box.bounds.top },
        lines,
    };
};

export const buildFaceOverlays = ({
    face,
    transform,
    showLandmarks = true,
    showAnnotations = true,
}: FaceOverlayParams): Overlay[] => {
    const box = buildBoxOverlay(face, transform);
    const overlays: Overlay[] = [box];
    if (showLandmarks) {
        overlays.push(...buildLandmarkOverlays(face, transform));
    }
    if (showAnnotations) {
        const annotation = buildAnnotationOverlay(face, box);
        if (annotation) {
            overlays.push(annotation);
        }
    }
    return overlays;
};

export interface BuildAllOverlaysParams {
    faces: readonly Face[];
    transform: OverlayTransform;
    showLandmarks?: boolean;
    showAnnotations?: boolean;
}

export const buildAllOverlays = ({ faces, ...rest }: BuildAllOverlaysParams): Overlay[] =>
    faces.flatMap((face) => buildFaceOverlays({ face, ...rest }));
