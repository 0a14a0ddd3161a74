/**
 * Face overlay system for the camera preview.
 *
 * This module provides:
 * - The image-to-surface transform (uniform fit, centring, front-camera mirroring)
 * - Builders that turn faces into box, landmark and annotation descriptors
 * - A Canvas 2D renderer and the redraw predicate
 */

// Types
export type {
    AnnotationLine,
    AnnotationOverlay,
    BoxOverlay,
    EyeState,
    LandmarkOverlay,
    Overlay,
    OverlayCanvasContext,
    OverlayOptions,
    SmileTier,
    TextSegment,
} from './types';

// Annotations
export { buildFaceAnnotation, classifyEye, classifySmile, hasClassification } from './annotations';

// Builders
export {
    buildAllOverlays,
    buildAnnotationOverlay,
    buildBoxOverlay,
    buildFaceOverlays,
    buildLandmarkOverlays,
} from './builders';

export type { BuildAllOverlaysParams, FaceOverlayParams } from './builders';

// Renderer
export { layoutAnnotation, renderFaceOverlay, renderOverlays, shouldRedraw } from './renderer';

export type { AnnotationLayout } from './renderer';

// Projection
export { computeOverlayTransform, mapBoundingBox, mapPoint, mapX, mapY } from './projection';

export type { OverlayTransformParams } from './projection';
