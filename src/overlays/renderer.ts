/**
 * Canvas 2D overlay renderer.
 *
 * Draws overlay descriptors onto an OverlayCanvasContext. The only layout
 * decision made here is annotation placement, since it depends on text metrics.
 */
import {
    ANNOTATION_BACKGROUND,
    ANNOTATION_FONT,
    ANNOTATION_GAP,
    ANNOTATION_LINE_HEIGHT,
    ANNOTATION_PADDING,
} from '@/constants/overlay';
import type { RenderState, Size } from '@/types';

import { buildAllOverlays } from './builders';
import { computeOverlayTransform } from './projection';

import type {
    AnnotationLine,
    AnnotationOverlay,
    BoxOverlay,
    LandmarkOverlay,
    Overlay,
    OverlayCanvasContext,
    OverlayOptions,
} from './types';

// =============================================================================
// LAYOUT HELPERS
// =============================================================================

export interface AnnotationLayout {
    x: number;
    y: number;
    width: number;
    height: number;
}

const measureLine = (ctx: OverlayCanvasContext, line: AnnotationLine): number =>
    line.reduce((sum, segment) => sum + ctx.measureText(segment.text).width, 0);

/**
 * Place the text block just above the box, keeping it on the surface.
 * The top edge wins when the surface is shorter than the block.
 */
export const layoutAnnotation = (
    ctx: OverlayCanvasContext,
    overlay: AnnotationOverlay,
    surfaceSize: Size,
): AnnotationLayout => {
    ctx.font = ANNOTATION_FONT;
    const width = Math.max(0, ...overlay.lines.map((line) => measureLine(ctx, line)));
    const height = overlay.lines.length * ANNOTATION_LINE_HEIGHT;
    const preferredY = overlay.anchor.y - height - ANNOTATION_GAP;
    const y = Math.max(0, Math.min(preferredY, surfaceSize.height - height));
    return { x: overlay.anchor.x, y, width, height };
};

// =============================================================================
// INDIVIDUAL RENDERERS
// =============================================================================

const renderBox = (ctx: OverlayCanvasContext, overlay: BoxOverlay): void => {
    const { left, top, right, bottom } = overlay.bounds;
    ctx.save();
    ctx.strokeStyle = overlay.strokeColor;
    ctx.lineWidth = overlay.lineWidth;
    ctx.beginPath();
    ctx.rect(left, top, right - left, bottom - top);
    ctx.stroke();
    ctx.restore();
};

const renderLandmark = (ctx: OverlayCanvasContext, overlay: LandmarkOverlay): void => {
    ctx.save();
    ctx.fillStyle = overlay.color;
    ctx.beginPath();
    ctx.arc(overlay.position.x, overlay.position.y, overlay.radius, 0, Math.PI * 2);
    ctx.fill();
    ctx.restore();
};

const renderAnnotation = (
    ctx: OverlayCanvasContext,
    overlay: AnnotationOverlay,
    surfaceSize: Size,
): void => {
    ctx.save();
    const layout = layoutAnnotation(ctx, overlay, surfaceSize);

    // Background first so the text stays legible over the preview
    ctx.fillStyle = ANNOTATION_BACKGROUND;
    ctx.fillRect(
        layout.x - ANNOTATION_PADDING,
        layout.y - ANNOTATION_PADDING,
        layout.width + ANNOTATION_PADDING * 2,
        layout.height + ANNOTATION_PADDING * 2,
    );

    ctx.textBaseline = 'top';
    ctx.textAlign = 'left';
    overlay.lines.forEach((line, index) => {
        let x = layout.x;
        const y = layout.y + index * ANNOTATION_LINE_HEIGHT;
        for (const segment of line) {
            ctx.fillStyle = segment.color;
            ctx.fillText(segment.text, x, y);
            x += ctx.measureText(segment.text).width;
        }
    });
    ctx.restore();
};

// =============================================================================
// MAIN RENDER FUNCTIONS
// =============================================================================

export const renderOverlays = (
    ctx: OverlayCanvasContext,
    overlays: Overlay[],
    surfaceSize: Size,
): void => {
    for (const overlay of overlays) {
        switch (overlay.type) {
            case 'box':
                renderBox(ctx, overlay);
                break;
            case 'landmark':
                renderLandmark(ctx, overlay);
                break;
            case 'annotation':
                renderAnnotation(ctx, overlay, surfaceSize);
                break;
        }
    }
};

/**
 * Clear the surface and draw one RenderState.
 * The transform is derived from the state itself, never from a cached value.
 */
export const renderFaceOverlay = (
    ctx: OverlayCanvasContext,
    state: RenderState,
    surfaceSize: Size,
    options: OverlayOptions = {},
): void => {
    ctx.clearRect(0, 0, surfaceSize.width, surfaceSize.height);
    if (state.faces.length === 0) {
        return;
    }
    const transform = computeOverlayTransform({
        imageSize: state.imageSize,
        surfaceSize,
        lensFacing: state.lensFacing,
        fitMode: options.fitMode,
    });
    const overlays = buildAllOverlays({
        faces: state.faces,
        transform,
        showLandmarks: options.showLandmarks,
        showAnnotations: options.showAnnotations,
    });
    renderOverlays(ctx, overlays, surfaceSize);
};

/**
 * Whether `next` needs drawing given what was last drawn.
 * Faces compare by list identity: a new detection always produces a new list.
 */
export const shouldRedraw = (previous: RenderState | null, next: RenderState): boolean => {
    if (!previous) {
        return true;
    }
    return (
        previous.imageSize.width !== next.imageSize.width ||
        previous.imageSize.height !== next.imageSize.height ||
        previous.faces !== next.faces ||
        previous.lensFacing !== next.lensFacing
    );
};
