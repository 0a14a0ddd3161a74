/**
 * Declarative overlay types for the face preview.
 *
 * Builders produce these in surface pixel space; the renderer only draws them.
 */
import type { BoundingBox, FitMode, Point } from '@/types';

// =============================================================================
// DRAWING SURFACE
// =============================================================================

/**
 * The part of CanvasRenderingContext2D the renderer uses.
 * A real 2D context satisfies it; tests pass a recording fake.
 */
export interface OverlayCanvasContext {
    strokeStyle: string | CanvasGradient | CanvasPattern;
    fillStyle: string | CanvasGradient | CanvasPattern;
    lineWidth: number;
    font: string;
    textBaseline: CanvasTextBaseline;
    textAlign: CanvasTextAlign;
    save(): void;
    restore(): void;
    clearRect(x: number, y: number, width: number, height: number): void;
    beginPath(): void;
    rect(x: number, y: number, width: number, height: number): void;
    arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
    fill(): void;
    stroke(): void;
    fillRect(x: number, y: number, width: number, height: number): void;
    fillText(text: string, x: number, y: number): void;
    measureText(text: string): { width: number };
}

// =============================================================================
// ANNOTATION TYPES
// =============================================================================

export type SmileTier = 'positive' | 'neutral' | 'negative';

export type EyeState = 'open' | 'closed';

/** A run of text drawn in one colour. */
export interface TextSegment {
    text: string;
    color: string;
}

export type AnnotationLine = TextSegment[];

// =============================================================================
// OVERLAY TYPES (Discriminated Union)
// =============================================================================

export interface BoxOverlay {
    type: 'box';
    bounds: BoundingBox;
    strokeColor: string;
    lineWidth: number;
}

export interface LandmarkOverlay {
    type: 'landmark';
    position: Point;
    radius: number;
    color: string;
}

export interface AnnotationOverlay {
    type: 'annotation';
    /** Top-left corner of the face box on the surface; the text sits above it. */
    anchor: Point;
    lines: AnnotationLine[];
}

export type Overlay = BoxOverlay | LandmarkOverlay | AnnotationOverlay;

export interface OverlayOptions {
    fitMode?: FitMode;
    showLandmarks?: boolean;
    showAnnotations?: boolean;
}
