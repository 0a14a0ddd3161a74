/**
 * Tests for the canvas overlay renderer.
 */
import { describe, expect, it } from 'vitest';

import type { Face, RenderState } from '@/types';

import { layoutAnnotation, renderFaceOverlay, shouldRedraw } from '../renderer';

import { RecordingContext } from './recordingContext';

import type { AnnotationOverlay } from '../types';

const SURFACE = { width: 1080, height: 1920 };

const FACE: Face = {
    boundingBox: { left: 100, top: 50, right: 200, bottom: 150 },
    landmarks: {
        noseBase: { x: 150, y: 100 },
        leftEye: { x: 120, y: 80 },
    },
    smilingProbability: 0.85,
    leftEyeOpenProbability: 0.9,
    rightEyeOpenProbability: 0.2,
};

const createState = (overrides: Partial<RenderState> = {}): RenderState => ({
    faces: [FACE],
    imageSize: { width: 480, height: 640 },
    lensFacing: 'front',
    ...overrides,
});

const createAnnotation = (anchorY: number, lineCount: number): AnnotationOverlay => ({
    type: 'annotation',
    anchor: { x: 10, y: anchorY },
    lines: Array.from({ length: lineCount }, () => [{ text: 'abc', color: '#ffffff' }]),
});

describe('renderFaceOverlay', () => {
    it('only clears the surface when there are no faces', () => {
        const ctx = new RecordingContext();

        renderFaceOverlay(ctx, createState({ faces: [] }), SURFACE);

        expect(ctx.calls).toEqual([{ op: 'clearRect', args: [0, 0, 1080, 1920] }]);
    });

    it('strokes the mirrored, letterboxed box', () => {
        const ctx = new RecordingContext();

        renderFaceOverlay(ctx, createState(), SURFACE);

        expect(ctx.calls[0]).toEqual({ op: 'clearRect', args: [0, 0, 1080, 1920] });
        // scale 2.25, offsetY 240, mirrored around the 480px image width
        expect(ctx.ops('rect')).toEqual([{ op: 'rect', args: [630, 352.5, 225, 225] }]);
        expect(ctx.ops('stroke')).toHaveLength(1);
    });

    it('draws landmarks in canonical order', () => {
        const ctx = new RecordingContext();

        renderFaceOverlay(ctx, createState(), SURFACE);

        expect(ctx.ops('arc').map((call) => call.args)).toEqual([
            [810, 420, 4, 0, Math.PI * 2], // leftEye
            [742.5, 465, 4, 0, Math.PI * 2], // noseBase
        ]);
        expect(ctx.ops('fill').map((call) => call.fillStyle)).toEqual(['#ff3b30', '#ff3b30']);
    });

    it('draws the annotation background before its coloured text', () => {
        const ctx = new RecordingContext();

        renderFaceOverlay(ctx, createState(), SURFACE);

        // Widest line: "Left Eye: Open" + "  " + "Right Eye: Closed" = 330px, two lines = 36px
        // y = 352.5 - 36 - 5
        expect(ctx.ops('fillRect')).toEqual([
            {
                op: 'fillRect',
                args: [628, 309.5, 334, 40],
                fillStyle: 'rgba(142, 142, 147, 0.7)',
            },
        ]);
        expect(ctx.ops('fillText')).toEqual([
            { op: 'fillText', args: ['Happy (85%)', 630, 311.5], fillStyle: '#34c759' },
            { op: 'fillText', args: ['Left Eye: Open', 630, 329.5], fillStyle: '#34c759' },
            { op: 'fillText', args: ['  ', 770, 329.5], fillStyle: '#ffffff' },
            { op: 'fillText', args: ['Right Eye: Closed', 790, 329.5], fillStyle: '#ff3b30' },
        ]);
        const fillRectIndex = ctx.calls.findIndex((call) => call.op === 'fillRect');
        const firstTextIndex = ctx.calls.findIndex((call) => call.op === 'fillText');
        expect(fillRectIndex).toBeLessThan(firstTextIndex);
    });

    it('respects the visibility options', () => {
        const ctx = new RecordingContext();

        renderFaceOverlay(ctx, createState(), SURFACE, {
            showLandmarks: false,
            showAnnotations: false,
        });

        expect(ctx.ops('arc')).toEqual([]);
        expect(ctx.ops('fillText')).toEqual([]);
        expect(ctx.ops('rect')).toHaveLength(1);
    });

    it('draws in image pixels in raw mode', () => {
        const ctx = new RecordingContext();

        renderFaceOverlay(ctx, createState({ lensFacing: 'back' }), SURFACE, {
            fitMode: 'raw',
            showAnnotations: false,
        });

        expect(ctx.ops('rect')).toEqual([{ op: 'rect', args: [100, 50, 100, 100] }]);
    });

    it('balances every save with a restore', () => {
        const ctx = new RecordingContext();

        renderFaceOverlay(ctx, createState(), SURFACE);

        expect(ctx.ops('save').length).toBe(ctx.ops('restore').length);
    });
});

describe('layoutAnnotation', () => {
    it('places the block above the anchor', () => {
        const ctx = new RecordingContext();

        const layout = layoutAnnotation(ctx, createAnnotation(100, 2), { width: 200, height: 200 });

        expect(layout).toEqual({ x: 10, y: 59, width: 30, height: 36 });
        expect(ctx.font).toBe('bold 14px sans-serif');
    });

    it('clamps to the top edge', () => {
        const layout = layoutAnnotation(new RecordingContext(), createAnnotation(10, 1), {
            width: 200,
            height: 200,
        });

        expect(layout.y).toBe(0);
    });

    it('clamps to the bottom edge', () => {
        // preferred y = 500 - 18 - 5 = 477, surface allows at most 100 - 18 = 82
        const layout = layoutAnnotation(new RecordingContext(), createAnnotation(500, 1), {
            width: 200,
            height: 100,
        });

        expect(layout.y).toBe(82);
    });

    it('keeps the top edge when the surface is shorter than the block', () => {
        const layout = layoutAnnotation(new RecordingContext(), createAnnotation(50, 3), {
            width: 200,
            height: 20,
        });

        expect(layout.y).toBe(0);
    });
});

describe('shouldRedraw', () => {
    const state = createState();

    it('is true without a previous state', () => {
        expect(shouldRedraw(null, state)).toBe(true);
    });

    it('is false for the same state', () => {
        expect(shouldRedraw(state, state)).toBe(false);
        expect(shouldRedraw(state, { ...state })).toBe(false);
    });

    it('is true when the face list, image size or lens changes', () => {
        expect(shouldRedraw(state, { ...state, faces: [...state.faces] })).toBe(true);
        expect(shouldRedraw(state, { ...state, imageSize: { width: 640, height: 480 } })).toBe(
            true,
        );
        expect(shouldRedraw(state, { ...state, lensFacing: 'back' })).toBe(true);
    });
});
