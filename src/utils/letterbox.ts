import type { Size } from '@/types';

export interface LetterboxTransform {
    scale: number;
    offsetX: number;
    offsetY: number;
}

export const IDENTITY_LETTERBOX: LetterboxTransform = { scale: 1, offsetX: 0, offsetY: 0 };

const isPositive = (value: number): boolean => Number.isFinite(value) && value > 0;

/**
 * Uniform scale that fits `content` inside `viewport` without cropping,
 * centred on both axes. Degenerate sizes give the identity transform.
 */
export const buildLetterboxTransform = (content: Size, viewport: Size): LetterboxTransform => {
    if (
        !isPositive(content.width) ||
        !isPositive(content.height) ||
        !isPositive(viewport.width) ||
        !isPositive(viewport.height)
    ) {
        return { ...IDENTITY_LETTERBOX };
    }
    const scale = Math.min(viewport.width / content.width, viewport.height / content.height);
    return {
        scale,
        offsetX: (viewport.width - content.width * scale) / 2,
        offsetY: (viewport.height - content.height * scale) / 2,
    };
};
