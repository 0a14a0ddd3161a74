import {
    ANNOTATION_TEXT_COLOR,
    EYE_OPEN_ABOVE,
    EYE_SEPARATOR,
    SMILE_NEUTRAL_ABOVE_PERCENT,
    SMILE_POSITIVE_ABOVE_PERCENT,
    TIER_COLORS,
} from '@/constants/overlay';
import type { Face } from '@/types';

import type { AnnotationLine, EyeState, SmileTier, TextSegment } from './types';

const SMILE_LABELS: Record<SmileTier, string> = {
    positive: 'Happy',
    neutral: 'Neutral',
    negative: 'Sad',
};

const EYE_LABELS: Record<EyeState, string> = {
    open: 'Open',
    closed: 'Closed',
};

const EYE_COLORS: Record<EyeState, string> = {
    open: TIER_COLORS.positive,
    closed: TIER_COLORS.negative,
};

export const toPercent = (probability: number): number => Math.round(probability * 100);

export const classifySmile = (probability: number): SmileTier => {
    const percent = toPercent(probability);
    if (percent > SMILE_POSITIVE_ABOVE_PERCENT) {
        return 'positive';
    }
    if (percent > SMILE_NEUTRAL_ABOVE_PERCENT) {
        return 'neutral';
    }
    return 'negative';
};

export const classifyEye = (probability: number): EyeState =>
    probability > EYE_OPEN_ABOVE ? 'open' : 'closed';

export const hasClassification = (face: Face): boolean =>
    face.smilingProbability !== undefined ||
    face.leftEyeOpenProbability !== undefined ||
    face.rightEyeOpenProbability !== undefined;

export const formatSmile = (probability: number): TextSegment => {
    const tier = classifySmile(probability);
    return {
        text: `${SMILE_LABELS[tier]} (${toPercent(probability)}%)`,
        color: TIER_COLORS[tier],
    };
};

const formatEye = (side: 'Left' | 'Right', probability: number): TextSegment => {
    const state = classifyEye(probability);
    return { text: `${side} Eye: ${EYE_LABELS[state]}`, color: EYE_COLORS[state] };
};

/**
 * Lines of the text block shown above a face, or null when the detector
 * returned no classification for it.
 */
export const buildFaceAnnotation = (face: Face): AnnotationLine[] | null => {
    if (!hasClassification(face)) {
        return null;
    }
    const lines: AnnotationLine[] = [];
    if (face.smilingProbability !== undefined) {
        lines.push([formatSmile(face.smilingProbability)]);
    }

    const eyes: TextSegment[] = [];
    if (face.leftEyeOpenProbability !== undefined) {
        eyes.push(formatEye('Left', face.leftEyeOpenProbability));
    }
    if (face.rightEyeOpenProbability !== undefined) {
        if (eyes.length > 0) {
            eyes.push({ text: EYE_SEPARATOR, color: ANNOTATION_TEXT_COLOR });
        }
        eyes.push(formatEye('Right', face.rightEyeOpenProbability));
    }
    if (eyes.length > 0) {
        lines.push(eyes);
    }
    return lines;
};
