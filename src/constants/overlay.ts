export const BOX_STROKE_COLOR = '#34c759';
export const BOX_LINE_WIDTH = 2;

export const LANDMARK_COLOR = '#ff3b30';
export const LANDMARK_RADIUS = 4;

export const ANNOTATION_FONT = 'bold 14px sans-serif';
export const ANNOTATION_LINE_HEIGHT = 18;
export const ANNOTATION_TEXT_COLOR = '#ffffff';
export const ANNOTATION_BACKGROUND = 'rgba(142, 142, 147, 0.7)';
// gap between the annotation block and the top of the face box
export const ANNOTATION_GAP = 5;
export const ANNOTATION_PADDING = 2;
export const EYE_SEPARATOR = '  ';

// Rounded percentages strictly above these select the tier.
export const SMILE_POSITIVE_ABOVE_PERCENT = 70;
export const SMILE_NEUTRAL_ABOVE_PERCENT = 40;
// Eye-open probability strictly above this counts as open.
export const EYE_OPEN_ABOVE = 0.5;

export const TIER_COLORS = {
    positive: '#34c759',
    neutral: '#ffcc00',
    negative: '#ff3b30',
} as const;
