import { DEFAULT_RESOLUTION_ID, RESOLUTION_OPTIONS } from '@/constants/camera';
import type { FitMode } from '@/types';

const STORAGE_KEY = 'face-overlay:settings';
export const OVERLAY_SETTINGS_STORAGE_KEY = STORAGE_KEY;
const CURRENT_VERSION = 1;

const FIT_MODES: readonly FitMode[] = ['uniform-fit', 'raw'];

export interface OverlaySettings {
    fitMode: FitMode;
    showLandmarks: boolean;
    showAnnotations: boolean;
    resolutionId: string;
}

export const DEFAULT_OVERLAY_SETTINGS: OverlaySettings = {
    fitMode: 'uniform-fit',
    showLandmarks: true,
    showAnnotations: true,
    resolutionId: DEFAULT_RESOLUTION_ID,
};

const isFitMode = (value: unknown): value is FitMode =>
    FIT_MODES.some((mode) => mode === value);

const isKnownResolution = (value: unknown): value is string =>
    typeof value === 'string' && RESOLUTION_OPTIONS.some((option) => option.id === value);

/** Unknown or malformed fields fall back to their defaults individually. */
const parseOverlaySettings = (input: unknown): OverlaySettings | null => {
    if (!input || typeof input !== 'object') {
        return null;
    }
    const candidate = input as Partial<OverlaySettings>;
    return {
        fitMode: isFitMode(candidate.fitMode)
            ? candidate.fitMode
            : DEFAULT_OVERLAY_SETTINGS.fitMode,
        showLandmarks:
            typeof candidate.showLandmarks === 'boolean'
                ? candidate.showLandmarks
                : DEFAULT_OVERLAY_SETTINGS.showLandmarks,
        showAnnotations:
            typeof candidate.showAnnotations === 'boolean'
                ? candidate.showAnnotations
                : DEFAULT_OVERLAY_SETTINGS.showAnnotations,
        resolutionId: isKnownResolution(candidate.resolutionId)
            ? candidate.resolutionId
            : DEFAULT_OVERLAY_SETTINGS.resolutionId,
    };
};

export const loadOverlaySettings = (storage?: Storage): OverlaySettings | null => {
    if (!storage) {
        return null;
    }
    const raw = storage.getItem(STORAGE_KEY);
    if (!raw) {
        return null;
    }
    try {
        const payload = JSON.parse(raw) as Partial<{ version?: number; settings?: unknown }>;
        if (!payload || typeof payload !== 'object' || payload.version !== CURRENT_VERSION) {
            return null;
        }
        return parseOverlaySettings(payload.settings);
    } catch (error) {
        console.warn('Failed to parse overlay settings', error);
        return null;
    }
};

export const getInitialOverlaySettings = (storage?: Storage): OverlaySettings =>
    loadOverlaySettings(storage) ?? { ...DEFAULT_OVERLAY_SETTINGS };

export const persistOverlaySettings = (
    storage: Storage | undefined,
    settings: OverlaySettings,
): void => {
    if (!storage) {
        return;
    }
    try {
        storage.setItem(
            STORAGE_KEY,
            JSON.stringify({
                version: CURRENT_VERSION,
                settings: { ...settings },
            }),
        );
    } catch (error) {
        console.warn('Failed to persist overlay settings', error);
    }
};
