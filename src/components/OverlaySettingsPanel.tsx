import React from 'react';

import { RESOLUTION_OPTIONS } from '@/constants/camera';
import type { OverlaySettings } from '@/services/overlaySettingsStorage';
import type { FitMode } from '@/types';

interface OverlaySettingsPanelProps {
    settings: OverlaySettings;
    onChange: (patch: Partial<OverlaySettings>) => void;
}

const FIT_MODE_OPTIONS: { value: FitMode; label: string }[] = [
    { value: 'uniform-fit', label: 'Fit to preview' },
    { value: 'raw', label: 'Raw pixels' },
];

const isFitMode = (value: string): value is FitMode =>
    FIT_MODE_OPTIONS.some((option) => option.value === value);

const OverlaySettingsPanel: React.FC<OverlaySettingsPanelProps> = ({ settings, onChange }) => (
    <section className="rounded-lg border border-gray-800 bg-gray-900/60 p-4">
        <h2 className="mb-3 text-lg font-semibold text-gray-100">Overlay</h2>
        <div className="flex flex-col gap-3 text-sm text-gray-300">
            <label className="flex items-center justify-between gap-3">
                <span>Scaling</span>
                <select
                    aria-label="Scaling"
                    value={settings.fitMode}
                    onChange={(event) => {
                        const { value } = event.target;
                        if (isFitMode(value)) {
                            onChange({ fitMode: value });
                        }
                    }}
                    className="rounded-md border border-gray-700 bg-gray-800 px-2 py-1 text-gray-100"
                >
                    {FIT_MODE_OPTIONS.map((option) => (
                        <option key={option.value} value={option.value}>
                            {option.label}
                        </option>
                    ))}
                </select>
            </label>
            <label className="flex items-center justify-between gap-3">
                <span>Resolution</span>
                <select
                    aria-label="Resolution"
                    value={settings.resolutionId}
                    onChange={(event) => onChange({ resolutionId: event.target.value })}
                    className="rounded-md border border-gray-700 bg-gray-800 px-2 py-1 text-gray-100"
                >
                    {RESOLUTION_OPTIONS.map((option) => (
                        <option key={option.id} value={option.id}>
                            {option.label}
                        </option>
                    ))}
                </select>
            </label>
            <label className="flex items-center gap-2">
                <input
                    type="checkbox"
                    checked={settings.showLandmarks}
                    onChange={(event) => onChange({ showLandmarks: event.target.checked })}
                />
                <span>Show landmarks</span>
            </label>
            <label className="flex items-center gap-2">
                <input
                    type="checkbox"
                    checked={settings.showAnnotations}
                    onChange={(event) => onChange({ showAnnotations: event.target.checked })}
                />
                <span>Show smile and eye labels</span>
            </label>
        </div>
    </section>
);

export default OverlaySettingsPanel;
