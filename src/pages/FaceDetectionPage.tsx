import React, { useEffect, useMemo, useState } from 'react';

import CameraPreview from '@/components/CameraPreview';
import LogConsole from '@/components/LogConsole';
import OverlaySettingsPanel from '@/components/OverlaySettingsPanel';
import {
    useFaceDetectionPipeline,
    type FrameSourceFactory,
} from '@/hooks/useFaceDetectionPipeline';
import { PIPELINE_LOG_SCOPE } from '@/services/faceDetectionPipeline';
import {
    getInitialOverlaySettings,
    persistOverlaySettings,
    type OverlaySettings,
} from '@/services/overlaySettingsStorage';
import type { Detector } from '@/types';

interface FaceDetectionPageProps {
    detector?: Detector;
    createSource?: FrameSourceFactory;
}

const FaceDetectionPage: React.FC<FaceDetectionPageProps> = ({ detector, createSource }) => {
    const resolvedStorage = useMemo(
        () => (typeof window !== 'undefined' ? window.localStorage : undefined),
        [],
    );
    const [settings, setSettings] = useState<OverlaySettings>(() =>
        getInitialOverlaySettings(resolvedStorage),
    );

    useEffect(() => {
        persistOverlaySettings(resolvedStorage, settings);
    }, [resolvedStorage, settings]);

    const {
        videoRef,
        renderState,
        status,
        error,
        stats,
        detectorStatus,
        detectorError,
        activeCamera,
        canToggleCamera,
        toggleCamera,
    } = useFaceDetectionPipeline({
        resolutionId: settings.resolutionId,
        detector,
        createSource,
    });

    const handleSettingsChange = (patch: Partial<OverlaySettings>) => {
        setSettings((prev) => ({ ...prev, ...patch }));
    };

    return (
        <div className="grid gap-6 lg:grid-cols-[minmax(0,2fr)_minmax(0,1fr)]">
            <div className="flex flex-col gap-3">
                <CameraPreview
                    videoRef={videoRef}
                    renderState={renderState}
                    status={status}
                    error={error}
                    fitMode={settings.fitMode}
                    showLandmarks={settings.showLandmarks}
                    showAnnotations={settings.showAnnotations}
                    canToggleCamera={canToggleCamera}
                    onToggleCamera={toggleCamera}
                />
                <p className="text-xs text-gray-500">
                    {activeCamera ? activeCamera.label : 'Default camera'} ·{' '}
                    {renderState.lensFacing === 'front' ? 'front' : 'back'} lens
                </p>
            </div>
            <aside className="flex flex-col gap-4">
                <OverlaySettingsPanel settings={settings} onChange={handleSettingsChange} />
                <section className="rounded-lg border border-gray-800 bg-gray-900/60 p-4 text-sm">
                    <h2 className="mb-3 text-lg font-semibold text-gray-100">Detector</h2>
                    <dl className="grid grid-cols-2 gap-y-1 text-gray-300">
                        <dt className="text-gray-500">Status</dt>
                        <dd data-testid="detector-status">{detectorStatus}</dd>
                        <dt className="text-gray-500">Processed</dt>
                        <dd>{stats.completed}</dd>
                        <dt className="text-gray-500">Dropped</dt>
                        <dd>{stats.dropped}</dd>
                        <dt className="text-gray-500">Failed</dt>
                        <dd>{stats.failedDetections + stats.failedConversions}</dd>
                    </dl>
                    {detectorError && (
                        <p className="mt-2 text-xs text-rose-300">{detectorError}</p>
                    )}
                </section>
                <LogConsole scope={PIPELINE_LOG_SCOPE} />
            </aside>
        </div>
    );
};

export default FaceDetectionPage;
