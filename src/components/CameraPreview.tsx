import React from 'react';

import type { PipelineStatus } from '@/services/faceDetectionPipeline';
import type { FitMode, RenderState } from '@/types';

import FaceOverlayCanvas from './FaceOverlayCanvas';

interface CameraPreviewProps {
    videoRef: React.RefObject<HTMLVideoElement>;
    renderState: RenderState;
    status: PipelineStatus;
    error: string | null;
    fitMode: FitMode;
    showLandmarks: boolean;
    showAnnotations: boolean;
    canToggleCamera: boolean;
    onToggleCamera: () => void;
}

const statusLabel = (status: PipelineStatus): string => {
    switch (status) {
        case 'starting':
            return 'Starting camera…';
        case 'running':
            return 'Live';
        case 'unavailable':
            return 'Camera unavailable';
        default:
            return 'Idle';
    }
};

// Raw mode pins the picture to the top-left; the flipped element needs it pinned right.
const videoFitClass = (fitMode: FitMode, mirrored: boolean): string => {
    if (fitMode === 'uniform-fit') {
        return 'object-contain';
    }
    return mirrored ? 'object-none object-right-top' : 'object-none object-left-top';
};

const CameraPreview: React.FC<CameraPreviewProps> = ({
    videoRef,
    renderState,
    status,
    error,
    fitMode,
    showLandmarks,
    showAnnotations,
    canToggleCamera,
    onToggleCamera,
}) => {
    const mirrored = renderState.lensFacing === 'front';
    const faceCount = renderState.faces.length;

    return (
        <section className="relative aspect-[3/4] w-full overflow-hidden rounded-lg border border-gray-800 bg-black md:aspect-video">
            <video
                ref={videoRef}
                muted
                playsInline
                autoPlay
                className={`h-full w-full ${videoFitClass(fitMode, mirrored)} ${
                    mirrored ? '-scale-x-100' : ''
                }`}
            />
            <FaceOverlayCanvas
                renderState={renderState}
                fitMode={fitMode}
                showLandmarks={showLandmarks}
                showAnnotations={showAnnotations}
            />
            {status === 'unavailable' ? (
                <div
                    role="alert"
                    className="absolute inset-0 flex flex-col items-center justify-center gap-2 bg-gray-950/80 p-6 text-center"
                >
                    <span className="text-lg font-semibold text-gray-100">
                        {statusLabel(status)}
                    </span>
                    {error && <span className="text-sm text-gray-400">{error}</span>}
                </div>
            ) : (
                <div className="absolute top-3 left-3 flex items-center gap-2 rounded-full bg-gray-900/70 px-3 py-1 text-xs text-gray-200">
                    <span
                        className={`size-2 rounded-full ${status === 'running' ? 'bg-emerald-400' : 'bg-gray-500'}`}
                    />
                    {statusLabel(status)}
                </div>
            )}
            <div
                data-testid="face-count"
                className="absolute bottom-3 left-3 rounded-md bg-gray-900/70 px-3 py-1 text-sm font-medium text-gray-100"
            >
                Faces detected: {faceCount}
            </div>
            {canToggleCamera && (
                <button
                    type="button"
                    onClick={onToggleCamera}
                    className="absolute right-3 bottom-3 rounded-md bg-gray-800/80 px-3 py-1 text-sm text-gray-100 transition hover:bg-gray-700"
                >
                    Switch camera
                </button>
            )}
        </section>
    );
};

export default CameraPreview;
