import { useCallback, useEffect, useRef, useState } from 'react';

import {
    showDetectorWarningToast,
    showSourceUnavailableToast,
} from '@/components/common/StyledToast';
import { DEFAULT_LENS_FACING, resolveResolution } from '@/constants/camera';
import { usePipelineLogger } from '@/context/LogContext';
import {
    canToggleCamera as canToggleCameraList,
    listCameras,
    nextCameraIndex,
    pickInitialCamera,
} from '@/services/cameraDevices';
import type { ThrottlerStats } from '@/services/detectionThrottler';
import {
    FaceDetectionPipeline,
    PIPELINE_LOG_SCOPE,
    createRenderState,
    type PipelineSnapshot,
    type PipelineStatus,
} from '@/services/faceDetectionPipeline';
import type { FaceDetectorStatus } from '@/services/faceDetectorWorkerClient';
import { getFaceDetectorClient } from '@/services/faceDetectorSingleton';
import { VideoFrameSource } from '@/services/videoFrameSource';
import type { CameraDescriptor, Detector, FrameSource, RenderState } from '@/types';
import { normalizePipelineError } from '@/utils/pipelineErrors';

import type React from 'react';

export type FrameSourceFactory = (params: {
    camera: CameraDescriptor | null;
    video: HTMLVideoElement;
    resolutionId: string;
}) => FrameSource;

interface UseFaceDetectionPipelineParams {
    resolutionId: string;
    /** Overrides the worker-backed detector. */
    detector?: Detector;
    createSource?: FrameSourceFactory;
}

export interface FaceDetectionPipelineState {
    videoRef: React.RefObject<HTMLVideoElement>;
    renderState: RenderState;
    status: PipelineStatus;
    error: string | null;
    stats: ThrottlerStats;
    detectorStatus: FaceDetectorStatus;
    detectorError: string | null;
    cameras: CameraDescriptor[];
    activeCamera: CameraDescriptor | null;
    canToggleCamera: boolean;
    toggleCamera: () => void;
}

const EMPTY_STATS: ThrottlerStats = {
    accepted: 0,
    dropped: 0,
    failedConversions: 0,
    failedDetections: 0,
    completed: 0,
};

const INITIAL_SNAPSHOT: PipelineSnapshot = {
    renderState: createRenderState([], { width: 0, height: 0 }, DEFAULT_LENS_FACING),
    status: 'idle',
    error: null,
    stats: EMPTY_STATS,
};

const createVideoSource: FrameSourceFactory = ({ camera, video, resolutionId }) =>
    new VideoFrameSource({
        video,
        lensFacing: camera?.lensFacing ?? DEFAULT_LENS_FACING,
        deviceId: camera?.deviceId || undefined,
        resolution: resolveResolution(resolutionId),
    });

export const useFaceDetectionPipeline = ({
    resolutionId,
    detector: detectorOverride,
    createSource = createVideoSource,
}: UseFaceDetectionPipelineParams): FaceDetectionPipelineState => {
    const logger = usePipelineLogger();
    const videoRef = useRef<HTMLVideoElement>(null);
    const [pipeline, setPipeline] = useState<FaceDetectionPipeline | null>(null);
    const [snapshot, setSnapshot] = useState<PipelineSnapshot>(INITIAL_SNAPSHOT);
    const [detector, setDetector] = useState<Detector | null>(detectorOverride ?? null);
    const [detectorStatus, setDetectorStatus] = useState<FaceDetectorStatus>(
        detectorOverride ? 'ready' : 'idle',
    );
    const [detectorError, setDetectorError] = useState<string | null>(null);
    const [cameras, setCameras] = useState<CameraDescriptor[]>([]);
    const [cameraIndex, setCameraIndex] = useState(-1);
    const [cameraError, setCameraError] = useState<string | null>(null);
    const [camerasLoaded, setCamerasLoaded] = useState(false);

    // ========================================================================
    // Detector
    // ========================================================================

    useEffect(() => {
        if (detectorOverride) {
            setDetector(detectorOverride);
            setDetectorStatus('ready');
            return undefined;
        }
        let cancelled = false;
        try {
            const client = getFaceDetectorClient();
            setDetector(client);
            setDetectorStatus(client.getStatus());
            const unsubscribe = client.onStatus((status, payload) => {
                if (cancelled) {
                    return;
                }
                setDetectorStatus(status);
                if (status === 'error') {
                    setDetectorError(
                        typeof payload === 'string' ? payload : 'Face detector failed',
                    );
                }
            });
            client
                .init()
                .then(() => {
                    if (!cancelled) {
                        setDetectorError(null);
                    }
                })
                .catch((error) => {
                    if (!cancelled) {
                        const { message } = normalizePipelineError(error);
                        setDetectorStatus('error');
                        setDetectorError(message);
                        logger.logError(PIPELINE_LOG_SCOPE, `Face detector failed: ${message}`);
                        showDetectorWarningToast(message);
                    }
                });
            return () => {
                cancelled = true;
                unsubscribe();
            };
        } catch (error) {
            const { message } = normalizePipelineError(error);
            setDetectorStatus('error');
            setDetectorError(message);
            logger.logError(PIPELINE_LOG_SCOPE, `Unable to start face detector: ${message}`);
            showDetectorWarningToast(message);
            return undefined;
        }
    }, [detectorOverride, logger]);

    // ========================================================================
    // Pipeline lifetime
    // ========================================================================

    useEffect(() => {
        if (!detector) {
            return undefined;
        }
        const instance = new FaceDetectionPipeline({
            detector,
            // Canvas readback is RGBA on every platform
            format: 'rgba8888',
            logger,
        });
        setPipeline(instance);
        setSnapshot(instance.getSnapshot());
        const unsubscribe = instance.subscribe(setSnapshot);
        return () => {
            unsubscribe();
            instance.stop();
            setPipeline(null);
        };
    }, [detector, logger]);

    // ========================================================================
    // Camera enumeration
    // ========================================================================

    useEffect(() => {
        let cancelled = false;
        const syncCameras = async () => {
            try {
                const next = await listCameras();
                if (cancelled) {
                    return;
                }
                setCameraError(null);
                setCameras(next);
                // Keep the selection across device changes while it still exists
                setCameraIndex((current) =>
                    current >= 0 && current < next.length ? current : pickInitialCamera(next),
                );
                setCamerasLoaded(true);
            } catch (error) {
                if (cancelled) {
                    return;
                }
                const { message } = normalizePipelineError(error);
                setCameraError(message);
                logger.logError(PIPELINE_LOG_SCOPE, message);
            }
        };

        void syncCameras();
        if (typeof navigator !== 'undefined' && navigator.mediaDevices) {
            const handleDeviceChange = () => {
                void syncCameras();
            };
            navigator.mediaDevices.addEventListener('devicechange', handleDeviceChange);
            return () => {
                cancelled = true;
                navigator.mediaDevices.removeEventListener('devicechange', handleDeviceChange);
            };
        }
        return () => {
            cancelled = true;
        };
    }, [logger]);

    const activeCamera = cameraIndex >= 0 ? (cameras[cameraIndex] ?? null) : null;
    const activeDeviceId = activeCamera?.deviceId ?? null;
    const activeCameraRef = useRef(activeCamera);
    activeCameraRef.current = activeCamera;

    // ========================================================================
    // Streaming
    // ========================================================================

    useEffect(() => {
        const video = videoRef.current;
        if (!pipeline || !video || !camerasLoaded || cameraError) {
            return;
        }
        // Frames submitted before READY would only be rejected by the detector
        if (detectorStatus !== 'ready') {
            pipeline.stop();
            return;
        }
        const source = createSource({ camera: activeCameraRef.current, video, resolutionId });
        void pipeline.switchSource(source);
    }, [
        activeDeviceId,
        cameraError,
        cameraIndex,
        camerasLoaded,
        createSource,
        detectorStatus,
        pipeline,
        resolutionId,
    ]);

    const status: PipelineStatus = cameraError ? 'unavailable' : snapshot.status;
    const error = cameraError ?? snapshot.error;

    useEffect(() => {
        if (status === 'unavailable' && error) {
            showSourceUnavailableToast(error);
        }
    }, [error, status]);

    const canToggleCamera = canToggleCameraList(cameras);

    const toggleCamera = useCallback(() => {
        if (!canToggleCamera) {
            logger.logWarning(PIPELINE_LOG_SCOPE, 'Only one camera available; nothing to switch');
            return;
        }
        setCameraIndex((current) => nextCameraIndex(current, cameras.length));
    }, [cameras.length, canToggleCamera, logger]);

    return {
        videoRef,
        renderState: snapshot.renderState,
        status,
        error,
        stats: snapshot.stats,
        detectorStatus,
        detectorError,
        cameras,
        activeCamera,
        canToggleCamera,
        toggleCamera,
    };
};
