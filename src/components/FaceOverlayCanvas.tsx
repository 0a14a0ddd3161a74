import React, { useEffect, useRef, useState } from 'react';

import { renderFaceOverlay, shouldRedraw, type OverlayOptions } from '@/overlays';
import type { RenderState, Size } from '@/types';

interface FaceOverlayCanvasProps extends OverlayOptions {
    renderState: RenderState;
    className?: string;
}

interface DrawnFrame {
    state: RenderState;
    width: number;
    height: number;
    optionsKey: string;
}

const useElementSize = <T extends HTMLElement>(): [React.RefObject<T>, Size] => {
    const ref = useRef<T>(null);
    const [size, setSize] = useState<Size>({ width: 0, height: 0 });

    useEffect(() => {
        const element = ref.current;
        if (!element) return;

        const resizeObserver = new ResizeObserver((entries) => {
            if (!entries || entries.length === 0) return;
            const { width, height } = entries[0].contentRect;
            setSize({ width: Math.round(width), height: Math.round(height) });
        });

        resizeObserver.observe(element);

        return () => {
            resizeObserver.disconnect();
        };
    }, []);

    return [ref, size];
};

/**
 * Canvas stacked over the preview. Redraws when the render state changes,
 * and always when the surface size or the overlay options change.
 */
const FaceOverlayCanvas: React.FC<FaceOverlayCanvasProps> = ({
    renderState,
    fitMode = 'uniform-fit',
    showLandmarks = true,
    showAnnotations = true,
    className,
}) => {
    const [containerRef, size] = useElementSize<HTMLDivElement>();
    const canvasRef = useRef<HTMLCanvasElement>(null);
    const lastDrawnRef = useRef<DrawnFrame | null>(null);

    useEffect(() => {
        const canvas = canvasRef.current;
        if (!canvas || size.width === 0 || size.height === 0) {
            return;
        }
        const optionsKey = `${fitMode}|${showLandmarks}|${showAnnotations}`;
        const previous = lastDrawnRef.current;
        const surfaceChanged =
            !previous ||
            previous.width !== size.width ||
            previous.height !== size.height ||
            previous.optionsKey !== optionsKey;
        if (!surfaceChanged && !shouldRedraw(previous.state, renderState)) {
            return;
        }
        if (canvas.width !== size.width || canvas.height !== size.height) {
            canvas.width = size.width;
            canvas.height = size.height;
        }
        const ctx = canvas.getContext('2d');
        if (!ctx) {
            return;
        }
        renderFaceOverlay(ctx, renderState, size, { fitMode, showLandmarks, showAnnotations });
        lastDrawnRef.current = {
            state: renderState,
            width: size.width,
            height: size.height,
            optionsKey,
        };
    }, [fitMode, renderState, showAnnotations, showLandmarks, size]);

    return (
        <div ref={containerRef} className={`pointer-events-none absolute inset-0 ${className ?? ''}`}>
            <canvas ref={canvasRef} className="h-full w-full" data-testid="face-overlay-canvas" />
        </div>
    );
};

export default FaceOverlayCanvas;
