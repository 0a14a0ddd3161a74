import React from 'react';

import { LogProvider } from './context/LogContext';
import FaceDetectionPage from './pages/FaceDetectionPage';

import type { FrameSourceFactory } from './hooks/useFaceDetectionPipeline';
import type { Detector } from './types';

interface AppProps {
    detector?: Detector;
    createSource?: FrameSourceFactory;
}

const App: React.FC<AppProps> = ({ detector, createSource }) => (
    <LogProvider>
        <div className="flex min-h-screen flex-col bg-gray-900 font-sans text-gray-200">
            <header className="border-b border-gray-800 px-4 py-3 md:px-8">
                <h1 className="text-lg font-semibold text-gray-100">Face Overlay Camera</h1>
            </header>
            <main data-testid="app-root" className="flex-1 overflow-auto px-4 py-6 md:px-8">
                <FaceDetectionPage detector={detector} createSource={createSource} />
            </main>
        </div>
    </LogProvider>
);

export default App;
