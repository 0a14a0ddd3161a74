import { FaceDetectorWorkerClient } from './faceDetectorWorkerClient';

let singleton: FaceDetectorWorkerClient | null = null;

export const getFaceDetectorClient = (): FaceDetectorWorkerClient => {
    if (!singleton) {
        singleton = new FaceDetectorWorkerClient();
    }
    return singleton;
};

export const resetFaceDetectorClient = () => {
    if (singleton) {
        singleton.dispose();
        singleton = null;
    }
};
