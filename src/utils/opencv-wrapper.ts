import type cvModule from '@techstark/opencv-js';

export type OpenCv = typeof cvModule;

const READY_TIMEOUT_MS = 30000;

let cvReadyPromise: Promise<OpenCv> | null = null;

/**
 * Loads OpenCV.js on first use and resolves once its runtime has finished
 * initializing. Newer builds export a promise, older ones an object that
 * fires onRuntimeInitialized.
 */
export function getOpenCv(): Promise<OpenCv> {
  if (!cvReadyPromise) {
    cvReadyPromise = import('@techstark/opencv-js').then(
      ({ default: cv }) =>
        new Promise<OpenCv>((resolve, reject) => {
          const timer = setTimeout(() => {
            reject(new Error(`OpenCV.js failed to load after ${READY_TIMEOUT_MS / 1000} seconds`));
          }, READY_TIMEOUT_MS);
          timer.unref();

          const ready = (loaded: OpenCv): void => {
            clearTimeout(timer);
            resolve(loaded);
          };

          if (cv instanceof Promise) {
            cv.then(ready, (error: unknown) => {
              clearTimeout(timer);
              reject(error instanceof Error ? error : new Error(String(error)));
            });
            return;
          }

          if (cv.Mat) {
            ready(cv);
            return;
          }

          const originalCallback = cv.onRuntimeInitialized;
          cv.onRuntimeInitialized = () => {
            if (typeof originalCallback === 'function') originalCallback();
            ready(cv);
          };
        })
    );
    // A failed load should not poison later attempts
    void cvReadyPromise.catch(() => {
      cvReadyPromise = null;
    });
  }

  return cvReadyPromise;
}
