/**
 * Camera capture
 *
 * Streams the webcam into a <video> and turns the current frame into a PNG data URI.
 * The stream is stopped when the facing mode changes and when the component unmounts.
 */

import React, { useEffect, useRef, useState } from 'react';
import { createLogger } from '../services/logger';
import { errorMessage } from '../services/errors';

export type FacingMode = 'user' | 'environment';

/** The parts of MediaStream / MediaDevices this component touches */
export interface CameraStream {
  getTracks(): { stop(): void }[];
}

export interface CameraDevices {
  getUserMedia(constraints: MediaStreamConstraints): Promise<CameraStream>;
}

export const CAPTURE_WIDTH = 640;
export const CAPTURE_HEIGHT = 480;

const log = createLogger('Camera');

export function cameraConstraints(facingMode: FacingMode): MediaStreamConstraints {
  return {
    video: {
      facingMode,
      width: { ideal: CAPTURE_WIDTH },
      height: { ideal: CAPTURE_HEIGHT },
      frameRate: { ideal: 30 },
    },
    audio: false,
  };
}

export function cameraErrorMessage(error: unknown): string {
  const name = typeof error === 'object' && error !== null && 'name' in error ? String(error.name) : '';
  switch (name) {
    case 'NotAllowedError':
      return 'Camera access denied. Please allow camera access to create an avatar.';
    case 'NotFoundError':
      return 'No camera found. Please connect a camera to continue.';
    default:
      return `Error accessing camera: ${errorMessage(error)}`;
  }
}

/**
 * Draws the current video frame; null when the canvas has no 2D context.
 */
export function captureFrame(
  video: HTMLVideoElement,
  canvas: HTMLCanvasElement = document.createElement('canvas')
): string | null {
  canvas.width = video.videoWidth || CAPTURE_WIDTH;
  canvas.height = video.videoHeight || CAPTURE_HEIGHT;
  const context = canvas.getContext('2d');
  if (!context) return null;
  context.drawImage(video, 0, 0, canvas.width, canvas.height);
  return canvas.toDataURL('image/png');
}

const stopStream = (stream: CameraStream) => stream.getTracks().forEach(track => track.stop());

const isMediaStream = (stream: CameraStream): stream is MediaStream =>
  typeof MediaStream !== 'undefined' && stream instanceof MediaStream;

interface CameraCaptureProps {
  onCapture: (dataUrl: string) => void;
  mediaDevices?: CameraDevices;
  capture?: (video: HTMLVideoElement) => string | null;
}

type CameraStatus = 'starting' | 'live' | 'error';

export const CameraCapture: React.FC<CameraCaptureProps> = ({
  onCapture,
  mediaDevices,
  capture = captureFrame,
}) => {
  const videoRef = useRef<HTMLVideoElement>(null);
  const [facingMode, setFacingMode] = useState<FacingMode>('user');
  const [status, setStatus] = useState<CameraStatus>('starting');
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    const devices: CameraDevices | undefined = mediaDevices ?? navigator.mediaDevices;
    const video = videoRef.current;
    let cancelled = false;
    let stream: CameraStream | null = null;

    setStatus('starting');
    setError(null);

    const start = async () => {
      if (!devices?.getUserMedia) {
        throw new Error('this browser has no camera support');
      }
      const media = await devices.getUserMedia(cameraConstraints(facingMode));
      if (cancelled) {
        stopStream(media);
        return;
      }
      stream = media;
      if (video && isMediaStream(media)) {
        video.srcObject = media;
        await video.play();
      }
      if (!cancelled) setStatus('live');
    };

    void start().catch((reason: unknown) => {
      if (cancelled) return;
      const message = cameraErrorMessage(reason);
      log.warn(message);
      setError(message);
      setStatus('error');
    });

    return () => {
      cancelled = true;
      if (stream) stopStream(stream);
      if (video) video.srcObject = null;
    };
  }, [mediaDevices, facingMode]);

  const handleCapture = () => {
    const video = videoRef.current;
    if (!video) return;
    const dataUrl = capture(video);
    if (dataUrl) {
      onCapture(dataUrl);
    } else {
      setError('Could not capture an image from the camera');
    }
  };

  return (
    <div className="camera-capture">
      <video
        ref={videoRef}
        autoPlay
        playsInline
        muted
        aria-label="Camera preview"
        className="w-full rounded-lg mb-3 bg-black"
      />
      {error && (
        <div role="alert" className="mb-3 p-3 rounded-md text-xs bg-red-900/30 border border-red-700 text-red-300">
          {error}
        </div>
      )}
      <div className="flex gap-2">
        <button
          type="button"
          onClick={handleCapture}
          disabled={status !== 'live'}
          className="flex-1 px-4 py-2 rounded-md bg-[var(--color-primary)] text-white disabled:opacity-50"
        >
          📸 Capture
        </button>
        <button
          type="button"
          onClick={() => setFacingMode(mode => (mode === 'user' ? 'environment' : 'user'))}
          className="secondary-btn px-4 py-2 rounded-md bg-[var(--color-surface)]"
        >
          🔄 Switch camera
        </button>
      </div>
    </div>
  );
};
