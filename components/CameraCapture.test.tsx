import { describe, expect, it, vi, type Mock } from 'vitest';
import { fireEvent, render, screen, waitFor } from '@testing-library/react';
import {
  CameraCapture,
  cameraConstraints,
  cameraErrorMessage,
  captureFrame,
  type CameraDevices,
} from './CameraCapture';

function fakeCamera() {
  const tracks: { stop: Mock }[] = [];
  const getUserMedia = vi.fn(async (_constraints: MediaStreamConstraints) => {
    const track = { stop: vi.fn() };
    tracks.push(track);
    return { getTracks: () => [track] };
  });
  const devices: CameraDevices = { getUserMedia };
  return { devices, getUserMedia, tracks };
}

const namedError = (name: string, message: string) => Object.assign(new Error(message), { name });

describe('cameraErrorMessage', () => {
  it('explains a denied permission', () => {
    expect(cameraErrorMessage(namedError('NotAllowedError', 'Permission denied')))
      .toBe('Camera access denied. Please allow camera access to create an avatar.');
  });

  it('explains a missing camera', () => {
    expect(cameraErrorMessage(namedError('NotFoundError', 'Requested device not found')))
      .toBe('No camera found. Please connect a camera to continue.');
  });

  it('passes other messages through', () => {
    expect(cameraErrorMessage(new Error('busy'))).toBe('Error accessing camera: busy');
  });
});

describe('captureFrame', () => {
  it('draws the frame at the default size and returns a PNG data URI', () => {
    const drawImage = vi.fn();
    const toDataURL = vi.fn(() => 'data:image/png;base64,AAAA');
    const canvas = document.createElement('canvas');
    Object.defineProperty(canvas, 'getContext', { value: () => ({ drawImage }) });
    Object.defineProperty(canvas, 'toDataURL', { value: toDataURL });
    const video = document.createElement('video');

    expect(captureFrame(video, canvas)).toBe('data:image/png;base64,AAAA');
    expect(drawImage).toHaveBeenCalledWith(video, 0, 0, 640, 480);
    expect(toDataURL).toHaveBeenCalledWith('image/png');
  });

  it('returns null without a 2D context', () => {
    const canvas = document.createElement('canvas');
    Object.defineProperty(canvas, 'getContext', { value: () => null });

    expect(captureFrame(document.createElement('video'), canvas)).toBeNull();
  });
});

describe('CameraCapture', () => {
  it('asks for the front camera and hands the captured frame over', async () => {
    const { devices, getUserMedia } = fakeCamera();
    const onCapture = vi.fn();
    render(
      <CameraCapture onCapture={onCapture} mediaDevices={devices} capture={() => 'data:image/png;base64,BBBB'} />
    );
    const button = screen.getByRole('button', { name: /Capture/ });

    expect(getUserMedia).toHaveBeenCalledWith(cameraConstraints('user'));
    await waitFor(() => expect(button.hasAttribute('disabled')).toBe(false));

    fireEvent.click(button);

    expect(onCapture).toHaveBeenCalledWith('data:image/png;base64,BBBB');
  });

  it('stops the stream on unmount', async () => {
    const { devices, tracks } = fakeCamera();
    const { unmount } = render(<CameraCapture onCapture={vi.fn()} mediaDevices={devices} />);
    await waitFor(() => expect(screen.getByRole('button', { name: /Capture/ }).hasAttribute('disabled')).toBe(false));

    unmount();

    expect(tracks).toHaveLength(1);
    expect(tracks[0].stop).toHaveBeenCalledTimes(1);
  });

  it('switches to the rear camera and releases the front one', async () => {
    const { devices, getUserMedia, tracks } = fakeCamera();
    render(<CameraCapture onCapture={vi.fn()} mediaDevices={devices} />);
    await waitFor(() => expect(screen.getByRole('button', { name: /Capture/ }).hasAttribute('disabled')).toBe(false));

    fireEvent.click(screen.getByRole('button', { name: /Switch camera/ }));

    await waitFor(() => expect(getUserMedia).toHaveBeenLastCalledWith(cameraConstraints('environment')));
    expect(tracks).toHaveLength(2);
    expect(tracks[0].stop).toHaveBeenCalledTimes(1);
    expect(tracks[1].stop).not.toHaveBeenCalled();
  });

  it('shows why the camera could not start', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const devices: CameraDevices = {
      getUserMedia: vi.fn(async () => {
        throw namedError('NotAllowedError', 'Permission denied');
      }),
    };
    render(<CameraCapture onCapture={vi.fn()} mediaDevices={devices} />);

    const alert = await screen.findByRole('alert');

    expect(alert.textContent).toBe('Camera access denied. Please allow camera access to create an avatar.');
    expect(screen.getByRole('button', { name: /Capture/ }).hasAttribute('disabled')).toBe(true);
  });

  it('reports a frame that could not be captured', async () => {
    const { devices } = fakeCamera();
    const onCapture = vi.fn();
    render(<CameraCapture onCapture={onCapture} mediaDevices={devices} capture={() => null} />);
    const button = screen.getByRole('button', { name: /Capture/ });
    await waitFor(() => expect(button.hasAttribute('disabled')).toBe(false));

    fireEvent.click(button);

    expect(onCapture).not.toHaveBeenCalled();
    expect(screen.getByRole('alert').textContent).toBe('Could not capture an image from the camera');
  });
});
