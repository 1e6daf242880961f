/**
 * Browser file helpers for look export / import
 */

export function exportFileName(now: Date = new Date()): string {
  return `looks-${now.getTime()}.json`;
}

const IMAGE_EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
  'image/gif': 'gif',
};

/** `look-<ms>.<ext>`, extension taken from a data URI's MIME type (png otherwise) */
export function lookImageFileName(image: string, now: Date = new Date()): string {
  const mime = /^data:([^;,]+)/.exec(image)?.[1] ?? '';
  return `look-${now.getTime()}.${IMAGE_EXTENSIONS[mime] ?? 'png'}`;
}

function clickDownload(href: string, filename: string): void {
  const link = document.createElement('a');
  link.href = href;
  link.download = filename;
  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);
}

export function downloadTextFile(filename: string, text: string, type = 'application/json'): void {
  const blob = new Blob([text], { type });
  const url = URL.createObjectURL(blob);
  clickDownload(url, filename);
  URL.revokeObjectURL(url);
}

/** Saves an image that is already a data URI (or plain URL) without going through a Blob */
export function downloadDataUrl(filename: string, dataUrl: string): void {
  clickDownload(dataUrl, filename);
}

function readFile(file: Blob, mode: 'text' | 'dataUrl'): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => {
      if (typeof reader.result === 'string') {
        resolve(reader.result);
      } else {
        reject(new Error('Unexpected file reader result'));
      }
    };
    reader.onerror = () => reject(reader.error ?? new Error('Error reading file'));
    if (mode === 'text') {
      reader.readAsText(file);
    } else {
      reader.readAsDataURL(file);
    }
  });
}

export function readFileAsText(file: Blob): Promise<string> {
  return readFile(file, 'text');
}

/** Avatar images are kept as data URIs */
export function readFileAsDataUrl(file: Blob): Promise<string> {
  return readFile(file, 'dataUrl');
}
