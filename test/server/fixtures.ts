import type { NewImageInput } from '../../server/src/validation.js';

/** A distinct valid checksum per sequence number. */
export function checksum(n: number): string {
  return n.toString(16).padStart(32, '0');
}

export function rawImage(n: number, overrides: Partial<NewImageInput> = {}): NewImageInput {
  return {
    filename: `DSC_${String(n).padStart(4, '0')}.NEF`,
    filePath: `raw/DSC_${String(n).padStart(4, '0')}.NEF`,
    md5Checksum: checksum(n),
    isRaw: true,
    parentImageId: null,
    dateTaken: null,
    orderInBatch: null,
    pipelineVersion: 'v0.1.0',
    flashMissing: false,
    cropped: false,
    croppedDate: null,
    rotationDegrees: 0,
    rotatedDate: null,
    embeddedImages: 0,
    ...overrides,
  };
}

export function derivedImage(n: number, parentImageId: number, overrides: Partial<NewImageInput> = {}): NewImageInput {
  return rawImage(n, {
    filename: `painting_${n}.jpg`,
    filePath: `processed/painting_${n}.jpg`,
    isRaw: false,
    parentImageId,
    ...overrides,
  });
}

export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export function formRequest(fields: Record<string, string>): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(fields).toString(),
  };
}
