import { Result, fail, ok } from '../utils/result';

export type ImageFormat = 'jpeg' | 'png' | 'gif' | 'webp';

export type RejectionReason =
  | { kind: 'too-small'; size: number; minimum: number }
  | { kind: 'unknown-signature' };

interface Signature {
  format: ImageFormat;
  bytes: Buffer;
}

// RIFF is the container of WebP; the header alone is checked.
const SIGNATURES: readonly Signature[] = [
  { format: 'jpeg', bytes: Buffer.from([0xff, 0xd8, 0xff]) },
  { format: 'png', bytes: Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]) },
  { format: 'gif', bytes: Buffer.from('GIF87a', 'ascii') },
  { format: 'gif', bytes: Buffer.from('GIF89a', 'ascii') },
  { format: 'webp', bytes: Buffer.from('RIFF', 'ascii') },
];

/** Below this size a payload is taken to be an error page or placeholder. */
export const DEFAULT_MIN_IMAGE_BYTES = 1000;

export function detectFormat(bytes: Uint8Array): ImageFormat | null {
  const payload = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const signature = SIGNATURES.find(s => payload.subarray(0, s.bytes.length).equals(s.bytes));
  return signature ? signature.format : null;
}

export function describeRejection(reason: RejectionReason): string {
  switch (reason.kind) {
    case 'too-small':
      return `Image too small (${reason.size} bytes, minimum ${reason.minimum})`;
    case 'unknown-signature':
      return 'Invalid image format, likely HTML or an error page';
  }
}

/**
 * Cheap integrity gate on fetched bytes: a size floor plus a container
 * signature check. Does not decode the image.
 */
export class ImageValidator {
  constructor(private readonly minBytes: number = DEFAULT_MIN_IMAGE_BYTES) {}

  validate(bytes: Uint8Array): Result<ImageFormat, RejectionReason> {
    if (bytes.byteLength < this.minBytes) {
      return fail({ kind: 'too-small', size: bytes.byteLength, minimum: this.minBytes });
    }
    const format = detectFormat(bytes);
    return format ? ok(format) : fail({ kind: 'unknown-signature' });
  }
}
