import { ImageFormat } from '../entities/ImageAsset';

export interface ImageDimensions {
    width: number;
    height: number;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * Detects the image format from its leading bytes.
 * JPEG is reported as 'jpeg'.
 */
export function detectFormat(bytes: Buffer): ImageFormat | undefined {
    if (bytes.length >= 8 && bytes.subarray(0, 8).equals(PNG_SIGNATURE)) {
        return 'png';
    }
    if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
        return 'jpeg';
    }
    if (bytes.length >= 6 && bytes.toString('ascii', 0, 4) === 'GIF8') {
        return 'gif';
    }
    if (bytes.length >= 12 && bytes.toString('ascii', 0, 4) === 'RIFF' && bytes.toString('ascii', 8, 12) === 'WEBP') {
        return 'webp';
    }
    return undefined;
}

/**
 * Reads pixel dimensions from the image header without decoding pixels.
 * Returns undefined when the header is missing or not understood.
 */
export function readDimensions(bytes: Buffer): ImageDimensions | undefined {
    switch (detectFormat(bytes)) {
        case 'png':
            return readPng(bytes);
        case 'jpeg':
            return readJpeg(bytes);
        case 'gif':
            return readGif(bytes);
        case 'webp':
            return readWebp(bytes);
        default:
            return undefined;
    }
}

function readPng(bytes: Buffer): ImageDimensions | undefined {
    // IHDR is always the first chunk
    if (bytes.length < 24 || bytes.toString('ascii', 12, 16) !== 'IHDR') {
        return undefined;
    }
    return { width: bytes.readUInt32BE(16), height: bytes.readUInt32BE(20) };
}

function readGif(bytes: Buffer): ImageDimensions | undefined {
    if (bytes.length < 10) {
        return undefined;
    }
    return { width: bytes.readUInt16LE(6), height: bytes.readUInt16LE(8) };
}

function readWebp(bytes: Buffer): ImageDimensions | undefined {
    if (bytes.length < 30) {
        return undefined;
    }
    const chunk = bytes.toString('ascii', 12, 16);

    if (chunk === 'VP8 ') {
        return {
            width: bytes.readUInt16LE(26) & 0x3fff,
            height: bytes.readUInt16LE(28) & 0x3fff,
        };
    }
    if (chunk === 'VP8L') {
        const b0 = bytes[21];
        const b1 = bytes[22];
        const b2 = bytes[23];
        const b3 = bytes[24];
        return {
            width: 1 + (((b1 & 0x3f) << 8) | b0),
            height: 1 + (((b3 & 0x0f) << 10) | (b2 << 2) | ((b1 & 0xc0) >> 6)),
        };
    }
    if (chunk === 'VP8X') {
        return {
            width: 1 + bytes.readUIntLE(24, 3),
            height: 1 + bytes.readUIntLE(27, 3),
        };
    }
    return undefined;
}

// Start-of-frame markers carry the dimensions; C4, C8 and CC are not frames
const JPEG_SOF_MARKERS = new Set([0xc0, 0xc1, 0xc2, 0xc3, 0xc5, 0xc6, 0xc7, 0xc9, 0xca, 0xcb, 0xcd, 0xce, 0xcf]);

function readJpeg(bytes: Buffer): ImageDimensions | undefined {
    let offset = 2;
    while (offset + 4 <= bytes.length) {
        if (bytes[offset] !== 0xff) {
            return undefined;
        }
        const marker = bytes[offset + 1];
        // Fill bytes and standalone markers have no length field
        if (marker === 0xff) {
            offset += 1;
            continue;
        }
        if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd9)) {
            offset += 2;
            continue;
        }
        if (JPEG_SOF_MARKERS.has(marker)) {
            if (offset + 9 > bytes.length) {
                return undefined;
            }
            return {
                height: bytes.readUInt16BE(offset + 5),
                width: bytes.readUInt16BE(offset + 7),
            };
        }
        offset += 2 + bytes.readUInt16BE(offset + 2);
    }
    return undefined;
}
