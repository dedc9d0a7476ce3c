import { detectFormat, readDimensions } from '../../../src/domain/services/ImageHeader';
import { gifBytes, jpegBytes, pngBytes } from '../../helpers/imageFixtures';

function webpBytes(chunk: 'VP8 ' | 'VP8L' | 'VP8X', fill: (bytes: Buffer) => void): Buffer {
    const bytes = Buffer.alloc(32);
    bytes.write('RIFF', 0, 'ascii');
    bytes.write('WEBP', 8, 'ascii');
    bytes.write(chunk, 12, 'ascii');
    fill(bytes);
    return bytes;
}

describe('ImageHeader', () => {
    describe('detectFormat()', () => {
        it('should recognise each supported signature', () => {
            expect(detectFormat(pngBytes(1, 1))).toBe('png');
            expect(detectFormat(jpegBytes(1, 1))).toBe('jpeg');
            expect(detectFormat(gifBytes(1, 1))).toBe('gif');
            expect(detectFormat(webpBytes('VP8X', () => { }))).toBe('webp');
        });

        it('should return undefined for unknown or short input', () => {
            expect(detectFormat(Buffer.from('BM'))).toBeUndefined();
            expect(detectFormat(Buffer.alloc(0))).toBeUndefined();
        });
    });

    describe('readDimensions()', () => {
        it('should read PNG dimensions from IHDR', () => {
            expect(readDimensions(pngBytes(1024, 768))).toEqual({ width: 1024, height: 768 });
        });

        it('should read GIF dimensions', () => {
            expect(readDimensions(gifBytes(320, 200))).toEqual({ width: 320, height: 200 });
        });

        it('should read JPEG dimensions from the first frame header', () => {
            expect(readDimensions(jpegBytes(640, 480))).toEqual({ width: 640, height: 480 });
        });

        it('should read lossy WEBP dimensions', () => {
            const bytes = webpBytes('VP8 ', (b) => {
                b.writeUInt16LE(300, 26);
                b.writeUInt16LE(150, 28);
            });
            expect(readDimensions(bytes)).toEqual({ width: 300, height: 150 });
        });

        it('should read lossless WEBP dimensions', () => {
            // width-1 = 99 and height-1 = 49 packed as 14-bit fields
            const packed = 99 | (49 << 14);
            const bytes = webpBytes('VP8L', (b) => {
                b[20] = 0x2f;
                b.writeUInt32LE(packed, 21);
            });
            expect(readDimensions(bytes)).toEqual({ width: 100, height: 50 });
        });

        it('should read extended WEBP dimensions', () => {
            const bytes = webpBytes('VP8X', (b) => {
                b.writeUIntLE(1999, 24, 3);
                b.writeUIntLE(999, 27, 3);
            });
            expect(readDimensions(bytes)).toEqual({ width: 2000, height: 1000 });
        });

        it('should return undefined for a truncated PNG', () => {
            expect(readDimensions(pngBytes(10, 10).subarray(0, 12))).toBeUndefined();
        });

        it('should return undefined for unknown formats', () => {
            expect(readDimensions(Buffer.from('plain text, not an image'))).toBeUndefined();
        });
    });
});
