import { Tuple, color } from './tuple';
import { precondition } from './errors';

/** Longest line a plain PPM reader is required to accept. */
const PPM_MAX_LINE = 70;

/** A width × height grid of RGB colors, initially black. */
export class Canvas {
    readonly width: number;
    readonly height: number;
    readonly pixels: Float32Array; // RGB triples, row-major from the top-left

    constructor(width: number, height: number) {
        precondition(Number.isInteger(width) && width > 0, `Canvas width must be a positive integer, received ${width}`);
        precondition(Number.isInteger(height) && height > 0, `Canvas height must be a positive integer, received ${height}`);
        this.width = width;
        this.height = height;
        this.pixels = new Float32Array(width * height * 3);
    }

    private offset(x: number, y: number): number {
        precondition(
            Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height,
            `Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} canvas`
        );
        return (y * this.width + x) * 3;
    }

    writePixel(x: number, y: number, c: Tuple): void {
        precondition(c.isColor(), `Expected a color, received ${c}`);
        const i = this.offset(x, y);
        this.pixels[i] = c.red;
        this.pixels[i + 1] = c.green;
        this.pixels[i + 2] = c.blue;
    }

    pixelAt(x: number, y: number): Tuple {
        const i = this.offset(x, y);
        return color(this.pixels[i], this.pixels[i + 1], this.pixels[i + 2]);
    }

    /**
     * Plain-text PPM (P3). Components are scaled to 0..255 and clamped;
     * each pixel row starts a new line and is wrapped before 70 characters.
     */
    toPPM(): string {
        const lines = ['P3', `${this.width} ${this.height}`, '255'];

        for (let y = 0; y < this.height; y++) {
            let line = '';
            for (let x = 0; x < this.width * 3; x++) {
                const token = String(toByte(this.pixels[y * this.width * 3 + x]));
                if (line.length + 1 + token.length > PPM_MAX_LINE) {
                    lines.push(line);
                    line = token;
                } else {
                    line = line === '' ? token : `${line} ${token}`;
                }
            }
            lines.push(line);
        }

        return lines.join('\n') + '\n';
    }
}

function toByte(c: number): number {
    return Math.min(255, Math.max(0, Math.round(c * 255)));
}
