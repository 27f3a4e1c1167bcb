import { Matrix4 } from 'three';
import { Ray } from './Ray';
import { point } from './tuple';
import { Canvas } from './Canvas';
import { applyTransform, identity, inverse } from './transforms';
import { DEFAULT_REMAINING, World } from './World';

export interface RenderOptions {
    maxDepth?: number;
    /** Called after each completed row, e.g. for progress output. */
    onRow?: (y: number) => void;
}

/**
 * Pinhole camera. The canvas sits one unit in front of the eye (z = -1 in
 * camera space); `transform` is the view transform that orients the world.
 */
export class Camera {
    readonly hsize: number;
    readonly vsize: number;
    readonly fieldOfView: number; // radians
    readonly halfWidth: number;
    readonly halfHeight: number;
    readonly pixelSize: number;

    private _transform: Matrix4;
    private _inverse: Matrix4;

    constructor(hsize: number, vsize: number, fieldOfView: number, transform: Matrix4 = identity()) {
        this.hsize = hsize;
        this.vsize = vsize;
        this.fieldOfView = fieldOfView;
        this._transform = transform.clone();
        this._inverse = inverse(transform);

        const halfView = Math.tan(fieldOfView / 2);
        const aspect = hsize / vsize;
        if (aspect >= 1) {
            this.halfWidth = halfView;
            this.halfHeight = halfView / aspect;
        } else {
            this.halfWidth = halfView * aspect;
            this.halfHeight = halfView;
        }
        this.pixelSize = (this.halfWidth * 2) / hsize;
    }

    get transform(): Matrix4 {
        return this._transform.clone();
    }

    setTransform(m: Matrix4): this {
        this._transform = m.clone();
        this._inverse = inverse(m);
        return this;
    }

    /** Ray from the eye through the centre of pixel (px, py). */
    rayForPixel(px: number, py: number): Ray {
        const xOffset = (px + 0.5) * this.pixelSize;
        const yOffset = (py + 0.5) * this.pixelSize;

        // Camera looks toward -z, so +x is to the left
        const worldX = this.halfWidth - xOffset;
        const worldY = this.halfHeight - yOffset;

        const pixel = applyTransform(this._inverse, point(worldX, worldY, -1));
        const origin = applyTransform(this._inverse, point(0, 0, 0));
        const direction = pixel.subtract(origin).normalize();

        return new Ray(origin, direction);
    }

    render(world: World, options: RenderOptions = {}): Canvas {
        const maxDepth = options.maxDepth ?? DEFAULT_REMAINING;
        const image = new Canvas(this.hsize, this.vsize);

        for (let y = 0; y < this.vsize; y++) {
            for (let x = 0; x < this.hsize; x++) {
                const ray = this.rayForPixel(x, y);
                image.writePixel(x, y, world.colorAt(ray, maxDepth));
            }
            options.onRow?.(y);
        }

        return image;
    }
}
