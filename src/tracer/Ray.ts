import { Matrix4 } from 'three';
import { Tuple } from './tuple';
import { precondition } from './errors';
import { applyTransform } from './transforms';

export class Ray {
    readonly origin: Tuple;     // Point
    readonly direction: Tuple;  // Vector, not necessarily unit length

    constructor(origin: Tuple, direction: Tuple) {
        precondition(origin.isPoint(), `Ray origin must be a point, received ${origin}`);
        precondition(direction.isVector(), `Ray direction must be a vector, received ${direction}`);
        this.origin = origin;
        this.direction = direction;
    }

    /** origin + direction·t */
    position(t: number): Tuple {
        return this.origin.add(this.direction.scale(t));
    }

    /**
     * The same ray expressed through `m`. The direction is deliberately
     * left un-normalized so that `t` keeps its meaning across spaces.
     */
    transform(m: Matrix4): Ray {
        return new Ray(applyTransform(m, this.origin), applyTransform(m, this.direction));
    }
}
