import { Vector4 } from 'three';
import { precondition } from './errors';
import { almostEqual } from './math_solvers';

// --- Spatial Tuples ---
// Points, vectors and colors share one (x, y, z) representation and are told
// apart by `kind`. For colors (x, y, z) <-> (r, g, b). The numeric value of the
// kind doubles as the homogeneous w used when a matrix is applied.

export enum TupleKind {
    Vector = 0,
    Point = 1,
    Color = 2
}

export class Tuple {
    readonly x: number;
    readonly y: number;
    readonly z: number;
    readonly kind: TupleKind;

    constructor(x: number, y: number, z: number, kind: TupleKind) {
        this.x = x;
        this.y = y;
        this.z = z;
        this.kind = kind;
    }

    get red(): number { return this.x; }
    get green(): number { return this.y; }
    get blue(): number { return this.z; }

    isPoint(): boolean { return this.kind === TupleKind.Point; }
    isVector(): boolean { return this.kind === TupleKind.Vector; }
    isColor(): boolean { return this.kind === TupleKind.Color; }

    add(other: Tuple): Tuple {
        precondition(!(this.isPoint() && other.isPoint()), 'Cannot add two points');
        precondition(this.isColor() === other.isColor(), 'Colors may only be added to colors');

        // Vector + Vector = Vector, Point + Vector = Point
        let kind = TupleKind.Vector;
        if (this.isColor()) kind = TupleKind.Color;
        else if (this.isPoint() || other.isPoint()) kind = TupleKind.Point;
        return new Tuple(this.x + other.x, this.y + other.y, this.z + other.z, kind);
    }

    subtract(other: Tuple): Tuple {
        precondition(!(this.isVector() && other.isPoint()), 'Cannot subtract a point from a vector');
        precondition(this.isColor() === other.isColor(), 'Colors may only be subtracted from colors');

        // Point - Point = Vector, Point - Vector = Point
        let kind = TupleKind.Vector;
        if (this.isColor()) kind = TupleKind.Color;
        else if (this.isPoint() && other.isVector()) kind = TupleKind.Point;
        return new Tuple(this.x - other.x, this.y - other.y, this.z - other.z, kind);
    }

    negate(): Tuple {
        return new Tuple(-this.x, -this.y, -this.z, this.kind);
    }

    scale(s: number): Tuple {
        precondition(!this.isPoint(), 'Cannot scale a point');
        return new Tuple(this.x * s, this.y * s, this.z * s, this.kind);
    }

    divide(s: number): Tuple {
        precondition(!this.isPoint(), 'Cannot divide a point');
        return new Tuple(this.x / s, this.y / s, this.z / s, this.kind);
    }

    /** Hadamard (component-wise) product of two colors. */
    multiply(other: Tuple): Tuple {
        precondition(this.isColor() && other.isColor(), 'Non-scalar multiplication is only defined between colors');
        return new Tuple(this.x * other.x, this.y * other.y, this.z * other.z, TupleKind.Color);
    }

    magnitude(): number {
        precondition(this.isVector(), 'Cannot take the magnitude of a non-vector');
        return Math.sqrt(this.x * this.x + this.y * this.y + this.z * this.z);
    }

    normalize(): Tuple {
        const length = this.magnitude();
        precondition(length > 0, 'Cannot normalize a zero-length vector');
        return new Tuple(this.x / length, this.y / length, this.z / length, TupleKind.Vector);
    }

    dot(other: Tuple): number {
        precondition(this.isVector() && other.isVector(), 'Dot product is only defined between vectors');
        return this.x * other.x + this.y * other.y + this.z * other.z;
    }

    cross(other: Tuple): Tuple {
        precondition(this.isVector() && other.isVector(), 'Cross product is only defined between vectors');
        return vector(
            this.y * other.z - this.z * other.y,
            this.z * other.x - this.x * other.z,
            this.x * other.y - this.y * other.x
        );
    }

    /**
     * Calculates the reflection vector using R = I - 2(N.I)N
     */
    reflect(normal: Tuple): Tuple {
        return this.subtract(normal.scale(2 * this.dot(normal)));
    }

    equals(other: Tuple): boolean {
        return this.kind === other.kind
            && almostEqual(this.x, other.x)
            && almostEqual(this.y, other.y)
            && almostEqual(this.z, other.z);
    }

    /** Homogeneous form for matrix application; colors have no spatial meaning. */
    toVector4(): Vector4 {
        precondition(!this.isColor(), 'Cannot transform a color');
        return new Vector4(this.x, this.y, this.z, this.kind);
    }

    toString(): string {
        return `${TupleKind[this.kind].toLowerCase()}(${this.x}, ${this.y}, ${this.z})`;
    }
}

export function point(x: number, y: number, z: number): Tuple {
    return new Tuple(x, y, z, TupleKind.Point);
}

export function vector(x: number, y: number, z: number): Tuple {
    return new Tuple(x, y, z, TupleKind.Vector);
}

export function color(r: number, g: number, b: number): Tuple {
    return new Tuple(r, g, b, TupleKind.Color);
}

export const BLACK = color(0, 0, 0);
export const WHITE = color(1, 1, 1);
