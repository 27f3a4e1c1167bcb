import { Matrix4 } from 'three';
import { Tuple, TupleKind } from './tuple';
import { PreconditionError } from './errors';
import { almostEqual } from './math_solvers';

// All factories take arguments in the usual row-major reading order.
// `chain(A, B, C)` is the product A·B·C, so C is applied to a point first.

export function identity(): Matrix4 {
    return new Matrix4();
}

export function translation(x: number, y: number, z: number): Matrix4 {
    return new Matrix4().makeTranslation(x, y, z);
}

export function scaling(x: number, y: number, z: number): Matrix4 {
    return new Matrix4().makeScale(x, y, z);
}

export function rotationX(radians: number): Matrix4 {
    return new Matrix4().makeRotationX(radians);
}

export function rotationY(radians: number): Matrix4 {
    return new Matrix4().makeRotationY(radians);
}

export function rotationZ(radians: number): Matrix4 {
    return new Matrix4().makeRotationZ(radians);
}

/** Each component moves in proportion to another: x' = x + xy·y + xz·z, and so on. */
export function shearing(xy: number, xz: number, yx: number, yz: number, zx: number, zy: number): Matrix4 {
    return new Matrix4().set(
        1, xy, xz, 0,
        yx, 1, yz, 0,
        zx, zy, 1, 0,
        0, 0, 0, 1
    );
}

export function chain(...matrices: Matrix4[]): Matrix4 {
    const out = new Matrix4();
    for (const m of matrices) out.multiply(m);
    return out;
}

/**
 * Orient the world relative to an eye at `from` looking toward `to`.
 * `up` only needs to be roughly up; it is re-orthogonalized here.
 */
export function viewTransform(from: Tuple, to: Tuple, up: Tuple): Matrix4 {
    const forward = to.subtract(from).normalize();
    const left = forward.cross(up.normalize());
    const trueUp = left.cross(forward);

    const orientation = new Matrix4().set(
        left.x, left.y, left.z, 0,
        trueUp.x, trueUp.y, trueUp.z, 0,
        -forward.x, -forward.y, -forward.z, 0,
        0, 0, 0, 1
    );
    return chain(orientation, translation(-from.x, -from.y, -from.z));
}

export function inverse(m: Matrix4): Matrix4 {
    if (m.determinant() === 0) {
        throw new PreconditionError('Matrix is not invertible');
    }
    return m.clone().invert();
}

export function transpose(m: Matrix4): Matrix4 {
    return m.clone().transpose();
}

/** Multiply a point or vector by the matrix; w decides whether translation applies. */
export function applyTransform(m: Matrix4, t: Tuple): Tuple {
    const v = t.toVector4().applyMatrix4(m);
    return new Tuple(v.x, v.y, v.z, t.kind);
}

/**
 * Like `applyTransform` for vectors, but the w the product produces is
 * discarded. Used with inverse-transposes, whose bottom row picks up the
 * translation and would otherwise leak into the normal.
 */
export function applyToNormal(m: Matrix4, normal: Tuple): Tuple {
    const v = normal.toVector4().applyMatrix4(m);
    return new Tuple(v.x, v.y, v.z, TupleKind.Vector);
}

export function matricesEqual(a: Matrix4, b: Matrix4): boolean {
    for (let i = 0; i < 16; i++) {
        if (!almostEqual(a.elements[i], b.elements[i])) return false;
    }
    return true;
}

/** Row-major listing, the order `Matrix4.set` takes. */
export function toRowMajor(m: Matrix4): number[] {
    const e = m.elements;
    return [
        e[0], e[4], e[8], e[12],
        e[1], e[5], e[9], e[13],
        e[2], e[6], e[10], e[14],
        e[3], e[7], e[11], e[15]
    ];
}

export function fromRowMajor(values: number[]): Matrix4 {
    if (values.length !== 16) {
        throw new PreconditionError(`A 4x4 matrix needs 16 values, received ${values.length}`);
    }
    const m = new Matrix4();
    m.set(
        values[0], values[1], values[2], values[3],
        values[4], values[5], values[6], values[7],
        values[8], values[9], values[10], values[11],
        values[12], values[13], values[14], values[15]
    );
    return m;
}
