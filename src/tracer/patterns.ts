import { Matrix4 } from 'three';
import { Tuple, BLACK, WHITE, color } from './tuple';
import { applyTransform, identity, inverse } from './transforms';
import type { Shape } from './Shape';

export type PatternKind = 'stripe' | 'gradient' | 'ring' | 'checker' | 'test';

/**
 * A procedural color field defined in pattern space. Subclasses only
 * implement `atPoint`; `atObject` handles the world → object → pattern
 * conversions.
 */
export abstract class Pattern {
    abstract readonly kind: PatternKind;
    readonly a: Tuple;
    readonly b: Tuple;
    private readonly _transform: Matrix4;
    private readonly inverseTransform: Matrix4;

    constructor(a: Tuple = WHITE, b: Tuple = BLACK, transform: Matrix4 = identity()) {
        this.a = a;
        this.b = b;
        this._transform = transform.clone();
        this.inverseTransform = inverse(transform);
    }

    get transform(): Matrix4 {
        return this._transform.clone();
    }

    /** `patternPoint` is already in pattern space. */
    abstract atPoint(patternPoint: Tuple): Tuple;

    atObject(shape: Shape, worldPoint: Tuple): Tuple {
        const objectPoint = shape.worldToObject(worldPoint);
        const patternPoint = applyTransform(this.inverseTransform, objectPoint);
        return this.atPoint(patternPoint);
    }
}

/** Alternates a/b every unit along x. */
export class StripePattern extends Pattern {
    readonly kind = 'stripe';

    atPoint(p: Tuple): Tuple {
        return Math.floor(p.x) % 2 === 0 ? this.a : this.b;
    }
}

/** Linear blend from a to b across each unit of x. */
export class GradientPattern extends Pattern {
    readonly kind = 'gradient';

    atPoint(p: Tuple): Tuple {
        const distance = this.b.subtract(this.a);
        const fraction = p.x - Math.floor(p.x);
        return this.a.add(distance.scale(fraction));
    }
}

/** Concentric rings around the y axis. */
export class RingPattern extends Pattern {
    readonly kind = 'ring';

    atPoint(p: Tuple): Tuple {
        return Math.floor(Math.sqrt(p.x * p.x + p.z * p.z)) % 2 === 0 ? this.a : this.b;
    }
}

/** 3-D checkerboard of unit cubes. */
export class CheckerPattern extends Pattern {
    readonly kind = 'checker';

    atPoint(p: Tuple): Tuple {
        return (Math.floor(p.x) + Math.floor(p.y) + Math.floor(p.z)) % 2 === 0 ? this.a : this.b;
    }
}

// Echoes the pattern-space point back as a color, which makes the
// transform chain observable in tests.
export class TestPattern extends Pattern {
    readonly kind = 'test';

    atPoint(p: Tuple): Tuple {
        return color(p.x, p.y, p.z);
    }
}
