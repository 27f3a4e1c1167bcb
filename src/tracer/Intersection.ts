import type { Shape } from './Shape';

export interface Intersection {
    t: number;          // Distance along the ray, in units of the ray's direction
    object: Shape;      // The primitive that was struck (never a Group or CSG)
    // Barycentric coordinates of the hit; only meaningful for triangles
    u: number;
    v: number;
}

export function intersection(t: number, object: Shape, u: number = 0, v: number = 0): Intersection {
    return { t, object, u, v };
}

/**
 * An ordered run of intersections, always ascending by `t`.
 * The sort is stable, so the paired roots of a tangent ray stay adjacent
 * in the order their shape produced them.
 */
export class Intersections implements Iterable<Intersection> {
    private readonly items: Intersection[];

    constructor(items: Iterable<Intersection> = []) {
        this.items = [...items].sort((a, b) => a.t - b.t);
    }

    static of(...items: Intersection[]): Intersections {
        return new Intersections(items);
    }

    static merge(lists: Iterable<Intersections>): Intersections {
        const all: Intersection[] = [];
        for (const list of lists) all.push(...list.items);
        return new Intersections(all);
    }

    get length(): number {
        return this.items.length;
    }

    at(index: number): Intersection | undefined {
        return this.items[index];
    }

    concat(other: Intersections): Intersections {
        return new Intersections([...this.items, ...other.items]);
    }

    filter(predicate: (i: Intersection) => boolean): Intersections {
        return new Intersections(this.items.filter(predicate));
    }

    times(): number[] {
        return this.items.map(i => i.t);
    }

    /** The nearest intersection strictly in front of the ray origin, or null. */
    hit(): Intersection | null {
        for (const i of this.items) {
            if (i.t > 0) return i;
        }
        return null;
    }

    [Symbol.iterator](): Iterator<Intersection> {
        return this.items[Symbol.iterator]();
    }
}
