import { Shape, ShapeOptions } from '../Shape';
import { Ray } from '../Ray';
import { Tuple } from '../tuple';
import { Intersection, Intersections, intersection } from '../Intersection';
import { precondition } from '../errors';
import { TriangleVertices, mollerTrumbore } from './Triangle';

export interface VertexNormals {
    n1: Tuple;
    n2: Tuple;
    n3: Tuple;
}

/**
 * Triangle with a normal per vertex. The normal at a hit is interpolated
 * from the hit's barycentric (u, v), so `normalAt` needs the intersection.
 */
export class SmoothTriangle extends Shape {
    readonly kind = 'smooth-triangle';
    readonly p1: Tuple;
    readonly p2: Tuple;
    readonly p3: Tuple;
    readonly n1: Tuple;
    readonly n2: Tuple;
    readonly n3: Tuple;
    readonly e1: Tuple;
    readonly e2: Tuple;

    constructor(vertices: TriangleVertices, normals: VertexNormals, options: ShapeOptions = {}) {
        super({ name: 'Smooth Triangle', ...options });
        const { p1, p2, p3 } = vertices;
        const { n1, n2, n3 } = normals;
        precondition(p1.isPoint() && p2.isPoint() && p3.isPoint(), 'Triangle vertices must be points');
        precondition(n1.isVector() && n2.isVector() && n3.isVector(), 'Vertex normals must be vectors');
        this.p1 = p1;
        this.p2 = p2;
        this.p3 = p3;
        this.n1 = n1;
        this.n2 = n2;
        this.n3 = n3;
        this.e1 = p2.subtract(p1);
        this.e2 = p3.subtract(p1);
    }

    protected localIntersect(ray: Ray): Intersections {
        const hit = mollerTrumbore(ray, this.p1, this.e1, this.e2);
        if (!hit) return new Intersections();
        return Intersections.of(intersection(hit.t, this, hit.u, hit.v));
    }

    protected localNormalAt(_localPoint: Tuple, hit?: Intersection): Tuple {
        precondition(hit !== undefined, 'A smooth triangle normal needs the intersection it belongs to');
        return this.n2.scale(hit.u)
            .add(this.n3.scale(hit.v))
            .add(this.n1.scale(1 - hit.u - hit.v));
    }
}
