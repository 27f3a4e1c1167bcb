import { Tuple, BLACK, WHITE, point } from './tuple';
import { Material } from './Material';
import { precondition } from './errors';
import type { Shape } from './Shape';

export interface PointLight {
    position: Tuple;    // Point
    intensity: Tuple;   // Color
}

export function pointLight(position: Tuple, intensity: Tuple = WHITE): PointLight {
    precondition(position.isPoint(), `Light position must be a point, received ${position}`);
    precondition(intensity.isColor(), `Light intensity must be a color, received ${intensity}`);
    return { position, intensity };
}

/** White light above, left of and in front of the origin. */
export function defaultLight(): PointLight {
    return pointLight(point(-10, 10, -10), WHITE);
}

/**
 * Phong reflection: ambient + diffuse + specular for one light.
 * In shadow only the ambient term survives.
 */
export function lighting(
    material: Material,
    light: PointLight,
    surfacePoint: Tuple,
    eyeV: Tuple,
    normal: Tuple,
    inShadow: boolean,
    object: Shape
): Tuple {
    precondition(surfacePoint.isPoint(), 'Surface position must be a point');
    precondition(eyeV.isVector(), 'Eye vector must be a vector');
    precondition(normal.isVector(), 'Normal must be a vector');

    const baseColor = material.pattern ? material.pattern.atObject(object, surfacePoint) : material.color;
    const effectiveColor = baseColor.multiply(light.intensity);
    const ambient = effectiveColor.scale(material.ambient);

    if (inShadow) return ambient;

    const lightV = light.position.subtract(surfacePoint).normalize();
    const lightDotNormal = lightV.dot(normal);

    // Negative: the light is on the other side of the surface
    if (lightDotNormal < 0) return ambient;

    const diffuse = effectiveColor.scale(material.diffuse * lightDotNormal);

    const reflectV = lightV.negate().reflect(normal);
    const reflectDotEye = reflectV.dot(eyeV);
    let specular = BLACK;
    if (reflectDotEye > 0) {
        const factor = Math.pow(reflectDotEye, material.shininess);
        specular = light.intensity.scale(material.specular * factor);
    }

    return ambient.add(diffuse).add(specular);
}
