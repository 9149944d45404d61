import { Segment } from './Segment';
import { Circle } from './Circle';
import { Arc } from './Arc';
import { Rectangle } from './Rectangle';
import { Ellipse } from './Ellipse';
import { RegularPolygon } from './RegularPolygon';
import { Spline } from './Spline';

export { Segment, Circle, Arc, Rectangle, Ellipse, RegularPolygon, Spline };
export type { ArcAngleOptions } from './Arc';
export type { RectangleOptions } from './Rectangle';
export type { RegularPolygonOptions, PolygonVariant } from './RegularPolygon';
export type { SplineOptions } from './Spline';

/**
 * Every drawable primitive. Narrow on `kind`.
 */
export type Primitive =
    | Segment
    | Circle
    | Arc
    | Rectangle
    | Ellipse
    | RegularPolygon
    | Spline;
