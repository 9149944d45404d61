import { logger } from '../../utils/Logger';

/**
 * Radii are stored as magnitudes. A negative value is flipped and reported;
 * callers passing signed radii rely on this.
 */
export function coerceRadius(value: number, tag: string, field = 'radius'): number {
    if (value < 0) {
        logger.warn(`[${tag}] negative ${field} ${value} coerced to ${-value}`);
        return -value;
    }
    return value;
}

export function coerceNonNegative(value: number, tag: string, field: string): number {
    if (value < 0) {
        logger.warn(`[${tag}] ${field} must be >= 0, got ${value}; using 0`);
        return 0;
    }
    return value;
}
