/**
 * Running minimum over candidates offered one at a time.
 *
 * A candidate is kept only when it is strictly closer than both the limit
 * and the current best, so equal distances keep whichever came first.
 */
export class NearestSearch<T> {
    private bestItem: T | null = null;
    private bestDistance: number;

    constructor(limit: number = Infinity) {
        this.bestDistance = limit;
    }

    /** Returns true when `item` became the new best. */
    offer(item: T, distance: number): boolean {
        if (distance < this.bestDistance) {
            this.bestDistance = distance;
            this.bestItem = item;
            return true;
        }
        return false;
    }

    get found(): boolean {
        return this.bestItem !== null;
    }

    get item(): T | null {
        return this.bestItem;
    }

    /** Distance of the best item, or the limit when nothing was kept. */
    get distance(): number {
        return this.bestDistance;
    }

    result(): { item: T; distance: number } | null {
        if (this.bestItem === null) return null;
        return { item: this.bestItem, distance: this.bestDistance };
    }
}
