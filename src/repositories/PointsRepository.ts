export interface PointsRepository {
    /** Stores a points total under a freshly generated id; never reuses an id. */
    insertPoints(points: number): Promise<{ id: string }>;
    /** Resolves to null when no receipt was stored under the id. */
    getPointsById(id: string): Promise<number | null>;
}
