import { nanoid } from 'nanoid';
import type { PointsRepository } from './PointsRepository';

export class InMemoryPointsRepository implements PointsRepository {
    private readonly inMemory = new Map<string, number>();

    constructor(private readonly generateId: () => string = () => nanoid()) {}

    async insertPoints(points: number): Promise<{ id: string }> {
        if (!Number.isSafeInteger(points) || points < 0) {
            throw new RangeError(`Points must be a non-negative integer, got ${points}`);
        }

        let id = this.generateId();
        while (this.inMemory.has(id)) id = this.generateId();

        this.inMemory.set(id, points);
        return { id };
    }

    async getPointsById(id: string): Promise<number | null> {
        return this.inMemory.get(id) ?? null;
    }

    get size(): number {
        return this.inMemory.size;
    }
}
