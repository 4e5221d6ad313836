/**
 * In-memory stand-in for the Qdrant REST client.
 *
 * Implements only what QdrantIndexStore calls: exact-match `must` filters,
 * cosine search, scroll with pagination by point id.
 */

import type { QdrantApi } from '../search/qdrant-store.js';
import { cosineSimilarity } from '../search/ranking.js';

type PointId = string | number;
type Payload = Record<string, unknown>;
type Filter = Parameters<QdrantApi['delete']>[1]['filter'];

interface StoredPoint {
  id: PointId;
  vector: number[];
  payload: Payload;
}

interface Collection {
  size: number;
  points: Map<string, StoredPoint>;
  indexes: string[];
}

function matches(point: StoredPoint, filter: Filter | undefined): boolean {
  if (!filter) {
    return true;
  }
  return filter.must.every((condition) => point.payload[condition.key] === condition.match.value);
}

function select(payload: Payload, fields: boolean | string[] | undefined): Payload | null {
  if (fields === undefined || fields === false) {
    return null;
  }
  if (fields === true) {
    return { ...payload };
  }
  return Object.fromEntries(fields.filter((f) => f in payload).map((f) => [f, payload[f]]));
}

export class InMemoryQdrant implements QdrantApi {
  readonly collections = new Map<string, Collection>();

  /** Names of write calls, in order (upsert, delete, ...) */
  readonly writes: string[] = [];

  /** Errors thrown by the next calls, consumed one per call */
  readonly failures: Error[] = [];

  private take(): void {
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
  }

  private get(name: string): Collection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw Object.assign(new Error(`Not found: Collection \`${name}\` doesn't exist!`), { status: 404 });
    }
    return collection;
  }

  async collectionExists(collectionName: string): Promise<{ exists: boolean }> {
    this.take();
    return { exists: this.collections.has(collectionName) };
  }

  async createCollection(
    collectionName: string,
    args: { vectors: { size: number; distance: 'Cosine' } }
  ): Promise<boolean> {
    this.take();
    this.writes.push('createCollection');
    this.collections.set(collectionName, { size: args.vectors.size, points: new Map(), indexes: [] });
    return true;
  }

  async createPayloadIndex(
    collectionName: string,
    args: { field_name: string; field_schema: 'keyword' }
  ): Promise<{ status: string }> {
    this.take();
    this.get(collectionName).indexes.push(args.field_name);
    return { status: 'completed' };
  }

  async upsert(
    collectionName: string,
    args: { points: Array<{ id: PointId; vector: number[]; payload: Payload }> }
  ): Promise<{ status: string }> {
    this.take();
    const collection = this.get(collectionName);
    for (const point of args.points) {
      if (point.vector.length !== collection.size) {
        throw Object.assign(new Error('Wrong input: Vector dimension error'), { status: 400 });
      }
    }
    this.writes.push('upsert');
    for (const point of args.points) {
      collection.points.set(String(point.id), { ...point, payload: { ...point.payload } });
    }
    return { status: 'completed' };
  }

  async delete(collectionName: string, args: { filter: Filter }): Promise<{ status: string }> {
    this.take();
    const collection = this.get(collectionName);
    this.writes.push('delete');
    for (const [key, point] of collection.points) {
      if (matches(point, args.filter)) {
        collection.points.delete(key);
      }
    }
    return { status: 'completed' };
  }

  async scroll(
    collectionName: string,
    args: { filter?: Filter; limit?: number; offset?: PointId; with_payload?: boolean | string[] }
  ): Promise<{ points: Array<{ id: PointId; payload?: Payload | null }>; next_page_offset?: PointId | null }> {
    this.take();
    const limit = args.limit ?? 10;
    const all = [...this.get(collectionName).points.values()]
      .filter((p) => matches(p, args.filter))
      .sort((a, b) => (String(a.id) < String(b.id) ? -1 : 1));

    const start = args.offset === undefined ? 0 : all.findIndex((p) => p.id === args.offset);
    const page = all.slice(start, start + limit);
    const next = all[start + limit];

    return {
      points: page.map((p) => ({ id: p.id, payload: select(p.payload, args.with_payload) })),
      next_page_offset: next ? next.id : null,
    };
  }

  async retrieve(collectionName: string, args: { ids: PointId[] }): Promise<Array<{ id: PointId }>> {
    this.take();
    const points = this.get(collectionName).points;
    return args.ids.filter((id) => points.has(String(id))).map((id) => ({ id }));
  }

  async search(
    collectionName: string,
    args: { vector: number[]; limit: number; with_payload?: boolean }
  ): Promise<Array<{ id: PointId; score: number; payload?: Payload | null }>> {
    this.take();
    return [...this.get(collectionName).points.values()]
      .map((p) => ({
        id: p.id,
        score: cosineSimilarity(args.vector, p.vector),
        payload: select(p.payload, args.with_payload),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, args.limit);
  }
}
