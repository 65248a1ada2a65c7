import { StaleReferenceError } from '../utils/errors.js';

export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ElementReference {
  ref: string;
  role: string;
  name: string;
  bounds?: Bounds;
}

// "s3e12": element 12 of snapshot generation 3.
export const REF_PATTERN = /^s(\d+)e(\d+)$/;

export function formatRef(generation: number, index: number): string {
  return `s${generation}e${index}`;
}

export function parseRef(ref: string): { generation: number; index: number } | null {
  const match = REF_PATTERN.exec(ref);
  if (!match) return null;
  return { generation: Number(match[1]), index: Number(match[2]) };
}

/**
 * The element references of a session's most recent snapshot.
 *
 * Generations only move forward, and only through {@link commit}: a capture
 * that is abandoned before committing leaves the previous generation intact.
 */
export class RefTable {
  private current = 0;
  private entries = new Map<string, ElementReference>();

  get generation(): number {
    return this.current;
  }

  get size(): number {
    return this.entries.size;
  }

  nextGeneration(): number {
    return this.current + 1;
  }

  commit(generation: number, refs: Iterable<ElementReference>): void {
    if (generation <= this.current) {
      throw new Error(`Snapshot generation ${generation} is not newer than ${this.current}`);
    }
    const entries = new Map<string, ElementReference>();
    for (const ref of refs) entries.set(ref.ref, ref);
    this.current = generation;
    this.entries = entries;
  }

  resolve(ref: string): ElementReference & { generation: number; index: number } {
    const parsed = parseRef(ref);
    const entry = this.entries.get(ref);
    if (!parsed || parsed.generation !== this.current || !entry) {
      throw new StaleReferenceError(ref, this.current);
    }
    return { ...entry, ...parsed };
  }
}
