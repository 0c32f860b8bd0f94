/**
 * Test helpers: a value with an observable "was I copied" probe
 */

export class CopyError extends Error {
  constructor() {
    super('Encountered an unexpected copy');
    this.name = 'CopyError';
  }
}

interface Storage {
  holders: number;
}

// Copy-on-write style value: copies share storage, and mutating shared
// storage is reported as an unexpected copy.
export class CopySpy {
  mutations = 0;

  private readonly storage: Storage;

  private constructor(storage: Storage) {
    this.storage = storage;
  }

  static create(): CopySpy {
    return new CopySpy({ holders: 1 });
  }

  copy(): CopySpy {
    this.storage.holders += 1;
    return new CopySpy(this.storage);
  }

  get isUnique(): boolean {
    return this.storage.holders === 1;
  }

  mutate(): void {
    if (!this.isUnique) throw new CopyError();
    this.mutations += 1;
  }
}

// Mutable reference-like counter
export class Counter {
  count: number;

  constructor(count: number) {
    this.count = count;
  }

  increment(): void {
    this.count += 1;
  }
}

// Immutable value-like counter; "mutating" it means replacing it
export interface CounterRecord {
  readonly count: number;
}

export function countsOf(map: Map<string, { readonly count: number }>): Record<string, number> {
  return Object.fromEntries([...map].map(([key, value]) => [key, value.count]));
}
