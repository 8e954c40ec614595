import type { TestEntry, TestProcedure } from '../types.js';
import { debug } from '../utils/debug.js';

/**
 * Thrown when a second test registers under a name that is already taken
 */
export class DuplicateTestError extends Error {
  readonly testName: string;

  constructor(testName: string) {
    super(`Test "${testName}" is already registered`);
    this.name = 'DuplicateTestError';
    this.testName = testName;
  }
}

/**
 * Thrown when a test registers after the registry was handed to the runner
 */
export class RegistryLockedError extends Error {
  readonly testName: string;

  constructor(testName: string) {
    super(`Cannot register test "${testName}": the run has already started`);
    this.name = 'RegistryLockedError';
    this.testName = testName;
  }
}

/**
 * Name to procedure mapping with a registration phase and a read-only run phase
 */
export interface TestRegistry {
  /**
   * Add a test
   *
   * @throws DuplicateTestError if the name is taken (the first registration is kept)
   * @throws RegistryLockedError once lock() has been called
   */
  register(name: string, procedure: TestProcedure): void;

  /**
   * End the registration phase (idempotent)
   */
  lock(): void;

  /**
   * Entries sorted by name (code unit order, not declaration order)
   */
  entries(): TestEntry[];

  /**
   * Registered names in run order
   */
  names(): string[];

  has(name: string): boolean;

  readonly size: number;
  readonly isLocked: boolean;
}

function compareNames(a: TestEntry, b: TestEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Create an empty test registry
 *
 * Uses factory pattern with closure to encapsulate registry state.
 *
 * @returns TestRegistry instance
 */
export function createTestRegistry(): TestRegistry {
  const procedures = new Map<string, TestProcedure>();
  let locked = false;

  const entries = (): TestEntry[] =>
    Array.from(procedures, ([name, procedure]): TestEntry => ({ name, procedure })).sort(compareNames);

  return {
    register(name: string, procedure: TestProcedure): void {
      if (locked) {
        throw new RegistryLockedError(name);
      }
      if (procedures.has(name)) {
        throw new DuplicateTestError(name);
      }
      procedures.set(name, procedure);
      debug('[Registry] Registered test:', name);
    },

    lock(): void {
      if (!locked) {
        locked = true;
        debug('[Registry] Locked with', procedures.size, 'tests');
      }
    },

    entries,

    names(): string[] {
      return entries().map(entry => entry.name);
    },

    has(name: string): boolean {
      return procedures.has(name);
    },

    get size(): number {
      return procedures.size;
    },

    get isLocked(): boolean {
      return locked;
    },
  };
}
