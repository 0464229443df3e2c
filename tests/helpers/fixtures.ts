import {
  ABSTRACT_MODEL,
  MemoryPreferences,
  Model,
  TypeNotFoundError,
  TypeSerializer,
} from '../../src/index.js';
import type {
  DeploymentContext,
  Logger,
  LogLevel,
  PreferenceStore,
  SerializedType,
  TypeLoader,
} from '../../src/index.js';

// --- Entity types ---

export class Note extends Model {
  static override readonly table = { name: 'notes' };
}

export class Tag extends Model {}

export abstract class Timestamped extends Model {
  static override readonly [ABSTRACT_MODEL] = true;
}

export class Reminder extends Timestamped {
  static override readonly table = { name: 'reminders', id: 'reminder_id' };
}

/** Structurally a model instance, but without the entity capability. */
export class NotAModel {
  id: number | undefined = undefined;
}

// --- Serializers ---

export class Money {
  constructor(readonly cents: number) {}
}

export class MoneySerializer extends TypeSerializer<Money, number> {
  readonly deserializedType = Money;
  readonly serializedType: SerializedType = 'integer';

  serialize(value: Money | null): number | null {
    return value === null ? null : value.cents;
  }

  deserialize(data: number | null): Money | null {
    return data === null ? null : new Money(data);
  }
}

export class MoneyTextSerializer extends TypeSerializer<Money, string> {
  readonly deserializedType = Money;
  readonly serializedType: SerializedType = 'text';

  serialize(value: Money | null): string | null {
    return value === null ? null : String(value.cents);
  }

  deserialize(data: string | null): Money | null {
    return data === null ? null : new Money(Number(data));
  }
}

export class IsoDateSerializer extends TypeSerializer<Date, string> {
  readonly deserializedType = Date;
  readonly serializedType: SerializedType = 'text';

  serialize(value: Date | null): string | null {
    return value === null ? null : value.toISOString();
  }

  deserialize(data: string | null): Date | null {
    return data === null ? null : new Date(data);
  }
}

export class ThrowingSerializer extends TypeSerializer<Money, number> {
  readonly deserializedType = Money;
  readonly serializedType: SerializedType = 'integer';

  constructor() {
    super();
    throw new Error('serializer constructor failed');
  }

  serialize(): number | null {
    return null;
  }

  deserialize(): Money | null {
    return null;
  }
}

export class NoteSerializer extends TypeSerializer<Note, number> {
  readonly deserializedType = Note;
  readonly serializedType: SerializedType = 'integer';

  serialize(value: Note | null): number | null {
    return value?.id ?? null;
  }

  deserialize(): Note | null {
    return null;
  }
}

// --- Deployment stand-ins ---

/**
 * In-process type loader resolving names from a fixed table.
 * An Error value in the table is thrown when its name is loaded.
 */
export class MapTypeLoader implements TypeLoader {
  readonly requested: string[] = [];
  readonly searchRoots: string[] = [];
  private readonly types: ReadonlyMap<string, unknown>;

  constructor(types: Readonly<Record<string, unknown>>) {
    this.types = new Map(Object.entries(types));
  }

  async load(typeName: string): Promise<unknown> {
    this.requested.push(typeName);
    if (!this.types.has(typeName)) {
      throw new TypeNotFoundError(typeName);
    }
    const value = this.types.get(typeName);
    if (value instanceof Error) {
      throw value;
    }
    return value;
  }

  addSearchRoot(directory: string): void {
    this.searchRoots.push(directory);
  }
}

export interface TestContextOptions {
  readonly dataDir: string;
  readonly sourcePath: string;
  readonly typeLoader?: TypeLoader;
  readonly resourceRoots?: readonly string[];
  readonly packageName?: string;
  readonly unitCount?: number;
}

export interface TestContext extends DeploymentContext {
  /** Names of the preference stores opened so far */
  readonly openedPreferences: string[];
}

export function createTestContext(options: TestContextOptions): TestContext {
  const openedPreferences: string[] = [];
  const preferences = new MemoryPreferences(
    options.unitCount === undefined ? {} : { 'dex.number': options.unitCount }
  );

  return {
    packageName: options.packageName ?? 'acme.notes',
    sourcePath: options.sourcePath,
    dataDir: options.dataDir,
    resourceRoots: options.resourceRoots ?? [],
    typeLoader: options.typeLoader ?? new MapTypeLoader({}),
    openedPreferences,
    getPreferences(name: string): PreferenceStore {
      openedPreferences.push(name);
      return preferences;
    },
  };
}

// --- Logging ---

export interface LogRecord {
  readonly level: LogLevel;
  readonly message: string;
  readonly data: Record<string, unknown> | undefined;
}

export function createRecordingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger: Logger = {
    debug: (message, data) => records.push({ level: 'debug', message, data }),
    info: (message, data) => records.push({ level: 'info', message, data }),
    warn: (message, data) => records.push({ level: 'warn', message, data }),
    error: (message, data) => records.push({ level: 'error', message, data }),
  };
  return { logger, records };
}
