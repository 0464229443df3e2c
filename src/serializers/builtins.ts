/**
 * Default serializers for the built-in value types.
 *
 * Every value is stored as an integer (epoch milliseconds) except
 * `FilePath`, which is stored as text.
 */

import { TypeSerializer, type SerializedType, type ValueType } from './type-serializer.js';
import { Calendar, DateOnly, FilePath } from './values.js';

export class CalendarSerializer extends TypeSerializer<Calendar, number> {
  readonly deserializedType = Calendar;
  readonly serializedType: SerializedType = 'integer';

  serialize(value: Calendar | null): number | null {
    return value === null ? null : value.timeInMillis;
  }

  deserialize(data: number | null): Calendar | null {
    return data === null ? null : new Calendar(data);
  }
}

export class DateOnlySerializer extends TypeSerializer<DateOnly, number> {
  readonly deserializedType = DateOnly;
  readonly serializedType: SerializedType = 'integer';

  serialize(value: DateOnly | null): number | null {
    return value === null ? null : value.getTime();
  }

  deserialize(data: number | null): DateOnly | null {
    return data === null ? null : new DateOnly(data);
  }
}

export class DateSerializer extends TypeSerializer<Date, number> {
  readonly deserializedType = Date;
  readonly serializedType: SerializedType = 'integer';

  serialize(value: Date | null): number | null {
    return value === null ? null : value.getTime();
  }

  deserialize(data: number | null): Date | null {
    return data === null ? null : new Date(data);
  }
}

export class FilePathSerializer extends TypeSerializer<FilePath, string> {
  readonly deserializedType = FilePath;
  readonly serializedType: SerializedType = 'text';

  serialize(value: FilePath | null): string | null {
    return value === null ? null : value.path;
  }

  deserialize(data: string | null): FilePath | null {
    return data === null ? null : new FilePath(data);
  }
}

/**
 * Creates the serializer mapping every registry starts from.
 *
 * Each call returns a new mapping with new serializer instances.
 */
export function createBuiltinSerializers(): ReadonlyMap<ValueType, TypeSerializer> {
  const serializers: TypeSerializer[] = [
    new CalendarSerializer(),
    new DateOnlySerializer(),
    new DateSerializer(),
    new FilePathSerializer(),
  ];
  return new Map(
    serializers.map((serializer): [ValueType, TypeSerializer] => [serializer.deserializedType, serializer])
  );
}
